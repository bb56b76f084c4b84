import type { LogStore, ViolationLogEntry, ConsoleStoreOptions, LogLevel } from '../types'

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  // Log levels
  debug: '\x1b[36m',    // Cyan
  info: '\x1b[32m',     // Green
  warn: '\x1b[33m',     // Yellow
  error: '\x1b[31m',    // Red
  critical: '\x1b[35m', // Magenta

  timestamp: '\x1b[90m', // Gray
  directive: '\x1b[34m', // Blue
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
}

/**
 * Console log store
 * Outputs formatted violations to the console
 */
export class ConsoleStore implements LogStore {
  private readonly colorize: boolean
  private readonly showTimestamp: boolean
  private readonly pretty: boolean
  private readonly minLevel: LogLevel

  constructor(options: ConsoleStoreOptions = {}) {
    this.colorize = options.colorize ?? (process.env.NODE_ENV !== 'production')
    this.showTimestamp = options.timestamp ?? true
    this.pretty = options.pretty ?? false
    this.minLevel = options.level || 'info'
  }

  async write(entry: ViolationLogEntry): Promise<void> {
    if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[this.minLevel]) {
      return
    }

    const output = this.pretty
      ? this.formatPretty(entry)
      : this.formatCompact(entry)

    switch (entry.level) {
      case 'debug':
        console.debug(output)
        break
      case 'info':
        console.info(output)
        break
      case 'warn':
        console.warn(output)
        break
      case 'error':
      case 'critical':
        console.error(output)
        break
    }
  }

  /**
   * Single line: timestamp, level, directive, blocked URI, document
   */
  private formatCompact(entry: ViolationLogEntry): string {
    const parts: string[] = []
    const { violation } = entry

    if (this.showTimestamp) {
      parts.push(this.color(entry.timestamp.toISOString(), 'timestamp'))
    }

    parts.push(this.colorLevel(entry.level))
    parts.push(this.color(violation.effectiveDirective, 'directive'))
    parts.push(violation.blockedUri || '-')
    parts.push(this.color(`on ${violation.documentUri}`, 'dim'))

    if (violation.disposition === 'report') {
      parts.push(this.color('(report-only)', 'dim'))
    }

    if (entry.source.ip) {
      parts.push(this.color(`[${entry.source.ip}]`, 'dim'))
    }

    return parts.join(' ')
  }

  private formatPretty(entry: ViolationLogEntry): string {
    const { violation } = entry
    const lines: string[] = []

    lines.push([
      this.color(entry.timestamp.toISOString(), 'timestamp'),
      this.colorLevel(entry.level),
      '[CSP-VIOLATION]',
    ].join(' '))

    lines.push(`  Message: ${entry.message}`)
    lines.push(`  Directive: ${this.color(violation.effectiveDirective, 'directive')}`)
    lines.push(`  Document: ${violation.documentUri}`)
    if (violation.blockedUri) lines.push(`  Blocked: ${violation.blockedUri}`)
    if (violation.sourceFile) {
      const position = violation.lineNumber !== undefined
        ? `:${violation.lineNumber}:${violation.columnNumber ?? 0}`
        : ''
      lines.push(`  Source: ${violation.sourceFile}${position}`)
    }
    if (violation.sample) lines.push(`  Sample: ${violation.sample}`)
    lines.push(`  Disposition: ${violation.disposition}`)
    if (entry.source.ip) lines.push(`  IP: ${entry.source.ip}`)
    if (entry.source.userAgent) lines.push(`  UA: ${entry.source.userAgent}`)

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      lines.push(`  Metadata: ${JSON.stringify(entry.metadata)}`)
    }

    return lines.join('\n')
  }

  private color(text: string, colorName: keyof typeof COLORS): string {
    if (!this.colorize) return text
    return `${COLORS[colorName]}${text}${COLORS.reset}`
  }

  private colorLevel(level: LogLevel): string {
    const text = level.toUpperCase().padEnd(8)
    if (!this.colorize) return `[${text}]`
    return `[${COLORS[level]}${text}${COLORS.reset}]`
  }
}

/**
 * Create a console store
 */
export function createConsoleStore(options?: ConsoleStoreOptions): ConsoleStore {
  return new ConsoleStore(options)
}
