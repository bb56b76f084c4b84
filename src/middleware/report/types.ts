/**
 * Log severity levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical'

/**
 * Wire format a violation arrived in
 * - `csp-report`: legacy `report-uri` body (`application/csp-report`)
 * - `reports+json`: Reporting API batch (`application/reports+json`)
 */
export type ReportFormat = 'csp-report' | 'reports+json'

/**
 * A single violation, normalised across both report formats
 */
export interface CSPViolation {
  documentUri: string
  referrer?: string
  blockedUri?: string
  effectiveDirective: string
  originalPolicy: string
  disposition: 'enforce' | 'report'
  sourceFile?: string
  lineNumber?: number
  columnNumber?: number
  statusCode?: number
  sample?: string
}

/**
 * Log entry written for each received violation
 */
export interface ViolationLogEntry {
  id: string
  timestamp: Date
  level: LogLevel
  message: string
  type: 'csp-violation'
  format: ReportFormat
  violation: CSPViolation
  source: {
    ip?: string
    userAgent?: string
  }
  metadata?: Record<string, unknown>
}

/**
 * Log store interface
 */
export interface LogStore {
  write(entry: ViolationLogEntry): Promise<void>
  query?(options: LogQueryOptions): Promise<ViolationLogEntry[]>
  close?(): Promise<void>
}

export interface LogQueryOptions {
  level?: LogLevel | LogLevel[]
  directive?: string | string[]
  documentUri?: string
  startTime?: Date
  endTime?: Date
  limit?: number
  offset?: number
}

export interface ConsoleStoreOptions {
  colorize?: boolean
  timestamp?: boolean
  pretty?: boolean
  level?: LogLevel
}

export interface MemoryStoreOptions {
  maxEntries?: number
  /** Milliseconds an entry is kept; 0 keeps entries forever */
  ttl?: number
}

export interface CSPReportOptions {
  /** Where violations are written */
  store: LogStore

  /** Level of violation entries (default: 'warn') */
  level?: LogLevel

  /** Largest accepted body in bytes (default: 64 KiB) */
  maxBodySize?: number

  /** Read the client IP from proxy headers (default: true) */
  trustProxy?: boolean

  /** Called after each violation is stored */
  onViolation?: (entry: ViolationLogEntry) => void | Promise<void>
}
