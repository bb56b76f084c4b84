import type { LogStore, ViolationLogEntry, LogQueryOptions, MemoryStoreOptions } from '../types'

/**
 * In-memory violation store, oldest entries evicted first
 * Useful for development and testing
 */
export class MemoryStore implements LogStore {
  private entries: ViolationLogEntry[] = []
  private readonly maxEntries: number
  private readonly ttl: number

  constructor(options: MemoryStoreOptions = {}) {
    this.maxEntries = options.maxEntries || 1000
    this.ttl = options.ttl || 0
  }

  async write(entry: ViolationLogEntry): Promise<void> {
    this.entries.push(entry)

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries)
    }

    if (this.ttl > 0) {
      this.cleanExpired()
    }
  }

  async query(options: LogQueryOptions = {}): Promise<ViolationLogEntry[]> {
    let result = [...this.entries]

    if (options.level) {
      const levels = Array.isArray(options.level) ? options.level : [options.level]
      result = result.filter(e => levels.includes(e.level))
    }

    if (options.directive) {
      const directives = Array.isArray(options.directive) ? options.directive : [options.directive]
      result = result.filter(e => directives.includes(e.violation.effectiveDirective))
    }

    const { documentUri, startTime, endTime } = options
    if (documentUri) {
      result = result.filter(e => e.violation.documentUri === documentUri)
    }
    if (startTime) {
      result = result.filter(e => e.timestamp >= startTime)
    }
    if (endTime) {
      result = result.filter(e => e.timestamp <= endTime)
    }

    if (options.offset) {
      result = result.slice(options.offset)
    }

    if (options.limit !== undefined) {
      result = result.slice(0, options.limit)
    }

    return result
  }

  async close(): Promise<void> {
    this.entries = []
  }

  /**
   * Get all entries (for testing)
   */
  getEntries(): ViolationLogEntry[] {
    return [...this.entries]
  }

  clear(): void {
    this.entries = []
  }

  size(): number {
    return this.entries.length
  }

  private cleanExpired(): void {
    const now = Date.now()
    this.entries = this.entries.filter(e => now - e.timestamp.getTime() < this.ttl)
  }
}

/**
 * Create a memory store
 */
export function createMemoryStore(options?: MemoryStoreOptions): MemoryStore {
  return new MemoryStore(options)
}
