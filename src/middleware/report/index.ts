/**
 * CSP violation report receiver
 *
 * @example
 * ```typescript
 * import { withCSPReports, createMemoryStore } from 'csp-compose/report'
 *
 * const store = createMemoryStore({ maxEntries: 500 })
 * export const POST = withCSPReports({ store })
 * ```
 *
 * @packageDocumentation
 */

export { withCSPReports, createViolationEntry } from './middleware'

export { detectReportFormat, parseViolationReports } from './parser'

export {
  ConsoleStore,
  createConsoleStore,
  MemoryStore,
  createMemoryStore,
} from './stores'

export type {
  LogLevel,
  ReportFormat,
  CSPViolation,
  ViolationLogEntry,
  LogStore,
  LogQueryOptions,
  ConsoleStoreOptions,
  MemoryStoreOptions,
  CSPReportOptions,
} from './types'
