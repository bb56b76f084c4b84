/**
 * csp-compose
 *
 * Content-Security-Policy header assembly for Next.js 13+ App Router.
 *
 * @example
 * ```typescript
 * import { assemblePolicy, reactPolicy, withContentSecurityPolicy } from 'csp-compose'
 *
 * // Header values from a preset
 * const { headers } = assemblePolicy(reactPolicy())
 *
 * // Route handler with a fresh script nonce per response
 * export const GET = withContentSecurityPolicy(
 *   async (req, { nonce }) => renderPage(nonce),
 *   { preset: 'react', nonce: true }
 * )
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Core
// =============================================================================

export type {
  CSPHeaderName,
  CSPHeaders,
  CSPContext,
  CSPRouteHandler,
  RouteHandler,
} from './core/types'

export {
  CSPError,
  AssemblyError,
  RenderError,
  ConfigurationError,
  ReportError,
  isCSPError,
  toCSPError,
} from './core/errors'

export type { AssemblyErrorReason } from './core/errors'

// =============================================================================
// Policy Assembly
// =============================================================================

export {
  assemblePolicy,
  loadPolicy,
  flattenDirectives,
  renderDynamicDirectives,
  createDirectiveRenderer,
  renderDirective,
  resolveTemplates,
  compileTemplate,
  DEFAULT_TEMPLATES,
  isRedundant,
  isDynamic,
  partitionDirective,
  validateReportTo,
  FETCH_DIRECTIVES,
  NON_FETCH_DIRECTIVES,
  DIRECTIVE_ORDER,
  SANDBOX_TOKENS,
  SOURCE_DIRECTIVE_KEYS,
  generateNonce,
  formatNonce,
  formatHash,
  withNonce,
  reactPolicy,
  strictPolicy,
  apiPolicy,
  getPreset,
  parsePolicy,
  policySchema,
} from './policy'

export type {
  AssembledPolicy,
  DirectiveRenderer,
  CompiledTemplate,
  DirectivePartition,
  FetchDirectiveName,
  SourceDirectiveName,
  NonceDirectiveName,
  SourceOptionKey,
  HashAlgorithm,
  PolicyPreset,
  SourceOptions,
  SandboxOptions,
  FrameAncestorOptions,
  UnquotedOptions,
  UnquotedOption,
  ContentSecurityPolicy,
  TemplateKind,
  TemplateValues,
  PolicyTemplates,
  Policy,
} from './policy'

// =============================================================================
// Headers Middleware
// =============================================================================

export {
  withContentSecurityPolicy,
  createCSPHeaders,
  createCSPHeadersObject,
} from './middleware/headers'

export type { WithCSPOptions, NonceOptions } from './middleware/headers'

// =============================================================================
// Violation Reports
// =============================================================================

export {
  withCSPReports,
  createViolationEntry,
  detectReportFormat,
  parseViolationReports,
  ConsoleStore,
  createConsoleStore,
  MemoryStore,
  createMemoryStore,
} from './middleware/report'

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
} from './middleware/report'

// =============================================================================
// Utilities
// =============================================================================

export { getClientIp, normalizeIp, isValidIp } from './utils/ip'

// =============================================================================
// Version
// =============================================================================

/**
 * Package version
 */
export const VERSION = '0.1.0'
