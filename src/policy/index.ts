/**
 * Content-Security-Policy assembly
 *
 * @example
 * ```typescript
 * import { assemblePolicy, reactPolicy } from 'csp-compose/policy'
 *
 * const { headers } = assemblePolicy(reactPolicy())
 * // headers['Content-Security-Policy']
 * // "default-src 'none'; script-src 'self'; style-src-attr 'self' 'unsafe-inline'; ..."
 * ```
 *
 * @packageDocumentation
 */

export {
  assemblePolicy,
  loadPolicy,
  flattenDirectives,
  renderDynamicDirectives,
} from './assembler'

export type { AssembledPolicy } from './assembler'

export { createDirectiveRenderer, renderDirective, resolveTemplates } from './renderer'

export type { DirectiveRenderer } from './renderer'

export { compileTemplate, DEFAULT_TEMPLATES } from './template'

export type { CompiledTemplate } from './template'

export { isRedundant, isDynamic, partitionDirective } from './filter'

export type { DirectivePartition } from './filter'

export { validateReportTo } from './validator'

export {
  FETCH_DIRECTIVES,
  NON_FETCH_DIRECTIVES,
  DIRECTIVE_ORDER,
  SANDBOX_TOKENS,
  SOURCE_DIRECTIVE_KEYS,
} from './directives'

export type {
  FetchDirectiveName,
  SourceDirectiveName,
  NonceDirectiveName,
  SourceOptionKey,
} from './directives'

export { generateNonce, formatNonce, formatHash, withNonce } from './nonce'

export type { HashAlgorithm } from './nonce'

export { reactPolicy, strictPolicy, apiPolicy, getPreset } from './presets'

export type { PolicyPreset } from './presets'

export { parsePolicy, policySchema } from './schema'

export type {
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
} from './types'
