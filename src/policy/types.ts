/**
 * Option value types for Content-Security-Policy directives.
 *
 * Every field is optional; a missing field reads as its zero value
 * (`false`, `''` or `[]`).
 */

/**
 * Source-list options for fetch, document and navigation directives
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Security-Policy/Sources#sources
 */
export interface SourceOptions {
  /** When false the directive is exactly `'none'` and every other field is ignored */
  allow?: boolean
  /** `'self'` */
  allowSelf?: boolean
  /** Host and scheme sources, emitted verbatim in order */
  values?: readonly string[]
  /** `'unsafe-eval'` */
  unsafeEval?: boolean
  /** `'wasm-unsafe-eval'` */
  wasmUnsafeEval?: boolean
  /** `'unsafe-hashes'` */
  unsafeHashes?: boolean
  /** `'unsafe-inline'` */
  unsafeInline?: boolean
  /** Pre-formatted nonce token, e.g. `'nonce-abc123'`. Set a fresh one per response */
  nonceValue?: string
  /** Pre-formatted hash token, e.g. `'sha256-...'` */
  hashValue?: string
  /** `'strict-dynamic'` */
  strictDynamic?: boolean
  /** `'report-sample'` */
  reportSample?: boolean
}

export interface SandboxOptions {
  allowDownloads?: boolean
  allowForms?: boolean
  allowModals?: boolean
  allowOrientationLock?: boolean
  allowPointerLock?: boolean
  allowPopups?: boolean
  allowPopupsToEscapeSandbox?: boolean
  allowPresentation?: boolean
  allowSameOrigin?: boolean
  allowScripts?: boolean
  allowTopNavigation?: boolean
  allowTopNavigationByUserActivation?: boolean
  allowTopNavigationToCustomProtocols?: boolean
}

export interface FrameAncestorOptions {
  /** When false the directive is exactly `'none'` */
  allow?: boolean
  allowSelf?: boolean
  hostSources?: readonly string[]
  schemeSources?: readonly string[]
}

/**
 * One or more unquoted values (`report-uri`)
 */
export interface UnquotedOptions {
  values?: readonly string[]
}

/**
 * A single unquoted value (`report-to` group name)
 */
export interface UnquotedOption {
  value?: string
}

/**
 * Directive configuration of a policy
 */
export interface ContentSecurityPolicy {
  // Fetch directives
  /** Fallback for every absent fetch directive. `'self'` includes the scheme */
  defaultSrc?: SourceOptions
  childSrc?: SourceOptions
  connectSrc?: SourceOptions
  fontSrc?: SourceOptions
  frameSrc?: SourceOptions
  imgSrc?: SourceOptions
  manifestSrc?: SourceOptions
  mediaSrc?: SourceOptions
  objectSrc?: SourceOptions
  prefetchSrc?: SourceOptions
  scriptSrc?: SourceOptions
  scriptSrcElem?: SourceOptions
  scriptSrcAttr?: SourceOptions
  styleSrc?: SourceOptions
  styleSrcElem?: SourceOptions
  styleSrcAttr?: SourceOptions
  workerSrc?: SourceOptions

  // Document directives
  baseUri?: SourceOptions
  sandbox?: SandboxOptions

  // Navigation directives
  formAction?: SourceOptions
  frameAncestors?: FrameAncestorOptions

  // Reporting directives
  /** Deprecated but still read by Firefox */
  reportUri?: UnquotedOptions
  /** Group name; must appear in the `Report-To` header payload */
  reportTo?: UnquotedOption

  upgradeInsecureRequests?: boolean
}

/**
 * The five template kinds, one per option type
 */
export type TemplateKind =
  | 'source-option'
  | 'sandbox'
  | 'frame-ancestors'
  | 'unquoted-multi'
  | 'unquoted-single'

/**
 * Option type rendered by each template kind
 */
export interface TemplateValues {
  'source-option': SourceOptions
  sandbox: SandboxOptions
  'frame-ancestors': FrameAncestorOptions
  'unquoted-multi': UnquotedOptions
  'unquoted-single': UnquotedOption
}

/**
 * Caller-supplied template text, per kind
 */
export type PolicyTemplates = Partial<Record<TemplateKind, string>>

/**
 * A complete policy, consumed by the assembler
 */
export interface Policy {
  directives: ContentSecurityPolicy

  /**
   * Literal `Report-To` header body, e.g.
   * `{"group":"default","max_age":604800,"endpoints":[{"url":"/csp-reports"}]}`
   */
  reportToPayload?: string

  /** Template overrides */
  templates?: PolicyTemplates
}
