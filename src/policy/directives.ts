import type { ContentSecurityPolicy, SandboxOptions } from './types'

/**
 * Fetch directives compared against `default-src`, in canonical order
 */
export const FETCH_DIRECTIVES = [
  ['child-src', 'childSrc'],
  ['connect-src', 'connectSrc'],
  ['font-src', 'fontSrc'],
  ['frame-src', 'frameSrc'],
  ['img-src', 'imgSrc'],
  ['manifest-src', 'manifestSrc'],
  ['media-src', 'mediaSrc'],
  ['object-src', 'objectSrc'],
  ['prefetch-src', 'prefetchSrc'],
  ['script-src', 'scriptSrc'],
  ['script-src-elem', 'scriptSrcElem'],
  ['script-src-attr', 'scriptSrcAttr'],
  ['style-src', 'styleSrc'],
  ['style-src-elem', 'styleSrcElem'],
  ['style-src-attr', 'styleSrcAttr'],
  ['worker-src', 'workerSrc'],
] as const satisfies ReadonlyArray<readonly [string, keyof ContentSecurityPolicy]>

/**
 * Source-list directives never compared against `default-src`
 */
export const NON_FETCH_DIRECTIVES = [
  ['base-uri', 'baseUri'],
  ['form-action', 'formAction'],
] as const satisfies ReadonlyArray<readonly [string, keyof ContentSecurityPolicy]>

export type FetchDirectiveName = (typeof FETCH_DIRECTIVES)[number][0]

/**
 * Every directive governed by the source-list grammar
 */
export type SourceDirectiveName =
  | 'default-src'
  | FetchDirectiveName
  | (typeof NON_FETCH_DIRECTIVES)[number][0]

/**
 * Source directives that may carry a per-request nonce.
 * `default-src` is always static.
 */
export type NonceDirectiveName = Exclude<SourceDirectiveName, 'default-src'>

/**
 * Policy keys holding source-list options
 */
export type SourceOptionKey =
  | 'defaultSrc'
  | (typeof FETCH_DIRECTIVES)[number][1]
  | (typeof NON_FETCH_DIRECTIVES)[number][1]

export const SOURCE_DIRECTIVE_KEYS: Readonly<Record<SourceDirectiveName, SourceOptionKey>> = {
  'default-src': 'defaultSrc',
  'child-src': 'childSrc',
  'connect-src': 'connectSrc',
  'font-src': 'fontSrc',
  'frame-src': 'frameSrc',
  'img-src': 'imgSrc',
  'manifest-src': 'manifestSrc',
  'media-src': 'mediaSrc',
  'object-src': 'objectSrc',
  'prefetch-src': 'prefetchSrc',
  'script-src': 'scriptSrc',
  'script-src-elem': 'scriptSrcElem',
  'script-src-attr': 'scriptSrcAttr',
  'style-src': 'styleSrc',
  'style-src-elem': 'styleSrcElem',
  'style-src-attr': 'styleSrcAttr',
  'worker-src': 'workerSrc',
  'base-uri': 'baseUri',
  'form-action': 'formAction',
}

/**
 * Flattening order of the header value
 */
export const DIRECTIVE_ORDER: readonly string[] = [
  'default-src',
  ...FETCH_DIRECTIVES.map(([name]) => name),
  'base-uri',
  'sandbox',
  'form-action',
  'frame-ancestors',
  'report-uri',
  'report-to',
  'upgrade-insecure-requests',
]

/**
 * Directives that take no value
 */
export const VALUELESS_DIRECTIVES: ReadonlySet<string> = new Set(['upgrade-insecure-requests'])

/**
 * Sandbox tokens in canonical order
 */
export const SANDBOX_TOKENS = [
  ['allowDownloads', 'allow-downloads'],
  ['allowForms', 'allow-forms'],
  ['allowModals', 'allow-modals'],
  ['allowOrientationLock', 'allow-orientation-lock'],
  ['allowPointerLock', 'allow-pointer-lock'],
  ['allowPopups', 'allow-popups'],
  ['allowPopupsToEscapeSandbox', 'allow-popups-to-escape-sandbox'],
  ['allowPresentation', 'allow-presentation'],
  ['allowSameOrigin', 'allow-same-origin'],
  ['allowScripts', 'allow-scripts'],
  ['allowTopNavigation', 'allow-top-navigation'],
  ['allowTopNavigationByUserActivation', 'allow-top-navigation-by-user-activation'],
  ['allowTopNavigationToCustomProtocols', 'allow-top-navigation-to-custom-protocols'],
] as const satisfies ReadonlyArray<readonly [keyof SandboxOptions, string]>
