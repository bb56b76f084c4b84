import type { CSPHeaders } from '../core/types'
import {
  DIRECTIVE_ORDER,
  FETCH_DIRECTIVES,
  NON_FETCH_DIRECTIVES,
  VALUELESS_DIRECTIVES,
} from './directives'
import { isDynamic, isRedundant, partitionDirective } from './filter'
import { createDirectiveRenderer, renderDirective } from './renderer'
import type { DirectiveRenderer } from './renderer'
import type { ContentSecurityPolicy, Policy, SourceOptions } from './types'
import { validateReportTo } from './validator'

/**
 * Result of assembling a policy
 */
export interface AssembledPolicy {
  /** Header values ready to be set on a response */
  readonly headers: Readonly<CSPHeaders>

  /** Directive text that stays the same across responses */
  readonly staticDirectives: ReadonlyMap<string, string>

  /** Directive text carrying a nonce or hash */
  readonly dynamicDirectives: ReadonlyMap<string, string>

  /** Renderer compiled from the policy templates, reusable per request */
  readonly renderer: DirectiveRenderer
}

interface SourceDirectiveEntry {
  name: string
  options: SourceOptions
  fetch: boolean
}

function sourceDirectives(csp: ContentSecurityPolicy): SourceDirectiveEntry[] {
  return [
    ...FETCH_DIRECTIVES.map(([name, key]) => ({ name, options: csp[key] ?? {}, fetch: true })),
    ...NON_FETCH_DIRECTIVES.map(([name, key]) => ({ name, options: csp[key] ?? {}, fetch: false })),
  ]
}

/**
 * Render the source directives, skipping fetch directives identical to `default-src`
 */
function renderSourceDirectives(
  csp: ContentSecurityPolicy,
  renderer: DirectiveRenderer,
  defaultSrc: string,
  include: (options: SourceOptions) => boolean
): Array<[name: string, text: string, options: SourceOptions]> {
  const rendered: Array<[string, string, SourceOptions]> = []

  for (const { name, options, fetch } of sourceDirectives(csp)) {
    if (!include(options)) continue

    const text = renderDirective(renderer, name, 'source-option', options)
    if (fetch && isRedundant(text, defaultSrc)) continue

    rendered.push([name, text, options])
  }

  return rendered
}

function directiveRank(name: string): number {
  const index = DIRECTIVE_ORDER.indexOf(name)
  return index === -1 ? DIRECTIVE_ORDER.length : index
}

/**
 * Flatten directive maps into a header value.
 *
 * Entries with empty text are dropped; the rest are emitted as
 * `<name> <text>;` in canonical directive order and joined with a space.
 *
 * Pass a cached static snapshot and a freshly rendered dynamic map to
 * rebuild a per-request header without re-assembling the policy.
 */
export function flattenDirectives(
  staticDirectives: ReadonlyMap<string, string>,
  dynamicDirectives: ReadonlyMap<string, string> = new Map()
): string {
  const entries = [...staticDirectives, ...dynamicDirectives]
    .filter(([, text]) => text.length > 0)
    .sort(([a], [b]) => directiveRank(a) - directiveRank(b))

  return entries
    .map(([name, text]) => (VALUELESS_DIRECTIVES.has(name) ? `${name};` : `${name} ${text};`))
    .join(' ')
}

/**
 * Assemble a policy into its header values.
 *
 * Templates are compiled and the report-to pairing is checked before any
 * directive is rendered. Nothing is returned on failure.
 *
 * @throws AssemblyError on invalid templates or report-to mismatch
 * @throws RenderError when an option value has the wrong shape
 *
 * @example
 * ```typescript
 * const { headers } = assemblePolicy({
 *   directives: {
 *     defaultSrc: { allow: false },
 *     scriptSrc: { allow: true, allowSelf: true },
 *   },
 * })
 * // headers['Content-Security-Policy'] starts with "default-src 'none'; script-src 'self';"
 * ```
 */
export function assemblePolicy(policy: Policy): AssembledPolicy {
  const renderer = createDirectiveRenderer(policy.templates)

  validateReportTo(policy)

  const csp = policy.directives
  const staticDirectives = new Map<string, string>()
  const dynamicDirectives = new Map<string, string>()

  const defaultSrc = renderDirective(renderer, 'default-src', 'source-option', csp.defaultSrc ?? {})
  staticDirectives.set('default-src', defaultSrc)

  for (const [name, text, options] of renderSourceDirectives(csp, renderer, defaultSrc, () => true)) {
    const target = partitionDirective(options) === 'dynamic' ? dynamicDirectives : staticDirectives
    target.set(name, text)
  }

  // Document and navigation
  staticDirectives.set('sandbox', renderDirective(renderer, 'sandbox', 'sandbox', csp.sandbox ?? {}))
  staticDirectives.set(
    'frame-ancestors',
    renderDirective(renderer, 'frame-ancestors', 'frame-ancestors', csp.frameAncestors ?? {})
  )

  // Reporting
  staticDirectives.set('report-uri', renderDirective(renderer, 'report-uri', 'unquoted-multi', csp.reportUri ?? {}))
  staticDirectives.set('report-to', renderDirective(renderer, 'report-to', 'unquoted-single', csp.reportTo ?? {}))

  staticDirectives.set(
    'upgrade-insecure-requests',
    csp.upgradeInsecureRequests ? 'upgrade-insecure-requests' : ''
  )

  const headers: CSPHeaders = {
    'Content-Security-Policy': flattenDirectives(staticDirectives, dynamicDirectives),
  }
  if (policy.reportToPayload?.trim()) {
    headers['Report-To'] = policy.reportToPayload
  }

  return {
    headers: Object.freeze(headers),
    staticDirectives,
    dynamicDirectives,
    renderer,
  }
}

/**
 * Assemble a policy and return only its headers
 */
export function loadPolicy(policy: Policy): Readonly<CSPHeaders> {
  return assemblePolicy(policy).headers
}

/**
 * Render only the nonce- or hash-bearing directives of a policy.
 *
 * Merge the result into a cached `staticDirectives` snapshot with
 * {@link flattenDirectives}. Each call returns a new map.
 */
export function renderDynamicDirectives(
  policy: Policy,
  renderer: DirectiveRenderer = createDirectiveRenderer(policy.templates)
): Map<string, string> {
  const csp = policy.directives
  const defaultSrc = renderDirective(renderer, 'default-src', 'source-option', csp.defaultSrc ?? {})

  return new Map(
    renderSourceDirectives(csp, renderer, defaultSrc, isDynamic).map(
      ([name, text]): [string, string] => [name, text]
    )
  )
}
