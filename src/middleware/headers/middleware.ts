import type { NextRequest } from 'next/server'
import type { CSPHeaderName, CSPRouteHandler, RouteHandler } from '../../core/types'
import { assemblePolicy, flattenDirectives, renderDynamicDirectives } from '../../policy/assembler'
import type { NonceDirectiveName } from '../../policy/directives'
import { generateNonce, withNonce } from '../../policy/nonce'
import { getPreset } from '../../policy/presets'
import type { Policy } from '../../policy/types'
import type { NonceOptions, WithCSPOptions } from './types'

const DEFAULT_NONCE_DIRECTIVES: NonceDirectiveName[] = ['script-src']

/**
 * Stands in for the real nonce while assembling, so nonce directives are
 * classified as dynamic and kept out of the static snapshot.
 */
const NONCE_PLACEHOLDER = 'placeholder'

interface ResolvedNonce {
  directives: NonceDirectiveName[]
  byteLength: number
}

function resolvePolicy(options: WithCSPOptions): Policy {
  if (options.policy) return options.policy
  return getPreset(options.preset ?? 'strict')
}

function resolveNonce(nonce: WithCSPOptions['nonce']): ResolvedNonce | null {
  if (!nonce) return null

  const config: NonceOptions = nonce === true ? {} : nonce
  return {
    directives: config.directives ?? DEFAULT_NONCE_DIRECTIVES,
    byteLength: config.byteLength ?? 16,
  }
}

/**
 * Builds the headers for one response
 */
interface CSPState {
  build(): { nonce: string | null; headers: Record<string, string> }
}

function createState(options: WithCSPOptions): CSPState {
  const policy = resolvePolicy(options)
  const nonce = resolveNonce(options.nonce)
  const headerName: CSPHeaderName = options.reportOnly
    ? 'Content-Security-Policy-Report-Only'
    : 'Content-Security-Policy'

  // Assemble once; configuration errors surface at wrap time
  const assembled = assemblePolicy(
    nonce ? withNonce(policy, NONCE_PLACEHOLDER, nonce.directives) : policy
  )
  const reportTo = assembled.headers['Report-To']

  return {
    build() {
      let value = assembled.headers['Content-Security-Policy']
      let generated: string | null = null

      if (nonce) {
        generated = generateNonce(nonce.byteLength)
        const dynamic = renderDynamicDirectives(
          withNonce(policy, generated, nonce.directives),
          assembled.renderer
        )
        value = flattenDirectives(assembled.staticDirectives, dynamic)
      }

      const headers: Record<string, string> = { [headerName]: value }
      if (reportTo) headers['Report-To'] = reportTo

      return { nonce: generated, headers }
    },
  }
}

/**
 * Content-Security-Policy middleware
 *
 * The policy is assembled once when the handler is wrapped. With `nonce`
 * enabled, only the nonce-bearing directives are rendered per request and
 * the nonce is handed to the handler.
 *
 * @example
 * ```typescript
 * export const GET = withContentSecurityPolicy(
 *   async (req, { nonce }) => new Response(`<script nonce="${nonce}">...</script>`, {
 *     headers: { 'Content-Type': 'text/html' },
 *   }),
 *   { preset: 'react', nonce: { directives: ['script-src'] } }
 * )
 * ```
 */
export function withContentSecurityPolicy(
  handler: CSPRouteHandler,
  options: WithCSPOptions = {}
): RouteHandler {
  const { override = false } = options
  const state = createState(options)

  return async (req: NextRequest): Promise<Response> => {
    const { nonce, headers } = state.build()
    const response = await handler(req, { nonce })

    const newHeaders = new Headers(response.headers)

    for (const [key, value] of Object.entries(headers)) {
      if (override || !newHeaders.has(key)) {
        newHeaders.set(key, value)
      }
    }

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers: newHeaders,
    })
  }
}

/**
 * Create a CSP headers object for use in responses.
 * A nonce, when enabled, is generated per call.
 *
 * @example
 * ```typescript
 * const headers = createCSPHeaders({ preset: 'api' })
 *
 * return Response.json(data, { headers })
 * ```
 */
export function createCSPHeaders(options: WithCSPOptions = {}): Headers {
  return new Headers(createCSPHeadersObject(options))
}

/**
 * Create the CSP headers as a plain object (for next.config `headers()`)
 */
export function createCSPHeadersObject(options: WithCSPOptions = {}): Record<string, string> {
  return createState(options).build().headers
}
