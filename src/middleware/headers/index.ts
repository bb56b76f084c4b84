/**
 * Content-Security-Policy Middleware
 *
 * @example
 * ```typescript
 * import { withContentSecurityPolicy } from 'csp-compose/headers'
 *
 * // Use strict preset (default)
 * export const GET = withContentSecurityPolicy(handler)
 *
 * // Use specific preset
 * export const GET = withContentSecurityPolicy(handler, { preset: 'api' })
 *
 * // Custom policy with a fresh script nonce per response
 * export const GET = withContentSecurityPolicy(handler, {
 *   policy: {
 *     directives: {
 *       defaultSrc: { allow: false },
 *       scriptSrc: { allow: true, strictDynamic: true },
 *     },
 *   },
 *   nonce: true,
 * })
 * ```
 *
 * @packageDocumentation
 */

export {
  withContentSecurityPolicy,
  createCSPHeaders,
  createCSPHeadersObject,
} from './middleware'

export type { WithCSPOptions, NonceOptions } from './types'
