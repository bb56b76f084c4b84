import { SOURCE_DIRECTIVE_KEYS } from './directives'
import type { NonceDirectiveName } from './directives'
import type { ContentSecurityPolicy, Policy, SourceOptions } from './types'

export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512'

/**
 * Generate a base64 nonce from the Web Crypto RNG (Edge Runtime compatible)
 */
export function generateNonce(byteLength: number = 16): string {
  const bytes = new Uint8Array(byteLength)
  crypto.getRandomValues(bytes)
  return btoa(String.fromCharCode(...bytes))
}

/**
 * `'nonce-<value>'`
 */
export function formatNonce(nonce: string): string {
  return `'nonce-${nonce}'`
}

/**
 * `'<algorithm>-<base64>'`
 */
export function formatHash(algorithm: HashAlgorithm, base64Digest: string): string {
  return `'${algorithm}-${base64Digest}'`
}

/**
 * Options a nonce is added to. An unset directive starts from `default-src`,
 * or from a bare source list when `default-src` is `'none'`.
 */
function nonceBase(csp: ContentSecurityPolicy, own: SourceOptions | undefined): SourceOptions {
  if (own) return own

  const fallback = csp.defaultSrc ?? {}
  return fallback.allow ? fallback : { allow: true }
}

/**
 * Copy a policy with the nonce set on the given source directives.
 * The input policy is left untouched.
 */
export function withNonce(
  policy: Policy,
  nonce: string,
  directives: readonly NonceDirectiveName[]
): Policy {
  const csp: ContentSecurityPolicy = { ...policy.directives }

  for (const directive of directives) {
    const key = SOURCE_DIRECTIVE_KEYS[directive]
    csp[key] = { ...nonceBase(policy.directives, csp[key]), nonceValue: formatNonce(nonce) }
  }

  return { ...policy, directives: csp }
}
