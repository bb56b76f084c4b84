/**
 * Client IP extraction for violation report entries
 */

/**
 * Headers to check for client IP (in order of priority)
 */
const IP_HEADERS = [
  // Cloudflare
  'cf-connecting-ip',
  // Vercel
  'x-real-ip',
  // Standard forwarded header (RFC 7239)
  'x-forwarded-for',
  // AWS ELB
  'x-client-ip',
  // Fastly
  'fastly-client-ip',
  // Akamai
  'true-client-ip',
  // Fly.io
  'fly-client-ip',
] as const

const IPV4_REGEX = /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/

/**
 * IPv6 validation regex (simplified)
 */
const IPV6_REGEX = /^(?:[a-fA-F0-9]{1,4}:){7}[a-fA-F0-9]{1,4}$|^::1$|^::$|^(?:[a-fA-F0-9]{1,4}:)*:(?:[a-fA-F0-9]{1,4}:)*[a-fA-F0-9]{1,4}$/

export interface GetIpOptions {
  /**
   * Trust proxy headers (default: true)
   * Set to false in direct-to-client setups
   */
  trustProxy?: boolean

  /**
   * Fallback IP when none found
   */
  fallback?: string
}

/**
 * Anything exposing request headers
 */
interface HeaderSource {
  headers: Headers
}

/**
 * Extract the client IP address from proxy headers
 *
 * @example
 * ```typescript
 * const ip = getClientIp(request, { fallback: '0.0.0.0' })
 * ```
 */
export function getClientIp(request: HeaderSource, options: GetIpOptions = {}): string {
  const { trustProxy = true, fallback = '127.0.0.1' } = options

  if (!trustProxy) {
    return fallback
  }

  for (const header of IP_HEADERS) {
    const value = request.headers.get(header)
    if (value) {
      const ip = parseIpFromHeader(value)
      if (ip) return ip
    }
  }

  return fallback
}

/**
 * x-forwarded-for can carry "client, proxy1, proxy2"; the first valid one wins
 */
function parseIpFromHeader(headerValue: string): string | null {
  for (const ip of headerValue.split(',')) {
    const normalized = normalizeIp(ip)
    if (isValidIp(normalized)) {
      return normalized
    }
  }

  return null
}

/**
 * Normalize an IP address
 * - Removes IPv6 brackets
 * - Removes port numbers
 * - Unwraps IPv4-mapped IPv6
 */
export function normalizeIp(ip: string): string {
  let normalized = ip.trim()

  // [::1] -> ::1
  if (normalized.startsWith('[') && normalized.includes(']')) {
    normalized = normalized.slice(1, normalized.indexOf(']'))
  }

  // 192.168.1.1:8080 -> 192.168.1.1 (unbracketed IPv6 has several colons)
  const lastColon = normalized.lastIndexOf(':')
  if (lastColon !== -1 && normalized.indexOf(':') === lastColon) {
    const potentialPort = normalized.slice(lastColon + 1)
    if (/^\d+$/.test(potentialPort)) {
      normalized = normalized.slice(0, lastColon)
    }
  }

  // ::ffff:192.168.1.1 -> 192.168.1.1
  if (normalized.toLowerCase().startsWith('::ffff:')) {
    const ipv4Part = normalized.slice(7)
    if (IPV4_REGEX.test(ipv4Part)) {
      return ipv4Part
    }
  }

  return normalized
}

export function isValidIp(ip: string): boolean {
  return IPV4_REGEX.test(ip) || IPV6_REGEX.test(ip)
}
