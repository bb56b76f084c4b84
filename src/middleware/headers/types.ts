import type { NonceDirectiveName } from '../../policy/directives'
import type { PolicyPreset } from '../../policy/presets'
import type { Policy } from '../../policy/types'

/**
 * Per-request nonce configuration
 */
export interface NonceOptions {
  /** Directives receiving the nonce (default: `['script-src']`) */
  directives?: NonceDirectiveName[]

  /** Random bytes per nonce (default: 16) */
  byteLength?: number
}

export interface WithCSPOptions {
  /** Use a preset policy (default: `'strict'`) */
  preset?: PolicyPreset

  /** Full policy; takes precedence over `preset` */
  policy?: Policy

  /** Generate a fresh nonce on every response */
  nonce?: boolean | NonceOptions

  /** Send `Content-Security-Policy-Report-Only` instead of enforcing */
  reportOnly?: boolean

  /** Override headers already set by the handler instead of keeping them */
  override?: boolean
}
