/**
 * Core types for csp-compose
 */

import type { NextRequest } from 'next/server'

/**
 * Header name carrying an enforced policy
 */
export type CSPHeaderName = 'Content-Security-Policy' | 'Content-Security-Policy-Report-Only'

/**
 * Headers produced by policy assembly
 */
export interface CSPHeaders {
  'Content-Security-Policy': string
  'Report-To'?: string
}

/**
 * Per-request values handed to a wrapped route handler
 */
export interface CSPContext {
  /**
   * Nonce generated for this response, or null when nonces are disabled
   */
  nonce: string | null
}

/**
 * Route handler wrapped by the CSP middleware
 */
export type CSPRouteHandler = (
  request: NextRequest,
  context: CSPContext
) => Response | Promise<Response>

/**
 * Plain route handler returned by the middleware wrappers
 */
export type RouteHandler = (request: NextRequest) => Response | Promise<Response>

