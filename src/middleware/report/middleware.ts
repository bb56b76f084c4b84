import type { NextRequest } from 'next/server'
import { ReportError, isCSPError } from '../../core/errors'
import type { RouteHandler } from '../../core/types'
import { getClientIp } from '../../utils/ip'
import { detectReportFormat, parseViolationReports } from './parser'
import type { CSPReportOptions, CSPViolation, LogLevel, ReportFormat, ViolationLogEntry } from './types'

const DEFAULT_MAX_BODY_SIZE = 64 * 1024

function generateId(): string {
  return `csp_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 9)}`
}

/**
 * Build the log entry for one violation
 */
export function createViolationEntry(
  violation: CSPViolation,
  options: {
    format: ReportFormat
    level?: LogLevel
    source?: { ip?: string; userAgent?: string }
    metadata?: Record<string, unknown>
  }
): ViolationLogEntry {
  const blocked = violation.blockedUri || 'inline'

  return {
    id: generateId(),
    timestamp: new Date(),
    level: options.level ?? 'warn',
    message: `${violation.effectiveDirective} blocked ${blocked}`,
    type: 'csp-violation',
    format: options.format,
    violation,
    source: options.source ?? {},
    metadata: options.metadata,
  }
}

function tooLarge(): ReportError {
  return new ReportError('Report body too large', { statusCode: 413, code: 'REPORT_TOO_LARGE' })
}

/**
 * Read a request body as text, cancelling the stream once it passes `maxBodySize` bytes
 */
export async function readReportBody(
  body: ReadableStream<Uint8Array> | null,
  maxBodySize: number
): Promise<string> {
  if (!body) return ''

  const reader = body.getReader()
  const decoder = new TextDecoder()
  let size = 0
  let text = ''

  for (;;) {
    const { done, value } = await reader.read()
    if (done) break

    size += value.byteLength
    if (size > maxBodySize) {
      await reader.cancel()
      throw tooLarge()
    }
    text += decoder.decode(value, { stream: true })
  }

  return text + decoder.decode()
}

async function readJson(req: NextRequest, maxBodySize: number): Promise<unknown> {
  const declared = Number(req.headers.get('content-length') ?? '0')
  if (declared > maxBodySize) throw tooLarge()

  const text = await readReportBody(req.body, maxBodySize)

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ReportError('Report body is not valid JSON', {
      details: { reason: error instanceof Error ? error.message : String(error) },
    })
  }
}

/**
 * CSP violation report endpoint
 *
 * Accepts legacy `report-uri` bodies (`application/csp-report`) and
 * Reporting API batches (`application/reports+json`), and writes one entry
 * per violation to the store.
 *
 * @example
 * ```typescript
 * // app/_/csp-reports/route.ts
 * import { withCSPReports, createConsoleStore } from 'csp-compose/report'
 *
 * export const POST = withCSPReports({ store: createConsoleStore() })
 * ```
 */
export function withCSPReports(options: CSPReportOptions): RouteHandler {
  const {
    store,
    level = 'warn',
    maxBodySize = DEFAULT_MAX_BODY_SIZE,
    trustProxy = true,
    onViolation,
  } = options

  return async (req: NextRequest): Promise<Response> => {
    try {
      if (req.method !== 'POST') {
        throw new ReportError('Method not allowed', { statusCode: 405, code: 'METHOD_NOT_ALLOWED' })
      }

      const format = detectReportFormat(req.headers.get('content-type') ?? '')
      if (!format) {
        throw new ReportError('Unsupported report content type', {
          statusCode: 415,
          code: 'UNSUPPORTED_MEDIA_TYPE',
        })
      }

      const violations = parseViolationReports(format, await readJson(req, maxBodySize))

      const source = {
        ip: getClientIp(req, { trustProxy }),
        userAgent: req.headers.get('user-agent') ?? undefined,
      }

      for (const violation of violations) {
        const entry = createViolationEntry(violation, { format, level, source })
        await store.write(entry)
        if (onViolation) await onViolation(entry)
      }

      return new Response(null, { status: 204 })
    } catch (error) {
      if (isCSPError(error)) {
        return error.toResponse(error.statusCode === 405 ? { Allow: 'POST' } : undefined)
      }
      throw error
    }
  }
}
