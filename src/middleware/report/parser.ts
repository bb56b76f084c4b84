import { z } from 'zod'
import { ReportError } from '../../core/errors'
import type { CSPViolation, ReportFormat } from './types'

const disposition = z.enum(['enforce', 'report']).optional()

/**
 * Legacy body sent to `report-uri`
 */
const legacyReportSchema = z.object({
  'csp-report': z
    .object({
      'document-uri': z.string(),
      referrer: z.string().optional(),
      'blocked-uri': z.string().optional(),
      'effective-directive': z.string().optional(),
      'violated-directive': z.string().optional(),
      'original-policy': z.string(),
      disposition,
      'source-file': z.string().optional(),
      'line-number': z.number().int().optional(),
      'column-number': z.number().int().optional(),
      'status-code': z.number().int().optional(),
      'script-sample': z.string().optional(),
    })
    .refine((report) => Boolean(report['effective-directive'] ?? report['violated-directive']), {
      message: 'effective-directive or violated-directive is required',
    }),
})

const violationBodySchema = z.object({
  documentURL: z.string(),
  referrer: z.string().optional(),
  blockedURL: z.string().optional(),
  effectiveDirective: z.string(),
  originalPolicy: z.string(),
  disposition,
  sourceFile: z.string().optional(),
  lineNumber: z.number().int().optional(),
  columnNumber: z.number().int().optional(),
  statusCode: z.number().int().optional(),
  sample: z.string().optional(),
})

/**
 * Reporting API batch sent to a `report-to` group endpoint
 */
const reportingBatchSchema = z.array(
  z.object({
    type: z.string(),
    url: z.string().optional(),
    body: z.unknown(),
  })
)

function invalid(error: z.ZodError): ReportError {
  return new ReportError('Invalid CSP violation report', {
    details: {
      errors: error.issues.map((issue) => ({
        field: issue.path.join('.') || '_root',
        message: issue.message,
      })),
    },
  })
}

function parseLegacy(body: unknown): CSPViolation[] {
  const result = legacyReportSchema.safeParse(body)
  if (!result.success) throw invalid(result.error)

  const report = result.data['csp-report']
  return [
    {
      documentUri: report['document-uri'],
      referrer: report.referrer,
      blockedUri: report['blocked-uri'],
      effectiveDirective: report['effective-directive'] ?? report['violated-directive'] ?? '',
      originalPolicy: report['original-policy'],
      disposition: report.disposition ?? 'enforce',
      sourceFile: report['source-file'],
      lineNumber: report['line-number'],
      columnNumber: report['column-number'],
      statusCode: report['status-code'],
      sample: report['script-sample'],
    },
  ]
}

function parseReportingBatch(body: unknown): CSPViolation[] {
  const batch = reportingBatchSchema.safeParse(body)
  if (!batch.success) throw invalid(batch.error)

  const violations: CSPViolation[] = []

  // Endpoints can be shared with other report types; only CSP violations are kept
  for (const report of batch.data) {
    if (report.type !== 'csp-violation') continue

    const result = violationBodySchema.safeParse(report.body)
    if (!result.success) throw invalid(result.error)

    const violation = result.data
    violations.push({
      documentUri: violation.documentURL,
      referrer: violation.referrer,
      blockedUri: violation.blockedURL,
      effectiveDirective: violation.effectiveDirective,
      originalPolicy: violation.originalPolicy,
      disposition: violation.disposition ?? 'enforce',
      sourceFile: violation.sourceFile,
      lineNumber: violation.lineNumber,
      columnNumber: violation.columnNumber,
      statusCode: violation.statusCode,
      sample: violation.sample,
    })
  }

  return violations
}

/**
 * Detect the report format from the Content-Type header
 */
export function detectReportFormat(contentType: string): ReportFormat | null {
  const mime = contentType.split(';')[0].trim().toLowerCase()

  switch (mime) {
    case 'application/csp-report':
      return 'csp-report'
    case 'application/reports+json':
      return 'reports+json'
    default:
      return null
  }
}

/**
 * Parse a decoded report body into normalised violations
 *
 * @throws ReportError (400) when the body does not match the format
 */
export function parseViolationReports(format: ReportFormat, body: unknown): CSPViolation[] {
  return format === 'csp-report' ? parseLegacy(body) : parseReportingBatch(body)
}
