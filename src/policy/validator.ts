import { AssemblyError } from '../core/errors'
import type { Policy } from './types'

/**
 * Check the `report-to` directive against the `Report-To` header payload.
 *
 * The payload is matched as text, not parsed: the group name only has to
 * appear somewhere in it.
 *
 * @throws AssemblyError `REPORT_TO_MISSING` when a group is set without a payload
 * @throws AssemblyError `REPORT_TO_MISMATCH` when the payload does not mention the group
 */
export function validateReportTo(policy: Policy): void {
  const group = (policy.directives.reportTo?.value ?? '').trim()
  if (!group) return

  const payload = (policy.reportToPayload ?? '').trim()
  if (!payload) {
    throw new AssemblyError(
      'REPORT_TO_MISSING',
      'A Report-To payload is required when the report-to directive is set',
      { details: { group } }
    )
  }

  if (!payload.includes(group)) {
    throw new AssemblyError(
      'REPORT_TO_MISMATCH',
      `Report-To payload does not reference group "${group}"`,
      { details: { group } }
    )
  }
}
