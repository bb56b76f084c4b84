import { describe, it, expect } from 'vitest'
import { validateReportTo } from '../../src/policy/validator'
import { AssemblyError } from '../../src/core/errors'
import type { Policy } from '../../src/policy/types'

function reasonOf(policy: Policy): string | null {
  try {
    validateReportTo(policy)
    return null
  } catch (error) {
    if (error instanceof AssemblyError) return error.reason
    throw error
  }
}

describe('validateReportTo', () => {
  it('passes when no group is set', () => {
    expect(reasonOf({ directives: {} })).toBeNull()
    expect(reasonOf({ directives: { reportTo: { value: '' } }, reportToPayload: '' })).toBeNull()
  })

  it('passes when the payload names the group', () => {
    expect(reasonOf({
      directives: { reportTo: { value: 'default' } },
      reportToPayload: '{"group":"default","max_age":86400,"endpoints":[{"url":"/csp"}]}',
    })).toBeNull()
  })

  it('requires a payload when a group is set', () => {
    expect(reasonOf({ directives: { reportTo: { value: 'default' } } })).toBe('REPORT_TO_MISSING')
  })

  it('requires the payload to mention the group', () => {
    expect(reasonOf({
      directives: { reportTo: { value: 'default' } },
      reportToPayload: '{"group":"other","max_age":86400,"endpoints":[{"url":"/csp"}]}',
    })).toBe('REPORT_TO_MISMATCH')
  })

  it('matches the payload as plain text', () => {
    expect(reasonOf({
      directives: { reportTo: { value: 'csp' } },
      reportToPayload: '{"group":"other","endpoints":[{"url":"/csp"}]}',
    })).toBeNull()
  })
})
