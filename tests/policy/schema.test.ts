import { describe, it, expect } from 'vitest'
import { parsePolicy } from '../../src/policy/schema'
import { loadPolicy } from '../../src/policy/assembler'
import { ConfigurationError } from '../../src/core/errors'

function configurationErrors(input: unknown): unknown[] {
  try {
    parsePolicy(input)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const errors = error.details?.errors
      return Array.isArray(errors) ? errors : []
    }
    throw error
  }
  return []
}

describe('parsePolicy', () => {
  it('accepts a JSON policy', () => {
    const input = JSON.parse(`{
      "directives": {
        "defaultSrc": { "allow": false },
        "scriptSrc": { "allow": true, "allowSelf": true, "values": ["https://cdn.example"] },
        "sandbox": { "allowForms": true },
        "frameAncestors": { "allow": true, "hostSources": ["https://parent.example"] },
        "reportUri": { "values": ["/csp"] },
        "reportTo": { "value": "default" },
        "upgradeInsecureRequests": true
      },
      "reportToPayload": "{\\"group\\":\\"default\\"}",
      "templates": { "unquoted-single": "{value}" }
    }`)

    const policy = parsePolicy(input)

    expect(policy).toEqual(input)
    expect(loadPolicy(policy)['Content-Security-Policy']).toBe(
      "default-src 'none'; script-src 'self' https://cdn.example; base-uri 'none'; sandbox allow-forms; " +
      "form-action 'none'; frame-ancestors https://parent.example; report-uri /csp; report-to default; " +
      'upgrade-insecure-requests;'
    )
  })

  it('reports wrongly typed fields with their path', () => {
    expect(configurationErrors({ directives: { scriptSrc: { allow: 'yes' } } })).toContainEqual(
      expect.objectContaining({ field: 'directives.scriptSrc.allow', code: 'invalid_type' })
    )
  })

  it('rejects unknown directives', () => {
    expect(configurationErrors({ directives: { scriptSrcs: {} } })).toContainEqual(
      expect.objectContaining({ field: 'directives', code: 'unrecognized_keys' })
    )
  })

  it('requires directives', () => {
    expect(configurationErrors({})).toContainEqual(
      expect.objectContaining({ field: 'directives', code: 'invalid_type' })
    )
  })

  it('rejects non-objects', () => {
    expect(() => parsePolicy('default-src none')).toThrow(ConfigurationError)
    expect(configurationErrors('default-src none')).toContainEqual(
      expect.objectContaining({ field: '_root' })
    )
  })
})
