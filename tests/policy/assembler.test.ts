import { describe, it, expect } from 'vitest'
import {
  assemblePolicy,
  flattenDirectives,
  loadPolicy,
  renderDynamicDirectives,
} from '../../src/policy/assembler'
import { AssemblyError, RenderError } from '../../src/core/errors'
import type { Policy, SourceOptions } from '../../src/policy/types'

const REPORT_TO_PAYLOAD = '{"group":"default","max_age":86400,"endpoints":[{"url":"/_/csp-reports"}]}'

function directiveNames(csp: string): string[] {
  return csp
    .split(';')
    .map((fragment) => fragment.trim())
    .filter(Boolean)
    .map((fragment) => fragment.split(' ')[0])
}

function assemblyReason(policy: Policy): string {
  try {
    assemblePolicy(policy)
  } catch (error) {
    if (error instanceof AssemblyError) return error.reason
    throw error
  }
  return 'none'
}

describe('assemblePolicy', () => {
  it('assembles a restrictive baseline', () => {
    const { headers } = assemblePolicy({
      directives: {
        defaultSrc: { allow: false },
        scriptSrc: { allow: true, allowSelf: true },
        baseUri: { allow: false },
        formAction: { allow: true, allowSelf: true },
        frameAncestors: { allow: false },
        reportTo: { value: 'default' },
      },
      reportToPayload: REPORT_TO_PAYLOAD,
    })

    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; script-src 'self'; base-uri 'none'; form-action 'self'; " +
      "frame-ancestors 'none'; report-to default;"
    )
    expect(headers['Report-To']).toBe(REPORT_TO_PAYLOAD)
  })

  it('drops fetch directives identical to default-src', () => {
    const self: SourceOptions = { allow: true, allowSelf: true }
    const { headers, staticDirectives } = assemblePolicy({
      directives: { defaultSrc: self, scriptSrc: { ...self } },
    })

    const names = directiveNames(headers['Content-Security-Policy'])
    expect(names).toContain('default-src')
    expect(names).not.toContain('script-src')
    // unset fetch directives render 'none' and differ from 'self'
    expect(names).toContain('script-src-elem')
    expect(staticDirectives.has('script-src')).toBe(false)
  })

  it('always emits default-src', () => {
    const { staticDirectives } = assemblePolicy({ directives: {} })

    expect(staticDirectives.get('default-src')).toBe("'none'")
  })

  it('never compares base-uri and form-action to default-src', () => {
    const { headers } = assemblePolicy({ directives: {} })

    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; base-uri 'none'; form-action 'none'; frame-ancestors 'none';"
    )
  })

  it('partitions nonce and hash directives as dynamic', () => {
    const { staticDirectives, dynamicDirectives, headers } = assemblePolicy({
      directives: {
        defaultSrc: { allow: false },
        scriptSrc: { allow: true, allowSelf: true, nonceValue: "'nonce-abc'" },
        styleSrc: { allow: true, allowSelf: true },
        baseUri: { allow: true, hashValue: "'sha256-xyz'" },
      },
    })

    expect(dynamicDirectives.get('script-src')).toBe("'self' 'nonce-abc'")
    expect(dynamicDirectives.get('base-uri')).toBe("'sha256-xyz'")
    expect(staticDirectives.has('script-src')).toBe(false)
    expect(staticDirectives.has('base-uri')).toBe(false)
    expect(staticDirectives.get('style-src')).toBe("'self'")
    expect(dynamicDirectives.has('style-src')).toBe(false)
    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; script-src 'self' 'nonce-abc'; style-src 'self'; base-uri 'sha256-xyz'; " +
      "form-action 'none'; frame-ancestors 'none';"
    )
  })

  it('keeps default-src static even with a nonce', () => {
    const withNonce: SourceOptions = { allow: true, nonceValue: "'nonce-a'" }
    const { staticDirectives, dynamicDirectives } = assemblePolicy({
      directives: { defaultSrc: withNonce, scriptSrc: { ...withNonce } },
    })

    expect(staticDirectives.get('default-src')).toBe("'nonce-a'")
    expect(dynamicDirectives.has('script-src')).toBe(false)
    expect(staticDirectives.has('script-src')).toBe(false)
  })

  it('renders sandbox, report-uri and upgrade-insecure-requests', () => {
    const { headers } = assemblePolicy({
      directives: {
        defaultSrc: { allow: false },
        sandbox: { allowForms: true, allowScripts: true },
        reportUri: { values: ['/csp', 'https://r.example/csp'] },
        upgradeInsecureRequests: true,
      },
    })

    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; base-uri 'none'; sandbox allow-forms allow-scripts; form-action 'none'; " +
      "frame-ancestors 'none'; report-uri /csp https://r.example/csp; upgrade-insecure-requests;"
    )
  })

  it('omits Report-To without a payload', () => {
    const { headers } = assemblePolicy({ directives: { defaultSrc: { allow: false } } })

    expect(Object.keys(headers)).toEqual(['Content-Security-Policy'])
  })

  it('passes a payload through without a report-to group', () => {
    const { headers } = assemblePolicy({ directives: {}, reportToPayload: REPORT_TO_PAYLOAD })

    expect(headers['Report-To']).toBe(REPORT_TO_PAYLOAD)
  })

  it('fails when the payload names another group', () => {
    expect(assemblyReason({
      directives: { reportTo: { value: 'default' } },
      reportToPayload: '{"group":"other"}',
    })).toBe('REPORT_TO_MISMATCH')
  })

  it('fails when the payload is missing', () => {
    expect(assemblyReason({ directives: { reportTo: { value: 'default' } } })).toBe('REPORT_TO_MISSING')
  })

  it('compiles templates before validating report-to', () => {
    expect(assemblyReason({
      directives: { reportTo: { value: 'default' } },
      templates: { sandbox: '{nope}' },
    })).toBe('TEMPLATE_INVALID')
  })

  it('uses caller templates', () => {
    const { headers } = assemblePolicy({
      directives: {
        defaultSrc: { allow: false },
        scriptSrc: { allow: true, allowSelf: true },
      },
      templates: {
        'source-option': "{!allow => 'none'} {allowSelf ? 'self'} {values} 'report-sample'",
      },
    })

    expect(headers['Content-Security-Policy']).toBe(
      "default-src 'none'; script-src 'self' 'report-sample'; base-uri 'none'; form-action 'none'; " +
      "frame-ancestors 'none';"
    )
  })

  it('names the directive that failed to render', () => {
    const imgSrc: SourceOptions = JSON.parse('{"allow":true,"values":"data:"}')

    expect(() => assemblePolicy({ directives: { imgSrc } })).toThrow(RenderError)
    expect(() => assemblePolicy({ directives: { imgSrc } })).toThrow(/^Cannot render img-src:/)
  })

  it('is idempotent', () => {
    const policy: Policy = {
      directives: {
        defaultSrc: { allow: true, allowSelf: true },
        imgSrc: { allow: true, allowSelf: true, values: ['data:'] },
        scriptSrc: { allow: true, nonceValue: "'nonce-abc'", strictDynamic: true },
      },
    }

    expect(assemblePolicy(policy).headers).toEqual(assemblePolicy(policy).headers)
  })

  it('does not mutate the policy', () => {
    const policy: Policy = {
      directives: {
        defaultSrc: { allow: false },
        scriptSrc: { allow: true, allowSelf: true, nonceValue: "'nonce-abc'" },
      },
      reportToPayload: '',
    }
    const before = JSON.stringify(policy)

    assemblePolicy(policy)

    expect(JSON.stringify(policy)).toBe(before)
  })

  it('freezes the headers', () => {
    const { headers } = assemblePolicy({ directives: {} })

    expect(Object.isFrozen(headers)).toBe(true)
  })
})

describe('loadPolicy', () => {
  it('returns the headers only', () => {
    expect(loadPolicy({ directives: { defaultSrc: { allow: false }, formAction: { allow: true, allowSelf: true } } }))
      .toEqual({
        'Content-Security-Policy': "default-src 'none'; base-uri 'none'; form-action 'self'; frame-ancestors 'none';",
      })
  })
})

describe('flattenDirectives', () => {
  it('merges dynamic entries at their canonical position', () => {
    const staticDirectives = new Map([
      ['default-src', "'none'"],
      ['report-to', ''],
      ['form-action', "'self'"],
    ])
    const dynamicDirectives = new Map([['script-src', "'nonce-x'"]])

    expect(flattenDirectives(staticDirectives, dynamicDirectives))
      .toBe("default-src 'none'; script-src 'nonce-x'; form-action 'self';")
  })

  it('orders unknown directives last', () => {
    const directives = new Map([
      ['require-trusted-types-for', "'script'"],
      ['default-src', "'self'"],
    ])

    expect(flattenDirectives(directives)).toBe("default-src 'self'; require-trusted-types-for 'script';")
  })

  it('returns an empty string when nothing is set', () => {
    expect(flattenDirectives(new Map([['sandbox', '']]))).toBe('')
  })
})

describe('renderDynamicDirectives', () => {
  const policy: Policy = {
    directives: {
      defaultSrc: { allow: false },
      scriptSrc: { allow: true, allowSelf: true, nonceValue: "'nonce-one'" },
      styleSrc: { allow: true, allowSelf: true },
      formAction: { allow: true, hashValue: "'sha256-abc'" },
    },
  }

  it('renders only nonce and hash directives', () => {
    expect([...renderDynamicDirectives(policy)]).toEqual([
      ['script-src', "'self' 'nonce-one'"],
      ['form-action', "'sha256-abc'"],
    ])
  })

  it('rebuilds the header from a static snapshot', () => {
    const assembled = assemblePolicy(policy)
    const next: Policy = {
      ...policy,
      directives: {
        ...policy.directives,
        scriptSrc: { allow: true, allowSelf: true, nonceValue: "'nonce-two'" },
      },
    }

    const dynamic = renderDynamicDirectives(next, assembled.renderer)

    expect(flattenDirectives(assembled.staticDirectives, dynamic)).toBe(
      "default-src 'none'; script-src 'self' 'nonce-two'; style-src 'self'; base-uri 'none'; " +
      "form-action 'sha256-abc'; frame-ancestors 'none';"
    )
    expect(assembled.headers['Content-Security-Policy']).toContain("'nonce-one'")
  })
})
