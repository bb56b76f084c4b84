import type { Policy, SourceOptions } from './types'

export type PolicyPreset = 'react' | 'strict' | 'api'

/**
 * Preset: policy generally agreeable for React applications.
 *
 * `default-src` is `'none'`: even `'self'` opens the door for many element
 * types. Reports go to `/_/csp-reports` on the same origin.
 */
export function reactPolicy(): Policy {
  return {
    directives: {
      // Fetch directives
      defaultSrc: { allow: false },
      // Assumes a build without inlined runtime chunks
      scriptSrc: { allow: true, allowSelf: true },
      styleSrcAttr: { allow: true, allowSelf: true, unsafeInline: true },

      // Document directives
      baseUri: { allow: false },

      // Navigation directives
      formAction: { allow: true, allowSelf: true },

      // Reporting directives
      reportTo: { value: 'default' },
    },
    reportToPayload: '{"group":"default","max_age": 86400, "endpoints": [{"url":"/_/csp-reports" }]}',
  }
}

/**
 * Preset: same-origin only, no plugins, no framing
 */
export function strictPolicy(): Policy {
  const self = (): SourceOptions => ({ allow: true, allowSelf: true })

  return {
    directives: {
      defaultSrc: self(),
      connectSrc: self(),
      fontSrc: self(),
      imgSrc: { ...self(), values: ['data:'] },
      manifestSrc: self(),
      mediaSrc: self(),
      objectSrc: { allow: false },
      scriptSrc: self(),
      styleSrc: self(),
      workerSrc: self(),
      childSrc: self(),
      frameSrc: self(),
      prefetchSrc: self(),
      scriptSrcElem: self(),
      scriptSrcAttr: self(),
      styleSrcElem: self(),
      styleSrcAttr: self(),
      baseUri: self(),
      formAction: self(),
      frameAncestors: { allow: false },
      upgradeInsecureRequests: true,
    },
  }
}

/**
 * Preset: JSON APIs that never render documents
 */
export function apiPolicy(): Policy {
  return {
    directives: {
      defaultSrc: { allow: false },
      frameAncestors: { allow: false },
    },
  }
}

/**
 * Get a fresh preset policy by name
 */
export function getPreset(name: PolicyPreset): Policy {
  switch (name) {
    case 'react':
      return reactPolicy()
    case 'strict':
      return strictPolicy()
    case 'api':
      return apiPolicy()
    default:
      return strictPolicy()
  }
}
