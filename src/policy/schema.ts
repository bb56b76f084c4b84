import { z } from 'zod'
import { ConfigurationError } from '../core/errors'
import type { Policy } from './types'

const flag = z.boolean().optional()
const sources = z.array(z.string()).optional()

export const sourceOptionsSchema = z
  .object({
    allow: flag,
    allowSelf: flag,
    values: sources,
    unsafeEval: flag,
    wasmUnsafeEval: flag,
    unsafeHashes: flag,
    unsafeInline: flag,
    nonceValue: z.string().optional(),
    hashValue: z.string().optional(),
    strictDynamic: flag,
    reportSample: flag,
  })
  .strict()

export const sandboxOptionsSchema = z
  .object({
    allowDownloads: flag,
    allowForms: flag,
    allowModals: flag,
    allowOrientationLock: flag,
    allowPointerLock: flag,
    allowPopups: flag,
    allowPopupsToEscapeSandbox: flag,
    allowPresentation: flag,
    allowSameOrigin: flag,
    allowScripts: flag,
    allowTopNavigation: flag,
    allowTopNavigationByUserActivation: flag,
    allowTopNavigationToCustomProtocols: flag,
  })
  .strict()

export const frameAncestorOptionsSchema = z
  .object({
    allow: flag,
    allowSelf: flag,
    hostSources: sources,
    schemeSources: sources,
  })
  .strict()

const source = sourceOptionsSchema.optional()

export const contentSecurityPolicySchema = z
  .object({
    defaultSrc: source,
    childSrc: source,
    connectSrc: source,
    fontSrc: source,
    frameSrc: source,
    imgSrc: source,
    manifestSrc: source,
    mediaSrc: source,
    objectSrc: source,
    prefetchSrc: source,
    scriptSrc: source,
    scriptSrcElem: source,
    scriptSrcAttr: source,
    styleSrc: source,
    styleSrcElem: source,
    styleSrcAttr: source,
    workerSrc: source,
    baseUri: source,
    sandbox: sandboxOptionsSchema.optional(),
    formAction: source,
    frameAncestors: frameAncestorOptionsSchema.optional(),
    reportUri: z.object({ values: sources }).strict().optional(),
    reportTo: z.object({ value: z.string().optional() }).strict().optional(),
    upgradeInsecureRequests: flag,
  })
  .strict()

export const policySchema = z
  .object({
    directives: contentSecurityPolicySchema,
    reportToPayload: z.string().optional(),
    templates: z
      .object({
        'source-option': z.string().optional(),
        sandbox: z.string().optional(),
        'frame-ancestors': z.string().optional(),
        'unquoted-multi': z.string().optional(),
        'unquoted-single': z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

/**
 * Validate an untyped configuration (parsed JSON, environment) into a Policy
 *
 * @throws ConfigurationError listing every offending field
 *
 * @example
 * ```typescript
 * const policy = parsePolicy(JSON.parse(process.env.CSP_POLICY ?? '{}'))
 * ```
 */
export function parsePolicy(input: unknown): Policy {
  const result = policySchema.safeParse(input)

  if (result.success) {
    return result.data
  }

  const errors = result.error.issues.map((issue) => ({
    field: issue.path.join('.') || '_root',
    code: issue.code,
    message: issue.message,
  }))

  throw new ConfigurationError('Invalid CSP policy configuration', {
    details: { errors },
    cause: result.error,
  })
}
