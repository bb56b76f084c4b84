import type { SourceOptions } from './types'

export type DirectivePartition = 'static' | 'dynamic'

/**
 * A fetch directive is redundant when it renders exactly like `default-src`.
 * Keeps secure baselines from repeating `'none'` across a dozen directives.
 */
export function isRedundant(text: string, defaultSrcText: string): boolean {
  return text === defaultSrcText
}

/**
 * Directives carrying a nonce or hash change on every response
 */
export function isDynamic(options: SourceOptions): boolean {
  return Boolean(options.nonceValue?.trim()) || Boolean(options.hashValue?.trim())
}

export function partitionDirective(options: SourceOptions): DirectivePartition {
  return isDynamic(options) ? 'dynamic' : 'static'
}
