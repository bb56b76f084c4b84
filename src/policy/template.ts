/**
 * Directive templates.
 *
 * A template lists the tokens a directive value is made of. Tokens are
 * joined with a single space, so output never carries leading, trailing or
 * doubled whitespace.
 *
 * | Slot                 | Emits                                              |
 * |----------------------|----------------------------------------------------|
 * | `word`               | `word`, always                                     |
 * | `{field}`            | a non-blank string field, or each non-blank item   |
 * | `{field ? text}`     | `text` when the boolean field is true              |
 * | `{!field ? text}`    | `text` when the boolean field is false             |
 * | `{!field => text}`   | exactly `text` for the whole directive when false  |
 *
 * @example
 * ```typescript
 * const template = compileTemplate('frame-ancestors', "{!allow => 'none'} {allowSelf ? 'self'} {hostSources}")
 * template.render({ allow: true, allowSelf: true, hostSources: ['https://a.example'] })
 * // "'self' https://a.example"
 * ```
 */

import { AssemblyError, RenderError } from '../core/errors'
import { SANDBOX_TOKENS } from './directives'
import type { TemplateKind, TemplateValues } from './types'

type FieldType = 'boolean' | 'string' | 'list'

type Segment =
  | { type: 'literal'; tokens: string[] }
  | { type: 'value'; field: string; fieldType: 'string' | 'list' }
  | { type: 'conditional'; field: string; negate: boolean; tokens: string[] }
  | { type: 'exclusive'; field: string; negate: boolean; text: string }

export interface CompiledTemplate<K extends TemplateKind = TemplateKind> {
  readonly kind: K
  readonly source: string
  render(value: TemplateValues[K]): string
}

const SOURCE_OPTION_FIELDS: Record<string, FieldType> = {
  allow: 'boolean',
  allowSelf: 'boolean',
  values: 'list',
  unsafeEval: 'boolean',
  wasmUnsafeEval: 'boolean',
  unsafeHashes: 'boolean',
  unsafeInline: 'boolean',
  nonceValue: 'string',
  hashValue: 'string',
  strictDynamic: 'boolean',
  reportSample: 'boolean',
}

/**
 * Fields each template kind may reference
 */
const TEMPLATE_FIELDS: Readonly<Record<TemplateKind, ReadonlyMap<string, FieldType>>> = {
  'source-option': new Map(Object.entries(SOURCE_OPTION_FIELDS)),
  sandbox: new Map(SANDBOX_TOKENS.map(([field]): [string, FieldType] => [field, 'boolean'])),
  'frame-ancestors': new Map<string, FieldType>([
    ['allow', 'boolean'],
    ['allowSelf', 'boolean'],
    ['hostSources', 'list'],
    ['schemeSources', 'list'],
  ]),
  'unquoted-multi': new Map<string, FieldType>([['values', 'list']]),
  'unquoted-single': new Map<string, FieldType>([['value', 'string']]),
}

/**
 * Built-in templates. Note the single quotes around keywords.
 */
export const DEFAULT_TEMPLATES: Readonly<Record<TemplateKind, string>> = Object.freeze({
  'source-option': [
    "{!allow => 'none'}",
    "{allowSelf ? 'self'}",
    '{values}',
    "{unsafeEval ? 'unsafe-eval'}",
    "{wasmUnsafeEval ? 'wasm-unsafe-eval'}",
    "{unsafeHashes ? 'unsafe-hashes'}",
    "{unsafeInline ? 'unsafe-inline'}",
    '{nonceValue}',
    '{hashValue}',
    "{strictDynamic ? 'strict-dynamic'}",
    "{reportSample ? 'report-sample'}",
  ].join(' '),
  sandbox: SANDBOX_TOKENS.map(([field, token]) => `{${field} ? ${token}}`).join(' '),
  'frame-ancestors': "{!allow => 'none'} {allowSelf ? 'self'} {hostSources} {schemeSources}",
  'unquoted-multi': '{values}',
  'unquoted-single': '{value}',
})

const SLOT_PATTERN = /^(!?)\s*([A-Za-z][A-Za-z0-9]*)\s*(?:(\?|=>)([\s\S]*))?$/

function invalid(kind: TemplateKind, message: string, position: number): AssemblyError {
  return new AssemblyError('TEMPLATE_INVALID', `Invalid ${kind} template: ${message}`, {
    details: { kind, position },
  })
}

function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0)
}

function parseSlot(kind: TemplateKind, inner: string, position: number): Segment {
  const match = SLOT_PATTERN.exec(inner.trim())
  if (!match) {
    throw invalid(kind, `malformed slot "{${inner}}"`, position)
  }

  const [, bang, field, operator, rest] = match
  const fieldType = TEMPLATE_FIELDS[kind].get(field)
  if (!fieldType) {
    throw invalid(kind, `unknown field "${field}"`, position)
  }

  const negate = bang === '!'

  if (operator === undefined) {
    if (negate) {
      throw invalid(kind, `negated slot "{${inner}}" needs "?" or "=>"`, position)
    }
    if (fieldType === 'boolean') {
      throw invalid(kind, `boolean field "${field}" needs "?" or "=>"`, position)
    }
    return { type: 'value', field, fieldType }
  }

  if (fieldType !== 'boolean') {
    throw invalid(kind, `field "${field}" is not a boolean`, position)
  }

  const text = (rest ?? '').trim()
  if (text.length === 0) {
    throw invalid(kind, `slot "{${inner}}" has no text`, position)
  }

  return operator === '=>'
    ? { type: 'exclusive', field, negate, text }
    : { type: 'conditional', field, negate, tokens: splitTokens(text) }
}

function parseTemplate(kind: TemplateKind, source: string): Segment[] {
  const segments: Segment[] = []
  let cursor = 0

  const pushLiteral = (chunk: string) => {
    const tokens = splitTokens(chunk)
    if (tokens.length > 0) segments.push({ type: 'literal', tokens })
  }

  while (cursor < source.length) {
    const open = source.indexOf('{', cursor)
    const close = source.indexOf('}', cursor)

    if (close !== -1 && (open === -1 || close < open)) {
      throw invalid(kind, "unexpected '}'", close)
    }

    if (open === -1) {
      pushLiteral(source.slice(cursor))
      break
    }

    pushLiteral(source.slice(cursor, open))

    if (close === -1) {
      throw invalid(kind, "unclosed '{'", open)
    }

    const inner = source.slice(open + 1, close)
    if (inner.includes('{')) {
      throw invalid(kind, "nested '{'", open + 1 + inner.indexOf('{'))
    }
    if (inner.trim().length === 0) {
      throw invalid(kind, 'empty slot', open)
    }

    segments.push(parseSlot(kind, inner, open))
    cursor = close + 1
  }

  return segments
}

class FieldReader {
  private readonly fields: ReadonlyMap<string, unknown>

  constructor(
    private readonly kind: TemplateKind,
    value: object
  ) {
    this.fields = new Map<string, unknown>(Object.entries(value))
  }

  boolean(field: string): boolean {
    const raw = this.fields.get(field)
    if (raw === undefined) return false
    if (typeof raw !== 'boolean') throw this.mismatch(field, 'a boolean', raw)
    return raw
  }

  string(field: string): string {
    const raw = this.fields.get(field)
    if (raw === undefined) return ''
    if (typeof raw !== 'string') throw this.mismatch(field, 'a string', raw)
    return raw.trim()
  }

  list(field: string): string[] {
    const raw = this.fields.get(field)
    if (raw === undefined) return []
    if (!Array.isArray(raw)) throw this.mismatch(field, 'an array of strings', raw)

    const items: unknown[] = raw
    const result: string[] = []
    for (const item of items) {
      if (typeof item !== 'string') throw this.mismatch(field, 'an array of strings', raw)
      const token = item.trim()
      if (token.length > 0) result.push(token)
    }
    return result
  }

  private mismatch(field: string, expected: string, raw: unknown): RenderError {
    return new RenderError(`Field "${field}" of ${this.kind} options must be ${expected}`, {
      details: { kind: this.kind, field, received: Array.isArray(raw) ? 'array' : typeof raw },
    })
  }
}

/**
 * Compile template text for one option kind
 *
 * @throws AssemblyError with reason `TEMPLATE_INVALID`
 */
export function compileTemplate<K extends TemplateKind>(kind: K, source: string): CompiledTemplate<K> {
  const segments = parseTemplate(kind, source)

  return {
    kind,
    source,
    render(value: TemplateValues[K]): string {
      const reader = new FieldReader(kind, value)
      const tokens: string[] = []

      for (const segment of segments) {
        switch (segment.type) {
          case 'literal':
            tokens.push(...segment.tokens)
            break
          case 'value':
            if (segment.fieldType === 'list') {
              tokens.push(...reader.list(segment.field))
            } else {
              const text = reader.string(segment.field)
              if (text) tokens.push(text)
            }
            break
          case 'conditional':
            if (reader.boolean(segment.field) !== segment.negate) {
              tokens.push(...segment.tokens)
            }
            break
          case 'exclusive':
            if (reader.boolean(segment.field) !== segment.negate) {
              return segment.text
            }
            break
        }
      }

      return tokens.join(' ')
    },
  }
}
