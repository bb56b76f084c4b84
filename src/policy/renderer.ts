import { RenderError } from '../core/errors'
import { compileTemplate, DEFAULT_TEMPLATES } from './template'
import type { CompiledTemplate } from './template'
import type { PolicyTemplates, TemplateKind, TemplateValues } from './types'

/**
 * Renders option values into directive text, one template per option kind
 */
export interface DirectiveRenderer {
  /**
   * Template text in effect for each kind
   */
  readonly templates: Readonly<Record<TemplateKind, string>>

  render<K extends TemplateKind>(kind: K, value: TemplateValues[K]): string
}

type CompiledTemplates = { readonly [K in TemplateKind]: CompiledTemplate<K> }

/**
 * Resolve template text, falling back to the built-in default per kind
 */
export function resolveTemplates(templates: PolicyTemplates = {}): Record<TemplateKind, string> {
  const pick = (kind: TemplateKind): string => {
    const text = templates[kind]
    return text ? text : DEFAULT_TEMPLATES[kind]
  }

  return {
    'source-option': pick('source-option'),
    sandbox: pick('sandbox'),
    'frame-ancestors': pick('frame-ancestors'),
    'unquoted-multi': pick('unquoted-multi'),
    'unquoted-single': pick('unquoted-single'),
  }
}

/**
 * Compile a renderer from caller templates (or the defaults)
 *
 * @throws AssemblyError with reason `TEMPLATE_INVALID` when any template fails to compile
 *
 * @example
 * ```typescript
 * const renderer = createDirectiveRenderer()
 * renderer.render('source-option', { allow: true, allowSelf: true, unsafeInline: true })
 * // "'self' 'unsafe-inline'"
 * ```
 */
export function createDirectiveRenderer(templates?: PolicyTemplates): DirectiveRenderer {
  const text = resolveTemplates(templates)

  const compiled: CompiledTemplates = {
    'source-option': compileTemplate('source-option', text['source-option']),
    sandbox: compileTemplate('sandbox', text.sandbox),
    'frame-ancestors': compileTemplate('frame-ancestors', text['frame-ancestors']),
    'unquoted-multi': compileTemplate('unquoted-multi', text['unquoted-multi']),
    'unquoted-single': compileTemplate('unquoted-single', text['unquoted-single']),
  }

  return {
    templates: Object.freeze(text),
    render<K extends TemplateKind>(kind: K, value: TemplateValues[K]): string {
      const template: CompiledTemplate<K> = compiled[kind]
      return template.render(value)
    },
  }
}

/**
 * Render one named directive, attaching the directive name to render failures
 */
export function renderDirective<K extends TemplateKind>(
  renderer: DirectiveRenderer,
  directive: string,
  kind: K,
  value: TemplateValues[K]
): string {
  try {
    return renderer.render(kind, value)
  } catch (error) {
    if (error instanceof RenderError && error.directive === undefined) {
      throw new RenderError(`Cannot render ${directive}: ${error.message}`, {
        directive,
        details: error.details,
        cause: error,
      })
    }
    throw error
  }
}
