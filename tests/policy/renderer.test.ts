import { describe, it, expect } from 'vitest'
import { createDirectiveRenderer, renderDirective, resolveTemplates } from '../../src/policy/renderer'
import { DEFAULT_TEMPLATES } from '../../src/policy/template'
import { AssemblyError, RenderError } from '../../src/core/errors'
import type { FrameAncestorOptions } from '../../src/policy/types'

describe('resolveTemplates', () => {
  it('falls back to the defaults', () => {
    expect(resolveTemplates()).toEqual(DEFAULT_TEMPLATES)
  })

  it('keeps caller text and ignores empty overrides', () => {
    const templates = resolveTemplates({ sandbox: '{allowForms ? allow-forms}', 'unquoted-single': '' })

    expect(templates.sandbox).toBe('{allowForms ? allow-forms}')
    expect(templates['unquoted-single']).toBe(DEFAULT_TEMPLATES['unquoted-single'])
  })
})

describe('createDirectiveRenderer', () => {
  it('dispatches on the option kind', () => {
    const renderer = createDirectiveRenderer()

    expect(renderer.render('source-option', { allow: true, allowSelf: true, unsafeInline: true }))
      .toBe("'self' 'unsafe-inline'")
    expect(renderer.render('sandbox', { allowForms: true, allowScripts: true }))
      .toBe('allow-forms allow-scripts')
    expect(renderer.render('frame-ancestors', { allow: false }))
      .toBe("'none'")
    expect(renderer.render('unquoted-multi', { values: ['/csp'] }))
      .toBe('/csp')
    expect(renderer.render('unquoted-single', { value: 'default' }))
      .toBe('default')
  })

  it('skips blank values', () => {
    const renderer = createDirectiveRenderer()

    expect(renderer.render('source-option', { allow: true, allowSelf: true, values: [' '], nonceValue: ' ' }))
      .toBe("'self'")
    expect(renderer.render('unquoted-single', { value: ' ' })).toBe('')
    expect(renderer.render('unquoted-multi', { values: ['', '  ', '/csp'] })).toBe('/csp')
    expect(renderer.render('frame-ancestors', { allow: true, hostSources: [' https://a.example '] }))
      .toBe('https://a.example')
  })

  it('is deterministic', () => {
    const renderer = createDirectiveRenderer()
    const options = { allow: true, allowSelf: true, values: ['https://a.example'] }

    expect(renderer.render('source-option', options)).toBe(renderer.render('source-option', options))
  })

  it('uses caller templates', () => {
    const renderer = createDirectiveRenderer({ 'unquoted-single': 'group-{value}' })

    // literal words are whole tokens
    expect(renderer.render('unquoted-single', { value: 'default' })).toBe('group- default')
    expect(renderer.templates['unquoted-single']).toBe('group-{value}')
  })

  it('fails with TEMPLATE_INVALID on a broken template', () => {
    expect(() => createDirectiveRenderer({ 'frame-ancestors': '{values}' })).toThrow(AssemblyError)
    expect(() => createDirectiveRenderer({ 'frame-ancestors': '{values}' }))
      .toThrow('Invalid frame-ancestors template: unknown field "values"')
  })
})

describe('renderDirective', () => {
  it('attaches the directive name to render errors', () => {
    const renderer = createDirectiveRenderer()
    const options: FrameAncestorOptions = JSON.parse('{"allow":true,"hostSources":"https://a.example"}')

    let caught: unknown
    try {
      renderDirective(renderer, 'frame-ancestors', 'frame-ancestors', options)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(RenderError)
    if (!(caught instanceof RenderError)) return

    expect(caught.directive).toBe('frame-ancestors')
    expect(caught.code).toBe('RENDER_ERROR')
    expect(caught.message).toBe(
      'Cannot render frame-ancestors: Field "hostSources" of frame-ancestors options must be an array of strings'
    )
    expect(caught.cause).toBeInstanceOf(RenderError)
  })
})
