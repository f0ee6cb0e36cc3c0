import mustache from 'mustache'
import { get, has } from 'lodash'
import { formatPath, type PathSegment } from './paths'
import type { TemplateScope, ValuesDocument } from './types'
import { isValuesDocument } from './values'

const TEMPLATE_MARKER = '{{'

// Helm writes references as {{ .Release.Name }}; mustache resolves a leading
// dot against the current context, so it is dropped.
function normalizeReferences(template: string): string {
  return template.replace(/\{\{(\{?)\s*\./g, '{{$1')
}

function unresolvedReferences(template: string, scope: TemplateScope): string[] {
  return mustache
    .parse(template)
    .filter(([type]) => type === 'name' || type === '&')
    .map(([, name]) => name)
    .filter((name) => !has(scope, name) || get(scope, name) === null)
}

/**
 * Renders the `{{ ... }}` references in a single value. Output is not
 * HTML-escaped.
 */
export function substituteTemplate(
  template: string,
  scope: TemplateScope,
  path: string = ''
): string {
  if (!template.includes(TEMPLATE_MARKER)) {
    return template
  }

  const normalized = normalizeReferences(template)
  const location = path ? ` in ${path}` : ''

  let missing: string[]
  try {
    missing = unresolvedReferences(normalized, scope)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid template${location}: ${message}`)
  }

  if (missing.length > 0) {
    throw new Error(
      `Unknown template reference${missing.length === 1 ? '' : 's'} ${missing.map((name) => `'${name}'`).join(', ')}${location}`
    )
  }

  return mustache.render(normalized, scope, {}, { escape: (value) => String(value) })
}

function substituteNode(
  node: unknown,
  scope: TemplateScope,
  path: PathSegment[]
): unknown {
  if (typeof node === 'string') {
    return substituteTemplate(node, scope, formatPath(path))
  }
  if (Array.isArray(node)) {
    return node.map((item, index) => substituteNode(item, scope, [...path, index]))
  }
  if (isValuesDocument(node)) {
    return substituteValues(node, scope, path)
  }
  return node
}

/**
 * Applies {@link substituteTemplate} to every string leaf of a document
 */
export function substituteValues(
  document: ValuesDocument,
  scope: TemplateScope,
  path: PathSegment[] = []
): ValuesDocument {
  const result: ValuesDocument = {}
  for (const [key, value] of Object.entries(document)) {
    result[key] = substituteNode(value, scope, [...path, key])
  }
  return result
}
