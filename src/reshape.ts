/**
 * Public entry points: transform, safeTransform, transformMany, transformJson.
 */

import { DocumentError, formatZodIssues, isTransformError, TransformError } from './errors'
import type { TransformOptions } from './options'
import { MAX_DOCUMENT_DEPTH, resolveOptions } from './options'
import type { TransformResult } from './results'
import { failure, success } from './results'
import { render } from './transform/walk'
import type { JsonValue } from './value'
import { jsonValueSchema, nestingDepth } from './value'

/**
 * Reshape `source` into the structure declared by `template`.
 *
 * Leaves of the template are `/path` expressions (resolved against the
 * source), `'literal'` strings, or any other value (copied). `[name]` keys turn
 * an object into an array with one copy per element of its `...name` entries.
 *
 * @example
 * ```ts
 * const source = { retailer: { id: '12342' }, ids: ['a', 'b'] }
 * transform(source, { '[order]': { '...item_id': '/ids', account_id: '/retailer/id' } })
 * // => { order: [{ item_id: 'a', account_id: '12342' }, { item_id: 'b', account_id: '12342' }] }
 * ```
 * @throws TransformError on any unresolvable path or malformed template
 */
export function transform(source: JsonValue, template: JsonValue, options?: TransformOptions): JsonValue {
  return render(source, template, options)
}

/**
 * Like transform(), but reports failure as a value instead of throwing.
 *
 * @example
 * ```ts
 * const result = safeTransform(source, template)
 * if (!result.success) console.error(result.error.kind, result.error.location)
 * ```
 */
export function safeTransform(
  source: JsonValue,
  template: JsonValue,
  options?: TransformOptions
): TransformResult<JsonValue> {
  try {
    return success(render(source, template, options))
  } catch (error) {
    if (isTransformError(error)) return failure(error)
    throw error
  }
}

/**
 * Render several templates against one source. Stops at the first failing
 * template; the error's template path starts with that template's index.
 */
export function transformMany(
  source: JsonValue,
  templates: readonly JsonValue[],
  options?: TransformOptions
): JsonValue[] {
  resolveOptions(options)
  return templates.map((template, index) => {
    try {
      return render(source, template, options)
    } catch (error) {
      if (error instanceof TransformError) {
        throw error.withTemplatePath([String(index), ...(error.templatePath ?? [])])
      }
      throw error
    }
  })
}

/**
 * Text-in, text-out variant: parses both documents, transforms, and
 * serialises the result with `options.indent` spaces (default 2).
 *
 * @throws DocumentError when either text is not a JSON document or nests
 * deeper than `MAX_DOCUMENT_DEPTH`
 */
export function transformJson(sourceText: string, templateText: string, options?: TransformOptions): string {
  const { indent } = resolveOptions(options)
  const source = parseDocument(sourceText, 'source')
  const template = parseDocument(templateText, 'template')
  return JSON.stringify(render(source, template, options), null, indent)
}

function parseDocument(text: string, document: 'source' | 'template'): JsonValue {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new DocumentError(document, [{ path: '', code: 'invalid_json', message }], { cause: error })
  }
  if (nestingDepth(parsed) > MAX_DOCUMENT_DEPTH) {
    throw new DocumentError(document, [
      {
        path: '',
        code: 'too_deep',
        message: `Nesting exceeds the maximum depth of ${MAX_DOCUMENT_DEPTH}`
      }
    ])
  }
  const result = jsonValueSchema.safeParse(parsed)
  if (!result.success) {
    throw new DocumentError(document, formatZodIssues(result.error))
  }
  return result.data
}
