/**
 * Path resolution against the source document.
 *
 * A path crosses mappings by key. When it meets a sequence with segments left,
 * the rest of the path is applied to every element and the matches are
 * concatenated in document order ("fan-out"). A scalar met with segments left
 * resolves to itself.
 */

import { PathError, TemplateSyntaxError } from '../errors'
import type { JsonValue } from '../value'
import { getField, isMapping } from '../value'
import type { PathExpression, ResolvedSet } from './types'

/**
 * Parse a path expression.
 *
 * @example
 * ```ts
 * parsePath('/order/po_number').segments // => ['order', 'po_number']
 * parsePath('/').segments // => []
 * ```
 */
export function parsePath(text: string): PathExpression {
  if (!text.startsWith('/')) {
    throw new TemplateSyntaxError(`Path expression "${text}" must start with "/"`)
  }
  const segments = text === '/' ? [] : text.slice(1).split('/')
  return { source: text, segments }
}

export type ResolveOptions = {
  onMissingField?: 'error' | 'null'
}

/**
 * Resolve a path against the source.
 *
 * Returns `scalar` when no sequence was crossed, `flat` otherwise. A sequence
 * reached with no segments left is returned whole (as `scalar`) or, inside a
 * fan-out, concatenated with its siblings.
 *
 * @example
 * ```ts
 * const source = { a: [{ b: [1, 2] }, { b: [3] }] }
 * resolvePath(source, parsePath('/a/b'))
 * // => { kind: 'flat', values: [1, 2, 3] }
 * ```
 * @throws PathError when a mapping lacks a field outside a fan-out and
 * `onMissingField` is 'error'
 */
export function resolvePath(
  source: JsonValue,
  path: PathExpression,
  options?: ResolveOptions
): ResolvedSet {
  let frontier: JsonValue[] = [source]
  let fannedOut = false

  for (const segment of path.segments) {
    const next: JsonValue[] = []

    for (const node of frontier) {
      // Work stack keeps nested sequences in document order without recursing
      const stack: JsonValue[] = [node]
      while (stack.length > 0) {
        const current = stack.pop()
        if (current === undefined) break

        if (Array.isArray(current)) {
          fannedOut = true
          for (let i = current.length - 1; i >= 0; i--) {
            stack.push(current[i])
          }
          continue
        }

        if (!isMapping(current)) {
          next.push(current)
          continue
        }

        const field = getField(current, segment)
        if (field !== undefined) {
          next.push(field)
          continue
        }

        // Absent inside a fan-out contributes nothing
        if (fannedOut) continue
        if (options?.onMissingField === 'null') {
          return { kind: 'scalar', value: null }
        }
        throw new PathError(path.source, segment)
      }
    }

    frontier = next
  }

  if (!fannedOut) {
    return { kind: 'scalar', value: frontier[0] ?? null }
  }
  return { kind: 'flat', values: frontier.flatMap(node => (Array.isArray(node) ? node : [node])) }
}

/**
 * Turn a resolution into an output value; `flat` becomes an array.
 */
export function resolvedToValue(resolved: ResolvedSet): JsonValue {
  return resolved.kind === 'scalar' ? resolved.value : resolved.values
}
