/**
 * Generic document value model.
 *
 * Source, template and output documents are all plain JSON values. Traversal
 * sites classify a value with `kindOf()` and switch on the result.
 */

import { z } from 'zod'

export type JsonPrimitive = null | boolean | number | string
export type JsonArray = JsonValue[]
export type JsonObject = { [key: string]: JsonValue }
export type JsonValue = JsonPrimitive | JsonArray | JsonObject

/**
 * A value tagged with its kind, so that a `switch` on `kind` narrows `value`.
 */
export type ClassifiedValue =
  | { kind: 'null'; value: null }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; value: JsonArray }
  | { kind: 'mapping'; value: JsonObject }

export type ValueKind = ClassifiedValue['kind']

export function classify(value: JsonValue): ClassifiedValue {
  if (value === null) return { kind: 'null', value }
  if (Array.isArray(value)) return { kind: 'sequence', value }
  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value }
    case 'number':
      return { kind: 'number', value }
    case 'string':
      return { kind: 'string', value }
    default:
      return { kind: 'mapping', value }
  }
}

/**
 * Classify a value.
 *
 * @example
 * ```ts
 * kindOf([1, 2]) // => 'sequence'
 * kindOf({ a: 1 }) // => 'mapping'
 * ```
 */
export function kindOf(value: JsonValue): ValueKind {
  return classify(value).kind
}

export function isMapping(value: JsonValue): value is JsonObject {
  return kindOf(value) === 'mapping'
}

export function isSequence(value: JsonValue): value is JsonArray {
  return Array.isArray(value)
}

/** Own-property lookup; inherited names like `constructor` never match. */
export function getField(mapping: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(mapping, key) ? mapping[key] : undefined
}

/**
 * Build a mapping from entries. Keys become own data properties, so a
 * `__proto__` key stays an ordinary field.
 */
export function mappingFromEntries(entries: Array<[string, JsonValue]>): JsonObject {
  return Object.fromEntries(entries)
}

/**
 * Deep copy of a JSON value. Iterative, so source nesting is not limited by
 * the call stack.
 */
export function cloneValue(value: JsonValue): JsonValue {
  const root = emptyCopy(value)
  const stack: Array<[JsonValue, JsonValue]> = [[value, root]]

  while (stack.length > 0) {
    const pair = stack.pop()
    if (pair === undefined) break
    const [from, to] = pair

    if (Array.isArray(from) && Array.isArray(to)) {
      for (const item of from) {
        const copy = emptyCopy(item)
        to.push(copy)
        stack.push([item, copy])
      }
    } else if (isMapping(from) && isMapping(to)) {
      for (const [key, item] of Object.entries(from)) {
        const copy = emptyCopy(item)
        // defineProperty keeps `__proto__` an own data key
        Object.defineProperty(to, key, {
          value: copy,
          enumerable: true,
          writable: true,
          configurable: true
        })
        stack.push([item, copy])
      }
    }
  }

  return root
}

function emptyCopy(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return []
  if (isMapping(value)) return {}
  return value
}

/**
 * Number of nested arrays and objects on the deepest branch of `value`
 * (0 for a scalar). Walks with an explicit stack.
 *
 * @example
 * ```ts
 * nestingDepth([{ a: [1] }]) // => 3
 * ```
 */
export function nestingDepth(value: unknown): number {
  let deepest = 0
  const stack: Array<{ node: unknown; depth: number }> = [{ node: value, depth: 0 }]

  while (stack.length > 0) {
    const item = stack.pop()
    if (item === undefined) break
    const { node, depth } = item
    if (typeof node !== 'object' || node === null) continue

    deepest = Math.max(deepest, depth + 1)
    for (const child of Object.values(node)) {
      stack.push({ node: child, depth: depth + 1 })
    }
  }

  return deepest
}

/**
 * Zod schema for an arbitrary JSON value.
 * Rejects `undefined`, functions, class instances and non-finite numbers.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema)
  ])
)

export function isJsonValue(value: unknown): value is JsonValue {
  return jsonValueSchema.safeParse(value).success
}
