/**
 * Transform engine type definitions.
 */

import type { ResolvedOptions } from '../options'
import type { JsonObject, JsonValue } from '../value'

/**
 * A template key with its decorations stripped.
 */
export type ParsedKey = {
  /** Key as written in the template (e.g. '[order]', '...ids') */
  raw: string
  /** Output key */
  name: string
  /** Key was written `[name]`: the object becomes an array */
  arrayConversion: boolean
  /** Key was written `...name`: contributes a sequence to the enclosing conversion */
  spread: boolean
}

/**
 * A parsed path expression such as `/order/shipments/items/quantity`.
 */
export type PathExpression = {
  /** Path as written */
  readonly source: string
  /** Segments after the leading '/'; empty for the root path '/' */
  readonly segments: readonly string[]
}

/**
 * Classification of a template leaf string.
 */
export type LeafKind =
  | { kind: 'path'; path: PathExpression }
  | { kind: 'literal'; text: string }
  | { kind: 'verbatim' }

/**
 * Result of resolving a path.
 * - 'scalar': no sequence was crossed; `value` is the node itself (possibly an array)
 * - 'flat': at least one sequence was fanned out; `values` holds every match in document order
 */
export type ResolvedSet =
  | { kind: 'scalar'; value: JsonValue }
  | { kind: 'flat'; values: JsonValue[] }

/**
 * A spread entry found under an array conversion.
 */
export type SpreadEntry = {
  /** Mapping that holds the entry */
  owner: JsonObject
  /** Raw key of the entry inside `owner` */
  key: string
  /** Template location of the entry */
  location: readonly string[]
}

/**
 * Per-copy bindings of an array conversion: spread entry -> element for this copy.
 */
export type ZipBinding = {
  readonly elements: WeakMap<JsonObject, Map<string, JsonValue>>
}

/**
 * State threaded through one render pass.
 */
export type RenderContext = {
  readonly source: JsonValue
  readonly options: ResolvedOptions
}

/**
 * Position of the node being rendered.
 */
export type RenderFrame = {
  /** Nesting depth (root is 0) */
  depth: number
  /** Raw template keys / indexes from the root */
  location: readonly string[]
  /** Bindings of the nearest enclosing array conversion, if any */
  binding?: ZipBinding
}
