/**
 * Transform engine - the pieces behind transform(), usable on their own.
 *
 * - Decoration parsing (parseKey, parseLeaf)
 * - Path resolution with sequence fan-out (parsePath, resolvePath)
 * - Template rendering (render)
 * - Array conversion (collectSpreads, zipObject)
 *
 * @example
 * ```ts
 * import { parsePath, resolvePath } from 'treeshape/transform'
 *
 * resolvePath(order, parsePath('/shipments/items/quantity'))
 * // => { kind: 'flat', values: [4, 3, 1, 1] }
 * ```
 */

// Types
export type {
  LeafKind,
  ParsedKey,
  PathExpression,
  RenderContext,
  RenderFrame,
  ResolvedSet,
  SpreadEntry,
  ZipBinding
} from './types'
export type { ResolveOptions } from './resolve'

// Decorations
export { hasMisplacedSpread, parseKey, parseLeaf } from './decoration'

// Paths
export { parsePath, resolvedToValue, resolvePath } from './resolve'

// Rendering
export { render, renderNode } from './walk'
export { collectSpreads, zipObject } from './zip'
