/**
 * Array conversion ("zip").
 *
 * An object under a `[name]` key becomes an array of copies of itself, one per
 * index of its spread (`...name`) entries. Spread entries may sit at any depth
 * below the object; those under a nested `[name]` belong to that conversion.
 */

import {
  NoSpreadTargetError,
  SpreadLengthMismatchError,
  SpreadTypeMismatchError,
  TemplateSyntaxError
} from '../errors'
import type { JsonObject, JsonValue } from '../value'
import { classify, getField, kindOf } from '../value'
import { warn } from '../warn'
import { parseKey } from './decoration'
import type { RenderContext, RenderFrame, SpreadEntry, ZipBinding } from './types'
import { locate, renderNode } from './walk'

type ScanItem = { node: JsonValue; location: readonly string[] } | { entry: SpreadEntry }

/**
 * Find every spread entry below `template`, in document order.
 *
 * Does not descend into nested array conversions or into the values of
 * spread entries.
 *
 * @example
 * ```ts
 * collectSpreads({ '...ids': '/ids', '[lines]': { '...sku': '/skus' } })
 * // => [{ owner: <template>, key: '...ids', location: ['...ids'] }]
 * ```
 */
export function collectSpreads(template: JsonObject, location: readonly string[] = []): SpreadEntry[] {
  const found: SpreadEntry[] = []
  const stack: ScanItem[] = [{ node: template, location }]

  while (stack.length > 0) {
    const item = stack.pop()
    if (item === undefined) break
    if ('entry' in item) {
      found.push(item.entry)
      continue
    }

    const children: ScanItem[] = []
    const node = classify(item.node)
    switch (node.kind) {
      case 'mapping':
        for (const [raw, value] of Object.entries(node.value)) {
          const entryLocation = [...item.location, raw]
          const key = locate(entryLocation, () => parseKey(raw))
          if (key.arrayConversion) continue
          children.push(
            key.spread
              ? { entry: { owner: node.value, key: raw, location: entryLocation } }
              : { node: value, location: entryLocation }
          )
        }
        break
      case 'sequence':
        node.value.forEach((value, i) => {
          children.push({ node: value, location: [...item.location, String(i)] })
        })
        break
      default:
        break
    }

    // Reversed so children pop in document order
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }

  return found
}

/**
 * Convert the object under the `[name]` key `raw` into an array of copies.
 *
 * `frame` is the frame of the entry itself (its location ends with `raw`).
 * Every spread entry is rendered against the original source and must yield a
 * sequence; all sequences must share one length `N`. Copy `i` takes element
 * `i` of each spread entry; all other content is rendered normally.
 *
 * @throws TemplateSyntaxError when the value is not an object
 * @throws NoSpreadTargetError when no spread entry is found
 * @throws SpreadTypeMismatchError when a spread entry is not a sequence
 * @throws SpreadLengthMismatchError when spread sequences differ in length
 */
export function zipObject(
  raw: string,
  template: JsonValue,
  ctx: RenderContext,
  frame: RenderFrame
): JsonValue[] {
  const node = classify(template)
  if (node.kind !== 'mapping') {
    throw new TemplateSyntaxError(`Array conversion "${raw}" must hold an object, got ${node.kind}`, {
      templatePath: frame.location
    })
  }

  const spreads = collectSpreads(node.value, frame.location)
  if (spreads.length === 0) {
    throw new NoSpreadTargetError(raw, { templatePath: frame.location })
  }

  const sequences = spreads.map(entry => ({ entry, values: spreadSequence(entry, ctx, frame) }))
  const length = sequences[0].values.length
  if (sequences.some(s => s.values.length !== length)) {
    throw new SpreadLengthMismatchError(
      sequences.map(s => ({ location: `/${s.entry.location.join('/')}`, length: s.values.length })),
      { templatePath: frame.location }
    )
  }
  if (length === 0) {
    warn(`Array conversion "${raw}" produced no elements; its spread entries are empty`, frame.location)
  }

  const copies: JsonValue[] = []
  for (let i = 0; i < length; i++) {
    const binding: ZipBinding = { elements: new WeakMap() }
    for (const { entry, values } of sequences) {
      let slots = binding.elements.get(entry.owner)
      if (!slots) {
        slots = new Map()
        binding.elements.set(entry.owner, slots)
      }
      slots.set(entry.key, values[i])
    }
    copies.push(renderNode(node.value, ctx, { ...frame, binding }))
  }
  return copies
}

// Render a spread entry's value on its own and require a sequence
function spreadSequence(entry: SpreadEntry, ctx: RenderContext, frame: RenderFrame): JsonValue[] {
  const value = getField(entry.owner, entry.key) ?? null
  const rendered = renderNode(value, ctx, {
    depth: frame.depth + entry.location.length - frame.location.length,
    location: entry.location
  })
  if (!Array.isArray(rendered)) {
    throw new SpreadTypeMismatchError(entry.key, kindOf(rendered), { templatePath: entry.location })
  }
  return rendered
}
