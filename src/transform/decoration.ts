/**
 * Template micro-syntax.
 *
 * Keys may be decorated with `[name]` (array conversion) or `...name`
 * (spread). Leaf strings are either `'literal'`, a `/path`, or plain text.
 */

import { TemplateSyntaxError } from '../errors'
import { parsePath } from './resolve'
import type { LeafKind, ParsedKey } from './types'

const SPREAD_PREFIX = '...'

/**
 * Split a raw template key into its output name and decoration flags.
 *
 * @example
 * ```ts
 * parseKey('[order]') // => { raw: '[order]', name: 'order', arrayConversion: true, spread: false }
 * parseKey('...ids') // => { raw: '...ids', name: 'ids', arrayConversion: false, spread: true }
 * ```
 * @throws TemplateSyntaxError on an unterminated bracket, an empty name, or
 * both markers on one key
 */
export function parseKey(raw: string): ParsedKey {
  if (raw.startsWith(SPREAD_PREFIX)) {
    const name = raw.slice(SPREAD_PREFIX.length)
    if (name.length === 0) {
      throw new TemplateSyntaxError(`Spread key "${raw}" has no name`)
    }
    if (name.startsWith('[')) {
      throw new TemplateSyntaxError(
        `Key "${raw}" combines spread and array conversion; use one marker per key`
      )
    }
    return { raw, name, arrayConversion: false, spread: true }
  }

  if (raw.startsWith('[')) {
    if (!raw.endsWith(']') || raw.length < 2) {
      throw new TemplateSyntaxError(`Unterminated array conversion key "${raw}"; expected "[name]"`)
    }
    const name = raw.slice(1, -1)
    if (name.length === 0) {
      throw new TemplateSyntaxError(`Array conversion key "${raw}" has no name`)
    }
    return { raw, name, arrayConversion: true, spread: false }
  }

  return { raw, name: raw, arrayConversion: false, spread: false }
}

/**
 * True when a key contains the spread marker somewhere other than its start,
 * which usually means a misplaced decoration.
 */
export function hasMisplacedSpread(raw: string): boolean {
  return !raw.startsWith(SPREAD_PREFIX) && raw.includes(SPREAD_PREFIX)
}

/**
 * Classify a template leaf string.
 *
 * A string wrapped in single quotes is a literal and is never resolved, even
 * when its inner text starts with `/`.
 */
export function parseLeaf(text: string): LeafKind {
  if (text.length >= 2 && text.startsWith("'") && text.endsWith("'")) {
    return { kind: 'literal', text: text.slice(1, -1) }
  }
  if (text.startsWith('/')) {
    return { kind: 'path', path: parsePath(text) }
  }
  return { kind: 'verbatim' }
}
