/**
 * Template walker.
 *
 * Rebuilds the template tree, replacing path leaves with values from the
 * source and handing `[name]` entries to the array converter.
 */

import { DepthExceededError, TemplateSyntaxError, TransformError } from '../errors'
import type { TransformOptions } from '../options'
import { resolveOptions } from '../options'
import type { JsonObject, JsonValue } from '../value'
import { classify, cloneValue, mappingFromEntries } from '../value'
import { warn } from '../warn'
import { hasMisplacedSpread, parseKey, parseLeaf } from './decoration'
import { resolvedToValue, resolvePath } from './resolve'
import type { RenderContext, RenderFrame, ZipBinding } from './types'
import { zipObject } from './zip'

/**
 * Render a template against a source document.
 *
 * @example
 * ```ts
 * render({ retailer: { id: '12342' } }, { account_id: '/retailer/id', kind: "'retail'" })
 * // => { account_id: '12342', kind: 'retail' }
 * ```
 * @throws TransformError
 */
export function render(source: JsonValue, template: JsonValue, options?: TransformOptions): JsonValue {
  const ctx: RenderContext = { source, options: resolveOptions(options) }
  return renderNode(template, ctx, { depth: 0, location: [] })
}

/**
 * Render one template node. Exported for the array converter.
 */
export function renderNode(template: JsonValue, ctx: RenderContext, frame: RenderFrame): JsonValue {
  if (frame.depth > ctx.options.maxDepth) {
    throw new DepthExceededError(ctx.options.maxDepth, { templatePath: frame.location })
  }

  const node = classify(template)
  switch (node.kind) {
    case 'mapping':
      return renderMapping(node.value, ctx, frame)
    case 'sequence':
      return node.value.map((item, i) =>
        renderNode(item, ctx, {
          depth: frame.depth + 1,
          location: [...frame.location, String(i)],
          binding: frame.binding
        })
      )
    case 'string':
      return renderLeaf(node.value, ctx, frame.location)
    case 'null':
    case 'boolean':
    case 'number':
      return node.value
  }
}

function renderMapping(mapping: JsonObject, ctx: RenderContext, frame: RenderFrame): JsonObject {
  const entries: Array<[string, JsonValue]> = []
  const outputKeys = new Map<string, string>()

  for (const [raw, value] of Object.entries(mapping)) {
    const location = [...frame.location, raw]
    const key = locate(location, () => parseKey(raw))

    if (hasMisplacedSpread(raw)) {
      warn(`Key "${raw}" contains "..." but not as a prefix; it is not a spread entry`, location)
    }

    const previous = outputKeys.get(key.name)
    if (previous !== undefined) {
      throw new TemplateSyntaxError(
        `Keys "${previous}" and "${raw}" both produce output key "${key.name}"`,
        { templatePath: location }
      )
    }
    outputKeys.set(key.name, raw)

    const child: RenderFrame = { depth: frame.depth + 1, location, binding: frame.binding }
    if (key.arrayConversion) {
      entries.push([key.name, zipObject(raw, value, ctx, child)])
    } else if (key.spread) {
      entries.push([key.name, boundElement(mapping, raw, frame.binding, location)])
    } else {
      entries.push([key.name, renderNode(value, ctx, child)])
    }
  }

  return mappingFromEntries(entries)
}

function renderLeaf(text: string, ctx: RenderContext, location: readonly string[]): JsonValue {
  const leaf = locate(location, () => parseLeaf(text))
  switch (leaf.kind) {
    case 'literal':
      return leaf.text
    case 'path': {
      const resolved = locate(location, () =>
        resolvePath(ctx.source, leaf.path, { onMissingField: ctx.options.onMissingField })
      )
      // Output never shares nodes with the source
      return cloneValue(resolvedToValue(resolved))
    }
    case 'verbatim':
      return text
  }
}

// Element bound to a spread entry for the copy being rendered
function boundElement(
  owner: JsonObject,
  raw: string,
  binding: ZipBinding | undefined,
  location: readonly string[]
): JsonValue {
  const slots = binding?.elements.get(owner)
  if (!slots || !slots.has(raw)) {
    throw new TemplateSyntaxError(`Spread entry "${raw}" is not inside an array conversion ("[name]")`, {
      templatePath: location
    })
  }
  return slots.get(raw) ?? null
}

/**
 * Run `fn`, attaching `location` to any engine error that has none yet.
 */
export function locate<T>(location: readonly string[], fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof TransformError && error.templatePath === undefined) {
      throw error.withTemplatePath(location)
    }
    throw error
  }
}
