import { z } from 'zod'
import { formatZodIssues, OptionsError } from './errors'

export const DEFAULT_MAX_DEPTH = 256
/** Largest accepted `maxDepth`; rendering recurses once per template level */
export const MAX_DEPTH_LIMIT = 1000
/** Deepest source or template text accepted by transformJson() */
export const MAX_DOCUMENT_DEPTH = 512
export const DEFAULT_INDENT = 2

/**
 * Zod schema for `TransformOptions`. Unknown keys are rejected so that a
 * misspelled option fails loudly instead of being ignored.
 */
export const transformOptionsSchema = z
  .object({
    maxDepth: z.number().int().positive().max(MAX_DEPTH_LIMIT).optional(),
    onMissingField: z.enum(['error', 'null']).optional(),
    indent: z.number().int().min(0).max(10).optional()
  })
  .strict()

/**
 * Options for transform().
 */
export type TransformOptions = {
  /** Maximum template nesting depth before `DepthExceededError` (default 256, at most 1000) */
  maxDepth?: number
  /**
   * What to do when a path names an absent field outside any sequence fan-out.
   * - 'error': throw `PathError` (default)
   * - 'null': resolve to null
   *
   * Absent fields inside a fan-out always contribute nothing.
   */
  onMissingField?: 'error' | 'null'
  /** Indentation used by transformJson() when serialising (default 2) */
  indent?: number
}

export type ResolvedOptions = Required<TransformOptions>

/**
 * Validate user options and fill in defaults.
 * @throws OptionsError when the object does not match `transformOptionsSchema`
 */
export function resolveOptions(options?: TransformOptions): ResolvedOptions {
  const parsed = transformOptionsSchema.safeParse(options ?? {})
  if (!parsed.success) {
    throw new OptionsError(formatZodIssues(parsed.error))
  }
  return {
    maxDepth: parsed.data.maxDepth ?? DEFAULT_MAX_DEPTH,
    onMissingField: parsed.data.onMissingField ?? 'error',
    indent: parsed.data.indent ?? DEFAULT_INDENT
  }
}
