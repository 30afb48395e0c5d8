import type { TransformError } from './errors'

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of safeTransform(): the output document or the error that aborted it.
 */
export type TransformResult<T> = { success: true; data: T } | { success: false; error: TransformError }

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a success result with data.
 * @example success({ order: [] })
 */
export const success = <T>(data: T) => ({ success: true, data }) as const

/**
 * Create a failure result from an engine error.
 * @example failure(new NoSpreadTargetError('[order]'))
 */
export const failure = (error: TransformError) => ({ success: false, error }) as const

/**
 * Unwrap a result, rethrowing its error.
 */
export function unwrap<T>(result: TransformResult<T>): T {
  if (result.success) return result.data
  throw result.error
}
