/**
 * Transformation errors.
 *
 * Every failure surfaced by the engine is a `TransformError` subclass with a
 * `kind` discriminant and, where known, the template location it was raised at.
 */

import type { z } from 'zod'

export type TransformErrorKind =
  | 'MissingField'
  | 'SpreadTypeMismatch'
  | 'SpreadLengthMismatch'
  | 'NoSpreadTarget'
  | 'TemplateSyntaxError'
  | 'DepthExceeded'
  | 'InvalidOptions'
  | 'InvalidDocument'

/** Zod issue flattened to something printable. */
export type ValidationIssue = {
  path: string
  code: string
  message: string
}

type ConstructorOptions = { templatePath?: readonly string[]; cause?: unknown }

export abstract class TransformError extends Error {
  abstract readonly kind: TransformErrorKind
  override readonly name: string = 'TransformError'
  /** Raw template keys (and sequence indexes) leading to the failing entry */
  readonly templatePath?: readonly string[]

  constructor(message: string, options?: ConstructorOptions) {
    super(message)
    this.templatePath = options?.templatePath
    if (options?.cause !== undefined) this.cause = options.cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /** Template location as `/`-joined raw keys, or '' when unknown. */
  get location(): string {
    if (!this.templatePath) return ''
    return `/${this.templatePath.join('/')}`
  }

  /** Copy of this error located at `templatePath`. */
  abstract withTemplatePath(templatePath: readonly string[]): TransformError

  override toString(): string {
    const loc = this.location
    return loc ? `${this.name}: ${this.message} (at template ${loc})` : `${this.name}: ${this.message}`
  }
}

export class PathError extends TransformError {
  readonly kind = 'MissingField'
  override readonly name = 'PathError'

  constructor(
    readonly path: string,
    readonly field: string,
    options?: ConstructorOptions
  ) {
    super(`Failed to resolve ${path}; field "${field}" is missing`, options)
  }

  withTemplatePath(templatePath: readonly string[]): PathError {
    return new PathError(this.path, this.field, { templatePath, cause: this.cause })
  }
}

export class SpreadTypeMismatchError extends TransformError {
  readonly kind = 'SpreadTypeMismatch'
  override readonly name = 'SpreadTypeMismatchError'

  constructor(
    readonly entry: string,
    readonly actual: string,
    options?: ConstructorOptions
  ) {
    super(`Spread entry "${entry}" must resolve to a sequence, got ${actual}`, options)
  }

  withTemplatePath(templatePath: readonly string[]): SpreadTypeMismatchError {
    return new SpreadTypeMismatchError(this.entry, this.actual, { templatePath })
  }
}

/** One spread entry and the length it resolved to. */
export type SpreadLength = { location: string; length: number }

export class SpreadLengthMismatchError extends TransformError {
  readonly kind = 'SpreadLengthMismatch'
  override readonly name = 'SpreadLengthMismatchError'

  constructor(
    readonly lengths: readonly SpreadLength[],
    options?: ConstructorOptions
  ) {
    const listed = lengths.map(l => `${l.location} (${l.length})`).join(', ')
    super(`Spread entries have different lengths: ${listed}`, options)
  }

  withTemplatePath(templatePath: readonly string[]): SpreadLengthMismatchError {
    return new SpreadLengthMismatchError(this.lengths, { templatePath })
  }
}

export class NoSpreadTargetError extends TransformError {
  readonly kind = 'NoSpreadTarget'
  override readonly name = 'NoSpreadTargetError'

  constructor(
    readonly key: string,
    options?: ConstructorOptions
  ) {
    super(`Array conversion "${key}" has no spread ("...") entry`, options)
  }

  withTemplatePath(templatePath: readonly string[]): NoSpreadTargetError {
    return new NoSpreadTargetError(this.key, { templatePath })
  }
}

export class TemplateSyntaxError extends TransformError {
  readonly kind = 'TemplateSyntaxError'
  override readonly name = 'TemplateSyntaxError'

  withTemplatePath(templatePath: readonly string[]): TemplateSyntaxError {
    return new TemplateSyntaxError(this.message, { templatePath })
  }
}

export class DepthExceededError extends TransformError {
  readonly kind = 'DepthExceeded'
  override readonly name = 'DepthExceededError'

  constructor(
    readonly maxDepth: number,
    options?: ConstructorOptions
  ) {
    super(`Template nesting exceeds the maximum depth of ${maxDepth}`, options)
  }

  withTemplatePath(templatePath: readonly string[]): DepthExceededError {
    return new DepthExceededError(this.maxDepth, { templatePath })
  }
}

export abstract class ValidationError extends TransformError {
  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[],
    options?: ConstructorOptions
  ) {
    const detail = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
    super(detail ? `${message}: ${detail}` : message, options)
  }
}

export class OptionsError extends ValidationError {
  readonly kind = 'InvalidOptions'
  override readonly name = 'OptionsError'

  constructor(issues: readonly ValidationIssue[], options?: ConstructorOptions) {
    super('Invalid transform options', issues, options)
  }

  withTemplatePath(templatePath: readonly string[]): OptionsError {
    return new OptionsError(this.issues, { templatePath })
  }
}

export class DocumentError extends ValidationError {
  readonly kind = 'InvalidDocument'
  override readonly name = 'DocumentError'

  constructor(
    readonly document: 'source' | 'template',
    issues: readonly ValidationIssue[],
    options?: ConstructorOptions
  ) {
    super(`Invalid ${document} document`, issues, options)
  }

  withTemplatePath(templatePath: readonly string[]): DocumentError {
    return new DocumentError(this.document, this.issues, { templatePath, cause: this.cause })
  }
}

// Format ZodError issues into a compact, consistent structure
export function formatZodIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.map(segment => String(segment)).join('.'),
    code: issue.code,
    message: issue.message
  }))
}

export function isTransformError(error: unknown): error is TransformError {
  return error instanceof TransformError
}
