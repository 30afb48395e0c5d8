import { describe, expect, it } from 'vitest'
import { OptionsError } from '../src/errors'
import {
  DEFAULT_INDENT,
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  resolveOptions,
  transformOptionsSchema
} from '../src/options'
import { captureError } from './fixtures/capture'

describe('options', () => {
  it('should fill in defaults', () => {
    expect(resolveOptions()).toEqual({
      maxDepth: DEFAULT_MAX_DEPTH,
      onMissingField: 'error',
      indent: DEFAULT_INDENT
    })
    expect(DEFAULT_MAX_DEPTH).toBe(256)
    expect(DEFAULT_INDENT).toBe(2)
  })

  it('should keep provided values', () => {
    expect(resolveOptions({ maxDepth: 8, onMissingField: 'null', indent: 0 })).toEqual({
      maxDepth: 8,
      onMissingField: 'null',
      indent: 0
    })
  })

  it('should reject invalid values with OptionsError', () => {
    const error = captureError(() => resolveOptions({ maxDepth: 0 }))

    expect(error).toBeInstanceOf(OptionsError)
    expect(error).toMatchObject({
      kind: 'InvalidOptions',
      issues: [{ path: 'maxDepth', code: 'too_small', message: expect.any(String) }]
    })
  })

  it('should reject unknown option names', () => {
    const parsed = transformOptionsSchema.safeParse({ depth: 3 })
    expect(parsed.success).toBe(false)
    expect(() => resolveOptions(JSON.parse('{"depth": 3}'))).toThrow(OptionsError)
  })

  it('should cap maxDepth', () => {
    expect(MAX_DEPTH_LIMIT).toBe(1000)
    expect(resolveOptions({ maxDepth: 1000 }).maxDepth).toBe(1000)

    const error = captureError(() => resolveOptions({ maxDepth: 1001 }))
    expect(error).toBeInstanceOf(OptionsError)
    expect(error).toMatchObject({
      issues: [{ path: 'maxDepth', code: 'too_big', message: expect.any(String) }]
    })
  })
})
