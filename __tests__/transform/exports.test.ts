/**
 * Tests for transform module public API surface.
 *
 * Ensures all expected exports are available and prevents accidental breaking changes.
 */

import { describe, expect, it } from 'vitest'
import * as transform from '../../src/transform'

describe('transform module exports', () => {
  it('should export all expected functions', () => {
    const expectedExports = [
      'collectSpreads',
      'hasMisplacedSpread',
      'parseKey',
      'parseLeaf',
      'parsePath',
      'render',
      'renderNode',
      'resolvePath',
      'resolvedToValue',
      'zipObject'
    ]

    const actualExports = Object.keys(transform).sort()
    expect(actualExports).toEqual(expectedExports)
  })

  it('should export functions with correct types', () => {
    for (const value of Object.values(transform)) {
      expect(typeof value).toBe('function')
    }
  })
})
