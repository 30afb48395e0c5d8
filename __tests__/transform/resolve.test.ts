/**
 * Tests for src/transform/resolve.ts
 *
 * Path parsing and resolution: plain lookups, sequence fan-out, flattening,
 * missing fields.
 */

import { describe, expect, it } from 'vitest'
import { PathError, TemplateSyntaxError } from '../../src/errors'
import { parsePath, resolvedToValue, resolvePath } from '../../src/transform/resolve'
import type { JsonObject } from '../../src/value'
import { captureError } from '../fixtures/capture'
import { orderSource } from '../fixtures/order'

describe('transform/resolve.ts', () => {
  describe('parsePath', () => {
    it('should split segments after the leading slash', () => {
      expect(parsePath('/order/po_number')).toEqual({
        source: '/order/po_number',
        segments: ['order', 'po_number']
      })
    })

    it('should treat "/" as the root', () => {
      expect(parsePath('/').segments).toEqual([])
    })

    it('should keep empty segments as keys', () => {
      expect(parsePath('/a//b').segments).toEqual(['a', '', 'b'])
    })

    it('should reject paths without a leading slash', () => {
      expect(() => parsePath('order/po_number')).toThrow(TemplateSyntaxError)
    })
  })

  describe('resolvePath', () => {
    it('should resolve a nested scalar', () => {
      expect(resolvePath(orderSource, parsePath('/product/details/name'))).toEqual({
        kind: 'scalar',
        value: 'Red Shoes'
      })
    })

    it('should return the root for "/"', () => {
      const source = { a: 1 }
      expect(resolvePath(source, parsePath('/'))).toEqual({ kind: 'scalar', value: source })
    })

    it('should return a terminal sequence unchanged', () => {
      expect(resolvePath(orderSource, parsePath('/ids'))).toEqual({
        kind: 'scalar',
        value: ['34554543', '7643534', '512342']
      })
    })

    it('should fan out across one sequence', () => {
      expect(resolvePath(orderSource, parsePath('/order/shipments/tracking_number'))).toEqual({
        kind: 'flat',
        values: ['1234567', '98776']
      })
    })

    it('should flatten across two nested sequences in document order', () => {
      expect(resolvePath(orderSource, parsePath('/order/shipments/items/quantity'))).toEqual({
        kind: 'flat',
        values: [4, 3, 1, 1]
      })
      expect(resolvePath(orderSource, parsePath('/order/shipments/items/sku'))).toEqual({
        kind: 'flat',
        values: ['SKU-123', 'SKU-343', 'SKU-1453', 'SKU-543']
      })
    })

    it('should concatenate sequences reached inside a fan-out', () => {
      expect(resolvePath(orderSource, parsePath('/order/shipments/items'))).toEqual({
        kind: 'flat',
        values: [
          { sku: 'SKU-123', quantity: 4 },
          { sku: 'SKU-343', quantity: 3 },
          { sku: 'SKU-1453', quantity: 1 },
          { sku: 'SKU-543', quantity: 1 }
        ]
      })
    })

    it('should only concatenate one level of terminal sequences', () => {
      const source = { rows: [{ cells: [[1, 2], [3]] }, { cells: [[4]] }] }
      expect(resolvePath(source, parsePath('/rows/cells'))).toEqual({
        kind: 'flat',
        values: [[1, 2], [3], [4]]
      })
    })

    it('should fan out through directly nested sequences', () => {
      const source = { grid: [[{ v: 1 }, { v: 2 }], [{ v: 3 }]] }
      expect(resolvePath(source, parsePath('/grid/v'))).toEqual({
        kind: 'flat',
        values: [1, 2, 3]
      })
    })

    it('should skip elements missing the field inside a fan-out', () => {
      const source: JsonObject = { people: [{ name: 'Ada' }, { age: 3 }, { name: 'Lin' }] }
      expect(resolvePath(source, parsePath('/people/name'))).toEqual({
        kind: 'flat',
        values: ['Ada', 'Lin']
      })
    })

    it('should resolve to an empty flat sequence when nothing matches', () => {
      expect(resolvePath(orderSource, parsePath('/order/shipments/carrier'))).toEqual({
        kind: 'flat',
        values: []
      })
    })

    it('should keep explicit nulls', () => {
      const source = { a: null, list: [{ b: null }, { b: 2 }] }
      expect(resolvePath(source, parsePath('/a'))).toEqual({ kind: 'scalar', value: null })
      expect(resolvePath(source, parsePath('/list/b'))).toEqual({ kind: 'flat', values: [null, 2] })
    })

    it('should throw PathError for a missing field outside a fan-out', () => {
      expect(() => resolvePath(orderSource, parsePath('/idsss'))).toThrow(PathError)

      const error = captureError(() => resolvePath(orderSource, parsePath('/retailer/name')))
      expect(error).toBeInstanceOf(PathError)
      expect(error).toMatchObject({
        kind: 'MissingField',
        field: 'name',
        path: '/retailer/name',
        message: 'Failed to resolve /retailer/name; field "name" is missing'
      })
    })

    it('should resolve a scalar with segments left to the scalar itself', () => {
      expect(resolvePath(orderSource, parsePath('/retailer/id/extra'))).toEqual({
        kind: 'scalar',
        value: '12342'
      })
      expect(resolvePath({ a: null }, parsePath('/a/b/c'))).toEqual({ kind: 'scalar', value: null })
    })

    it('should keep scalars met with segments left inside a fan-out', () => {
      const source: JsonObject = { people: [{ name: 'Ada' }, 'stray', { age: 3 }, 7] }
      expect(resolvePath(source, parsePath('/people/name'))).toEqual({
        kind: 'flat',
        values: ['Ada', 'stray', 7]
      })
    })

    it('should not match inherited properties', () => {
      expect(() => resolvePath({ a: {} }, parsePath('/a/constructor'))).toThrow(PathError)
    })

    it("should resolve missing fields to null with onMissingField: 'null'", () => {
      expect(
        resolvePath(orderSource, parsePath('/retailer/name'), { onMissingField: 'null' })
      ).toEqual({ kind: 'scalar', value: null })
    })
  })

  describe('resolvedToValue', () => {
    it('should unwrap scalars and turn flat results into arrays', () => {
      expect(resolvedToValue({ kind: 'scalar', value: 'x' })).toBe('x')
      expect(resolvedToValue({ kind: 'flat', values: [1, 2] })).toEqual([1, 2])
    })
  })
})
