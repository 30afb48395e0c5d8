/**
 * treeshape - reshape JSON documents with a template.
 *
 * @example
 * import { transform } from 'treeshape'
 *
 * transform(source, { account_id: '/retailer/id', quantity: '/order/shipments/items/quantity' })
 */

// Public operations
export * from './reshape'
// Errors
export * from './errors'
// Options
export * from './options'
// Result helpers
export * from './results'
// Value model
export * from './value'
// Engine pieces
export * from './transform'
