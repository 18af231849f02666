import { SchemaRegistry, type RegistryOptions } from '../src/index.js'

/**
 * Order with a collection of line items; line items require a sku.
 */
export function orderSchema(options: RegistryOptions = {}) {
  const registry = new SchemaRegistry(options)

  const LineItem = registry.define('LineItem', kind => {
    kind.declareAttribute('sku', 'string')
    kind.declareAttribute('qty', 'integer')
    kind.validatesPresenceOf('sku')
  })

  const Order = registry.define('Order', kind => {
    kind.declareAttribute('id', 'integer')
    kind.declareAttribute('items', 'resource', { className: 'LineItem', collection: true })
  })

  return { registry, LineItem, Order }
}

/**
 * Invoice with a required uid, a single customer and wrapped line collection.
 */
export function invoiceSchema(options: RegistryOptions = {}) {
  const registry = new SchemaRegistry(options)

  const Customer = registry.define('Customer', kind => {
    kind.declareAttribute('name', 'string')
    kind.validatesPresenceOf('name')
  })

  const Line = registry.define('Line', kind => {
    kind.declareAttribute('sku', 'string')
    kind.declareAttribute('qty', 'integer')
    kind.validatesPresenceOf('sku')
  })

  const Invoice = registry.define('Invoice', kind => {
    kind.declareContainer('InvoicesDoc', { xmlns: 'urn:test' })
    kind.declareAttribute('uid', 'string')
    kind.declareAttribute('issued', 'date')
    kind.declareAttribute('total', 'decimal')
    kind.declareAttribute('lines', 'resource', { className: 'Line', collection: true, collectionElementName: 'line' })
    kind.declareAttribute('tags', 'string', { collection: true })
    kind.declareAttribute('customer', 'resource')
    kind.validatesPresenceOf('uid')
  })

  return { registry, Customer, Line, Invoice }
}
