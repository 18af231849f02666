import { describe, it, expect } from 'vitest'
import { Resource, SchemaRegistry, ValidationErrors, collectIssues, isBlank, validate } from '../src/index.js'
import { invoiceSchema, orderSchema } from './helpers.js'

function categorySchema() {
  const registry = new SchemaRegistry()
  const Category = registry.define('Category', kind => {
    kind.declareAttribute('name', 'string')
    kind.declareAttribute('children', 'resource', { className: 'Category', collection: true })
    kind.validatesPresenceOf('name')
  })
  return { registry, Category }
}

describe('validate', () => {
  it('passes when local rules and nested resources pass', () => {
    const { Order } = orderSchema()
    const result = Order.create({ id: 1, items: [{ sku: 'A' }] }).validate()

    expect(result.valid).toBe(true)
    expect(result.errors.isEmpty()).toBe(true)
    expect(result.nested).toHaveLength(1)
    expect(result.nested[0].attribute).toBe('items')
    expect(result.nested[0].index).toBe(0)
  })

  it('folds a failing nested item into the parent', () => {
    const { Order } = orderSchema()
    const order = Order.create({ items: [{ sku: null, qty: 1 }] })

    expect(order.isValid()).toBe(false)
    const { errors } = order.validate()
    expect(errors.messagesFor('items')).toEqual(["Sku can't be blank"])
    expect(errors.on('items')[0].kind).toBe('invalid_resource')
  })

  it('adds one entry per failing collection element', () => {
    const { Order } = orderSchema()
    const { errors } = Order.create({ items: [{}, { sku: 'A' }, { sku: ' ' }] }).validate()
    expect(errors.messagesFor('items')).toEqual(["Sku can't be blank", "Sku can't be blank"])
    expect(errors.size).toBe(2)
  })

  it('reports local and nested failures together', () => {
    const { Invoice } = invoiceSchema()
    const invoice = Invoice.create({ lines: [{ sku: 'A' }, {}], customer: {} })
    const result = invoice.validate()

    expect(result.valid).toBe(false)
    expect(result.errors.attributes()).toEqual(['uid', 'lines', 'customer'])
    expect(result.errors.fullMessages()).toEqual([
      "Uid can't be blank",
      "Lines Sku can't be blank",
      "Customer Name can't be blank",
    ])
    expect(result.errors.toJSON()).toEqual({
      uid: ["can't be blank"],
      lines: ["Sku can't be blank"],
      customer: ["Name can't be blank"],
    })
  })

  it('collects path-attributed issues', () => {
    const { Invoice } = invoiceSchema()
    const result = Invoice.create({ lines: [{ sku: 'A' }, {}], customer: {} }).validate()

    expect(collectIssues(result)).toEqual([
      { path: 'uid', message: "Uid can't be blank" },
      { path: 'lines[1].sku', message: "Sku can't be blank" },
      { path: 'customer.name', message: "Name can't be blank" },
    ])
  })

  it('cascades through recursive kinds', () => {
    const { Category } = categorySchema()
    const root = Category.create({ name: 'root', children: [{ name: 'a', children: [{}] }] })
    const result = validate(root)

    expect(result.valid).toBe(false)
    expect(result.errors.messagesFor('children')).toEqual(["Children Name can't be blank"])
    expect(collectIssues(result)).toEqual([
      { path: 'children[0].children[0].name', message: "Name can't be blank" },
    ])
  })

  it('recomputes on every call', () => {
    const { Order } = orderSchema()
    const order = Order.create({ items: [{}] })
    expect(order.isValid()).toBe(false)

    const [item] = order.getCollection('items')
    if (item instanceof Resource) item.set('sku', 'B')

    expect(order.isValid()).toBe(true)
    expect(order.validate().errors.isEmpty()).toBe(true)
  })

  it('treats empty collections as blank', () => {
    const registry = new SchemaRegistry()
    const Tagged = registry.define('Tagged', kind => {
      kind.declareAttribute('tags', 'string', { collection: true })
      kind.validatesPresenceOf('tags')
    })
    expect(Tagged.create().validate().errors.fullMessages()).toEqual(["Tags can't be blank"])
    expect(Tagged.create({ tags: ['a'] }).isValid()).toBe(true)
  })

  it('runs custom rules', () => {
    const registry = new SchemaRegistry()
    const Line = registry.define('Line', kind => {
      kind.declareAttribute('qty', 'integer')
      kind.validateWith((record, errors) => {
        const qty = record.get('qty')
        if (typeof qty === 'number' && qty <= 0) {
          errors.add('qty', 'greater_than', 'must be greater than 0')
        }
      })
    })

    const result = Line.create({ qty: 0 }).validate()
    expect(result.errors.on('qty')).toEqual([
      { attribute: 'qty', kind: 'greater_than', message: 'must be greater than 0' },
    ])
    expect(result.errors.fullMessages()).toEqual(['Qty must be greater than 0'])
  })
})

describe('ValidationErrors', () => {
  it('falls back to default messages', () => {
    const errors = new ValidationErrors()
    errors.add('lineItems', 'blank')
    errors.add('lineItems', 'custom')
    expect(errors.fullMessages()).toEqual(["Line items can't be blank", 'Line items is invalid'])
    expect(errors.has('lineItems')).toBe(true)
    expect(errors.has('other')).toBe(false)
  })
})

describe('isBlank', () => {
  it('treats absent, whitespace and empty sequences as blank', () => {
    expect(isBlank(undefined)).toBe(true)
    expect(isBlank('  ')).toBe(true)
    expect(isBlank([])).toBe(true)
    expect(isBlank('a')).toBe(false)
    expect(isBlank(0)).toBe(false)
    expect(isBlank(false)).toBe(false)
  })
})
