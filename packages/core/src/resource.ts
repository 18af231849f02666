import { SchemaError, TypeCastError, UnknownAttributeError } from './errors.js'
import type {
  AttributeSource,
  AttributeValue,
  Element,
  Primitive,
  Slot,
  TypeDescriptor,
} from './descriptor.js'
import type { TypeCaster } from './caster.js'
import type { ResourceKind } from './kind.js'
import { validate, type ValidationResult } from './validation.js'
import { serializableView, type SerializedView, type ViewTransform } from './serialization.js'

function castElement(descriptor: TypeDescriptor, raw: unknown, caster: TypeCaster): Element | undefined {
  const value = caster.cast(raw, descriptor.type, descriptor.resource)
  if (value === undefined) return undefined

  if (value instanceof Resource) {
    if (!descriptor.resource || value.kind !== descriptor.resource) {
      throw new TypeCastError(raw, descriptor.type, `caster returned a ${value.kind.name}`)
    }
    return { tag: 'resource', value }
  }

  if (descriptor.resource) {
    throw new TypeCastError(raw, descriptor.resource.name, 'caster returned a primitive')
  }
  return { tag: 'primitive', value }
}

function castSlot(descriptor: TypeDescriptor, raw: unknown, caster: TypeCaster): Slot | undefined {
  if (!descriptor.collection) {
    return castElement(descriptor, raw, caster)
  }

  if (raw === undefined || raw === null) return undefined
  if (!Array.isArray(raw)) {
    throw new TypeCastError(raw, `[${descriptor.resource?.name ?? descriptor.type}]`)
  }

  const elements: Element[] = []
  for (const item of raw) {
    const element = castElement(descriptor, item, caster)
    if (element) elements.push(element)
  }
  return { tag: 'many', elements }
}

// stored dates stay private to the instance
function readElement(element: Element): Primitive | Resource {
  if (element.tag === 'primitive' && element.value instanceof Date) {
    return new Date(element.value.getTime())
  }
  return element.value
}

function unwrap(slot: Slot): AttributeValue {
  switch (slot.tag) {
    case 'primitive':
    case 'resource':
      return readElement(slot)
    case 'many':
      return slot.elements.map(readElement)
  }
}

/**
 * An instance of a declared kind. Values are kept in a bag keyed by attribute
 * name; every read and write goes through the kind's descriptor table.
 */
export class Resource {
  readonly kind: ResourceKind
  private readonly slots = new Map<string, Slot>()

  constructor(kind: ResourceKind, initial: AttributeSource = {}) {
    this.kind = kind
    this.setAttributes(initial)
  }

  private descriptorFor(name: string): TypeDescriptor {
    const descriptor = this.kind.getDescriptor(name)
    if (!descriptor) {
      throw new UnknownAttributeError(this.kind.name, name)
    }
    return descriptor
  }

  get(name: string): AttributeValue {
    const descriptor = this.descriptorFor(name)
    const slot = this.slots.get(name)
    if (!slot) {
      return descriptor.collection ? [] : undefined
    }
    return unwrap(slot)
  }

  /**
   * Casts `value` and replaces whatever was stored. A value that casts to
   * nothing (`null`, `undefined`, blank strings for non-string types) unsets
   * the attribute.
   */
  set(name: string, value: unknown): void {
    const descriptor = this.descriptorFor(name)
    const slot = castSlot(descriptor, value, this.kind.caster)
    if (slot) {
      this.slots.set(name, slot)
    } else {
      this.slots.delete(name)
    }
  }

  getCollection(name: string): Array<Primitive | Resource> {
    const descriptor = this.descriptorFor(name)
    if (!descriptor.collection) {
      throw new SchemaError(`${this.kind.name}.${name} is not a collection`)
    }
    const slot = this.slots.get(name)
    return slot?.tag === 'many' ? slot.elements.map(readElement) : []
  }

  getResource(name: string): Resource | undefined {
    const descriptor = this.descriptorFor(name)
    if (!descriptor.resource || descriptor.collection) {
      throw new SchemaError(`${this.kind.name}.${name} is not a single resource`)
    }
    const slot = this.slots.get(name)
    return slot?.tag === 'resource' ? slot.value : undefined
  }

  /** The stored slot, for walkers that need to tell primitives from nested resources. */
  slot(name: string): Slot | undefined {
    this.descriptorFor(name)
    return this.slots.get(name)
  }

  /** Shallow snapshot in declaration order. */
  attributes(): Record<string, AttributeValue> {
    const snapshot: Record<string, AttributeValue> = {}
    for (const name of this.kind.listAttributes()) {
      snapshot[name] = this.get(name)
    }
    return snapshot
  }

  /**
   * Overlay-merge: keys naming a declared attribute are assigned, every other
   * key is skipped. Another Resource is read through its `attributes()` view.
   * A cast failure propagates and leaves earlier assignments in place.
   */
  setAttributes(source: AttributeSource): Record<string, AttributeValue> {
    const values = source instanceof Resource ? source.attributes() : source

    for (const [key, value] of Object.entries(values)) {
      if (!this.kind.getDescriptor(key)) continue
      this.set(key, value)
    }

    return this.attributes()
  }

  /** Nested resources per resource-typed attribute; collections flattened, unset entries dropped. */
  resources(): Map<string, Resource[]> {
    const nested = new Map<string, Resource[]>()
    for (const descriptor of Object.values(this.kind.listMappings())) {
      if (!descriptor.resource) continue
      const slot = this.slots.get(descriptor.name)
      if (!slot) continue

      switch (slot.tag) {
        case 'resource':
          nested.set(descriptor.name, [slot.value])
          break
        case 'many':
          nested.set(descriptor.name, slot.elements.flatMap(element => element.tag === 'resource' ? [element.value] : []))
          break
        case 'primitive':
          break
      }
    }
    return nested
  }

  validate(): ValidationResult {
    return validate(this)
  }

  isValid(): boolean {
    return validate(this).valid
  }

  serializableView(): SerializedView
  serializableView<T>(transform: ViewTransform<T>): Record<string, T>
  serializableView<T>(transform?: ViewTransform<T>): SerializedView | Record<string, T> {
    return transform ? serializableView(this, transform) : serializableView(this)
  }

  renderMarkup(): string {
    return this.kind.renderMarkup(this)
  }

  toJSON(): SerializedView {
    return serializableView(this)
  }

  inspect(): string {
    return `${this.kind.name}(${JSON.stringify(this.toJSON()).replace(/^\{|\}$/g, '')})`
  }
}
