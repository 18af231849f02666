import type { AttributeValue, Element, Primitive, Slot } from './descriptor.js'
import type { Resource } from './resource.js'

export type SerializedValue = Primitive | undefined | SerializedView | Array<Primitive | SerializedView>

export interface SerializedView {
  [key: string]: SerializedValue
}

export type ViewTransform<T> = (key: string, value: AttributeValue) => T

function serializeElement(element: Element): Primitive | SerializedView {
  if (element.tag === 'resource') return serializableView(element.value)
  return element.value instanceof Date ? new Date(element.value.getTime()) : element.value
}

function serializeSlot(slot: Slot | undefined, collection: boolean): SerializedValue {
  if (!slot) return collection ? [] : undefined

  switch (slot.tag) {
    case 'primitive':
    case 'resource':
      return serializeElement(slot)
    case 'many':
      return slot.elements.map(serializeElement)
  }
}

/**
 * Ordered key/value tree of `resource`. Without a transform, nested resources
 * are expanded into their own views; with one, each value of the shallow
 * snapshot is replaced by `transform(key, value)` and nothing is expanded.
 */
export function serializableView(resource: Resource): SerializedView
export function serializableView<T>(resource: Resource, transform: ViewTransform<T>): Record<string, T>
export function serializableView<T>(
  resource: Resource,
  transform?: ViewTransform<T>,
): SerializedView | Record<string, T> {
  if (transform) {
    const view: Record<string, T> = {}
    for (const [key, value] of Object.entries(resource.attributes())) {
      view[key] = transform(key, value)
    }
    return view
  }

  const view: SerializedView = {}
  for (const descriptor of Object.values(resource.kind.listMappings())) {
    view[descriptor.name] = serializeSlot(resource.slot(descriptor.name), descriptor.collection)
  }
  return view
}
