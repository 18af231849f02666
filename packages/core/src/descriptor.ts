import type { ResourceKind } from './kind.js'
import type { Resource } from './resource.js'

export type Primitive = string | number | boolean | Date

/** What a getter hands back: unset scalars read as `undefined`, unset collections as `[]`. */
export type AttributeValue = Primitive | Resource | Array<Primitive | Resource> | undefined

export type AttributeSource = Resource | Record<string, unknown>

/** A single stored value. */
export type Element =
  | { tag: 'primitive'; value: Primitive }
  | { tag: 'resource'; value: Resource }

/** What the instance keeps per set attribute. Unset attributes have no slot. */
export type Slot = Element | { tag: 'many'; elements: Element[] }

export interface AttributeOptions {
  className?: string
  collection?: boolean
  collectionElementName?: string
}

export const ALLOWED_ATTRIBUTE_OPTIONS: readonly string[] = ['className', 'collection', 'collectionElementName']

export const RESOURCE_TYPE = 'resource'

export interface TypeDescriptor {
  readonly name: string
  readonly type: string
  /** Resolved nested kind, set only when `type` is `resource`. */
  readonly resource?: ResourceKind
  readonly collection: boolean
  /** Used by markup rendering to wrap collection elements. */
  readonly collectionElementName?: string
}

export type ContainerAttributeValue = string | number | boolean

export interface ContainerMetadata {
  name: string
  attributes: Record<string, string>
}

const XML_NAME = /^[A-Za-z_][\w.-]*(:[A-Za-z_][\w.-]*)?$/

/** Element and attribute names, optionally prefixed (`xmlns:inv`). */
export function isXmlName(name: string): boolean {
  return XML_NAME.test(name)
}

/**
 * `line_item` -> `LineItem`, `lineItem` -> `LineItem`.
 */
export function normalizeKindName(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('')
}

/**
 * `line_items` -> `Line items`, `unitPrice` -> `Unit price`.
 */
export function humanize(attribute: string): string {
  const words = attribute
    .replace(/([a-z\d])([A-Z])/g, '$1 $2')
    .replace(/[_-]+/g, ' ')
    .trim()
    .toLowerCase()
  return words.charAt(0).toUpperCase() + words.slice(1)
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
