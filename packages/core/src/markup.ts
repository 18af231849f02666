import type { Element, Primitive, TypeDescriptor } from './descriptor.js'
import type { Resource } from './resource.js'

export type MarkupRenderer = (resource: Resource) => string

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

function formatPrimitive(value: Primitive, type: string): string {
  if (value instanceof Date) {
    return type === 'date' ? value.toISOString().slice(0, 10) : value.toISOString()
  }
  return String(value)
}

function formatAttributes(attributes: Record<string, string>): string {
  return Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${escapeXml(value)}"`)
    .join('')
}

function renderElement(name: string, element: Element, descriptor: TypeDescriptor, depth: number): string[] {
  const indent = '  '.repeat(depth)
  if (element.tag === 'primitive') {
    return [`${indent}<${name}>${escapeXml(formatPrimitive(element.value, descriptor.type))}</${name}>`]
  }

  const children = renderChildren(element.value, depth + 1)
  if (children.length === 0) {
    return [`${indent}<${name}/>`]
  }
  return [`${indent}<${name}>`, ...children, `${indent}</${name}>`]
}

function renderChildren(resource: Resource, depth: number): string[] {
  const lines: string[] = []

  for (const descriptor of Object.values(resource.kind.listMappings())) {
    const slot = resource.slot(descriptor.name)
    if (!slot) continue

    if (slot.tag !== 'many') {
      lines.push(...renderElement(descriptor.name, slot, descriptor, depth))
      continue
    }
    if (slot.elements.length === 0) continue

    const wrapper = descriptor.collectionElementName
    if (wrapper) {
      const indent = '  '.repeat(depth)
      lines.push(`${indent}<${descriptor.name}>`)
      for (const element of slot.elements) {
        lines.push(...renderElement(wrapper, element, descriptor, depth + 1))
      }
      lines.push(`${indent}</${descriptor.name}>`)
    } else {
      for (const element of slot.elements) {
        lines.push(...renderElement(descriptor.name, element, descriptor, depth))
      }
    }
  }

  return lines
}

/**
 * Renders a resource as an XML document rooted at its kind's container
 * element. Unset attributes and empty collections are left out.
 */
export const renderXml: MarkupRenderer = resource => {
  const container = resource.kind.containerMetadata()
  const children = renderChildren(resource, 1)

  let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`
  if (children.length === 0) {
    xml += `<${container.name}${formatAttributes(container.attributes)}/>`
    return xml
  }

  xml += `<${container.name}${formatAttributes(container.attributes)}>\n`
  xml += children.join('\n')
  xml += `\n</${container.name}>`
  return xml
}
