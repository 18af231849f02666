import type { ExternalSchemaMode } from 'shared'
import { DeclarationError } from './errors.js'
import {
  ALLOWED_ATTRIBUTE_OPTIONS,
  RESOURCE_TYPE,
  isXmlName,
  normalizeKindName,
  type AttributeOptions,
  type ContainerAttributeValue,
  type AttributeSource,
  type ContainerMetadata,
  type TypeDescriptor,
} from './descriptor.js'
import type { TypeCaster } from './caster.js'
import type { ExternalSchemaSource } from './external-schema.js'
import type { SchemaRegistry } from './registry.js'
import { Resource } from './resource.js'
import { presenceRule, type ValidationRule } from './validation.js'

/**
 * A declared record kind: ordered attribute names, one descriptor per
 * attribute, container metadata for markup and the kind's validation rules.
 *
 * Declaration methods are only available while the kind is being defined
 * through `SchemaRegistry.define`; once the callback returns the kind is
 * sealed and read-only.
 */
export class ResourceKind {
  readonly name: string
  readonly registry: SchemaRegistry

  private readonly attributeOrder: string[] = []
  private readonly descriptors = new Map<string, TypeDescriptor>()
  private readonly validationRules: ValidationRule[] = []
  private container: ContainerMetadata
  private sealed = false

  constructor(name: string, registry: SchemaRegistry) {
    if (name.trim() === '') {
      throw new DeclarationError('Kind name must not be empty')
    }
    this.name = name
    this.registry = registry
    this.container = { name, attributes: {} }
  }

  get caster(): TypeCaster {
    return this.registry.caster
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /** @internal called by the registry once the declaration callback returns */
  seal(): void {
    this.sealed = true
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new DeclarationError(`Kind ${this.name} is sealed; attributes can only be declared while defining it`)
    }
  }

  // -- declaration -----------------------------------------------------------

  declareAttribute(name: string, type: string, options: AttributeOptions = {}): this {
    this.assertOpen()

    if (name.trim() === '') {
      throw new DeclarationError(`Attribute name must not be empty (${this.name})`)
    }
    if (!this.caster.isKnownType(type)) {
      throw new DeclarationError(`Wrong type: ${name}: ${type}`)
    }

    const unsupported = Object.keys(options).filter(key => !ALLOWED_ATTRIBUTE_OPTIONS.includes(key))
    if (unsupported.length > 0) {
      throw new DeclarationError(`Option not supported: ${name}: ${unsupported.join(', ')}`)
    }
    if (this.descriptors.has(name)) {
      throw new DeclarationError(`Attribute already declared: ${this.name}.${name}`)
    }

    const descriptor: TypeDescriptor = {
      name,
      type,
      resource: type === RESOURCE_TYPE ? this.resolveKind(name, options.className) : undefined,
      collection: options.collection ?? false,
      collectionElementName: options.collectionElementName,
    }

    this.attributeOrder.push(name)
    this.descriptors.set(name, Object.freeze(descriptor))
    return this
  }

  declareContainer(name: string, attributes: Record<string, ContainerAttributeValue> = {}): this {
    this.assertOpen()
    if (!isXmlName(name)) {
      throw new DeclarationError(`Invalid container name for ${this.name}: ${name}`)
    }

    const rendered: Record<string, string> = {}
    for (const [key, value] of Object.entries(attributes)) {
      if (!isXmlName(key)) {
        throw new DeclarationError(`Invalid container attribute for ${this.name}: ${key}`)
      }
      rendered[key] = String(value)
    }
    this.container = { name, attributes: rendered }
    return this
  }

  declareFromExternalDocumentSchema(source: ExternalSchemaSource): this {
    this.assertOpen()
    const container = source.documentContainer(this.name)
    this.declareContainer(container.name, container.attributes)
    return this.declareFromExternal(source, 'document')
  }

  declareFromExternalComplexTypeSchema(source: ExternalSchemaSource): this {
    this.assertOpen()
    return this.declareFromExternal(source, 'complex_type')
  }

  private declareFromExternal(source: ExternalSchemaSource, mode: ExternalSchemaMode): this {
    for (const attribute of source.resourceAttributes(this.name, mode)) {
      const { required, ...options } = attribute.options
      this.declareAttribute(attribute.name, attribute.type, options)
      if (required) this.validatesPresenceOf(attribute.name)
    }
    return this
  }

  validatesPresenceOf(...names: string[]): this {
    this.assertOpen()
    for (const name of names) {
      if (!this.descriptors.has(name)) {
        throw new DeclarationError(`Cannot validate undeclared attribute: ${this.name}.${name}`)
      }
      this.validationRules.push(presenceRule(name))
    }
    return this
  }

  validateWith(rule: ValidationRule): this {
    this.assertOpen()
    this.validationRules.push(rule)
    return this
  }

  private resolveKind(attribute: string, className: string | undefined): ResourceKind {
    const kindName = className && className.trim() !== '' ? className : normalizeKindName(attribute)
    if (kindName === this.name) return this

    const kind = this.registry.get(kindName)
    if (!kind) {
      throw new DeclarationError(`Unknown resource kind for ${this.name}.${attribute}: ${kindName}`)
    }
    return kind
  }

  // -- reflection ------------------------------------------------------------

  listAttributes(): string[] {
    return [...this.attributeOrder]
  }

  listMappings(): Record<string, TypeDescriptor> {
    const mappings: Record<string, TypeDescriptor> = {}
    for (const name of this.attributeOrder) {
      const descriptor = this.descriptors.get(name)
      if (descriptor) mappings[name] = descriptor
    }
    return mappings
  }

  getDescriptor(name: string): TypeDescriptor | undefined {
    return this.descriptors.get(name)
  }

  containerMetadata(): ContainerMetadata {
    return { name: this.container.name, attributes: { ...this.container.attributes } }
  }

  rules(): readonly ValidationRule[] {
    return this.validationRules
  }

  /**
   * `Order id: integer, items: [LineItem]`
   */
  describe(): string {
    const attributes = this.listAttributes().map(name => {
      const descriptor = this.descriptors.get(name)
      if (!descriptor) return name
      const type = descriptor.resource ? descriptor.resource.name : descriptor.type
      return `${name}: ${descriptor.collection ? `[${type}]` : type}`
    })

    return attributes.length > 0 ? `${this.name} ${attributes.join(', ')}` : this.name
  }

  // -- instances -------------------------------------------------------------

  create(values: AttributeSource = {}): Resource {
    return new Resource(this, values)
  }

  renderMarkup(resource: Resource): string {
    return this.registry.renderMarkup(resource)
  }
}
