import { DeclarationError } from './errors.js'
import { defaultCaster, type TypeCaster } from './caster.js'
import { ResourceKind } from './kind.js'
import { renderXml, type MarkupRenderer } from './markup.js'
import type { Resource } from './resource.js'

export interface RegistryOptions {
  caster?: TypeCaster
  renderMarkup?: MarkupRenderer
}

/**
 * Kinds by name. A name can be defined once; each kind is sealed as soon as
 * its declaration callback returns.
 */
export class SchemaRegistry {
  readonly caster: TypeCaster
  private readonly renderer: MarkupRenderer
  private readonly kinds = new Map<string, ResourceKind>()

  constructor(options: RegistryOptions = {}) {
    this.caster = options.caster ?? defaultCaster
    this.renderer = options.renderMarkup ?? renderXml
  }

  define(name: string, declare: (kind: ResourceKind) => void = () => {}): ResourceKind {
    if (this.kinds.has(name)) {
      throw new DeclarationError(`Kind already declared: ${name}`)
    }

    const kind = new ResourceKind(name, this)
    declare(kind)
    kind.seal()

    this.kinds.set(name, kind)
    return kind
  }

  get(name: string): ResourceKind | undefined {
    return this.kinds.get(name)
  }

  has(name: string): boolean {
    return this.kinds.has(name)
  }

  /**
   * Like `get`, but a missing kind is an error.
   */
  fetch(name: string): ResourceKind {
    const kind = this.kinds.get(name)
    if (!kind) {
      throw new DeclarationError(`Unknown kind: ${name}`)
    }
    return kind
  }

  list(): ResourceKind[] {
    return [...this.kinds.values()]
  }

  renderMarkup(resource: Resource): string {
    return this.renderer(resource)
  }
}

/** Process-wide registry used by `defineKind`. */
export const registry = new SchemaRegistry()

export function defineKind(name: string, declare?: (kind: ResourceKind) => void): ResourceKind {
  return registry.define(name, declare)
}
