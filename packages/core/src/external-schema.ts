import { readFileSync } from 'node:fs'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { schemaDocumentSchema } from 'shared'
import type {
  ExternalSchemaMode,
  Result,
  SchemaDocument,
  SchemaDocumentKind,
  SchemaElement,
  ValidationError,
} from 'shared'
import { DeclarationError } from './errors.js'
import { RESOURCE_TYPE, normalizeKindName, type AttributeOptions, type ContainerMetadata } from './descriptor.js'
import type { ResourceKind } from './kind.js'
import type { SchemaRegistry } from './registry.js'

// ajv ships CommonJS; the class sits on the default export
const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateDocument = ajv.compile<SchemaDocument>(schemaDocumentSchema)

export interface ExternalAttribute {
  name: string
  type: string
  options: AttributeOptions & { required?: boolean }
}

/**
 * Where bulk declarations come from: container metadata for document kinds and
 * attribute lists for document and complex-type kinds.
 */
export interface ExternalSchemaSource {
  documentContainer(kindName: string): ContainerMetadata
  resourceAttributes(kindName: string, mode: ExternalSchemaMode): ExternalAttribute[]
}

export function parseSchemaDocument(text: string, path = 'schema'): Result<SchemaDocument, ValidationError[]> {
  let raw: unknown
  try {
    raw = parseYaml(text)
  } catch (error) {
    return { ok: false, error: [{ path, message: `Failed to parse schema document: ${error}` }] }
  }

  if (!validateDocument(raw)) {
    const schemaErrors = (validateDocument.errors ?? []).map(e => ({
      path: `${path}${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  return { ok: true, value: raw }
}

export function loadSchemaDocument(filePath: string): Result<SchemaDocument, ValidationError[]> {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (error) {
    return { ok: false, error: [{ path: filePath, message: `Failed to read schema document: ${error}` }] }
  }
  return parseSchemaDocument(content, filePath)
}

function lookup(section: Record<string, SchemaDocumentKind> | undefined, name: string): SchemaDocumentKind | undefined {
  if (!section || !Object.hasOwn(section, name)) return undefined
  return section[name]
}

function toExternalAttribute(element: SchemaElement): ExternalAttribute {
  const options: ExternalAttribute['options'] = {}
  if (element.className !== undefined) options.className = element.className
  if (element.collection !== undefined) options.collection = element.collection
  if (element.collectionElementName !== undefined) options.collectionElementName = element.collectionElementName
  if (element.required !== undefined) options.required = element.required
  return { name: element.name, type: element.type, options }
}

/**
 * Serves declarations out of a parsed schema document.
 */
export class SchemaDocumentSource implements ExternalSchemaSource {
  readonly document: SchemaDocument

  constructor(document: SchemaDocument) {
    this.document = document
  }

  documentContainer(kindName: string): ContainerMetadata {
    const kind = lookup(this.document.documents, kindName)
    if (!kind) {
      throw new DeclarationError(`No document declaration for ${kindName}`)
    }
    return {
      name: kind.container?.name ?? kindName,
      attributes: { ...kind.container?.attributes },
    }
  }

  resourceAttributes(kindName: string, mode: ExternalSchemaMode): ExternalAttribute[] {
    const section = mode === 'document' ? this.document.documents : this.document.complexTypes
    const kind = lookup(section, kindName)
    if (!kind) {
      throw new DeclarationError(`No ${mode === 'document' ? 'document' : 'complex type'} declaration for ${kindName}`)
    }
    return kind.elements.map(toExternalAttribute)
  }
}

interface PendingKind {
  name: string
  mode: ExternalSchemaMode
  dependencies: string[]
}

function nestedKindNames(kind: SchemaDocumentKind): string[] {
  return kind.elements
    .filter(element => element.type === RESOURCE_TYPE)
    .map(element => element.className ?? normalizeKindName(element.name))
}

/**
 * Declares every kind of `document` in `registry`, nested kinds before the
 * kinds that reference them. Self-references are allowed; any other cycle is
 * a declaration error.
 */
export function defineKindsFromDocument(registry: SchemaRegistry, document: SchemaDocument): ResourceKind[] {
  const pending = new Map<string, PendingKind>()

  for (const [mode, section] of [
    ['complex_type', document.complexTypes],
    ['document', document.documents],
  ] as const) {
    for (const [name, kind] of Object.entries(section ?? {})) {
      if (pending.has(name)) {
        throw new DeclarationError(`Kind declared both as document and complex type: ${name}`)
      }
      pending.set(name, { name, mode, dependencies: nestedKindNames(kind) })
    }
  }

  const source = new SchemaDocumentSource(document)
  const defined: ResourceKind[] = []
  const done = new Set<string>()
  const visiting: string[] = []

  const visit = (entry: PendingKind): void => {
    if (done.has(entry.name)) return
    if (visiting.includes(entry.name)) {
      const cycle = [...visiting.slice(visiting.indexOf(entry.name)), entry.name]
      throw new DeclarationError(`Circular resource reference: ${cycle.join(' -> ')}`)
    }

    visiting.push(entry.name)
    for (const dependency of entry.dependencies) {
      const next = pending.get(dependency)
      if (next && dependency !== entry.name) visit(next)
    }
    visiting.pop()

    defined.push(registry.define(entry.name, kind => {
      if (entry.mode === 'document') {
        kind.declareFromExternalDocumentSchema(source)
      } else {
        kind.declareFromExternalComplexTypeSchema(source)
      }
    }))
    done.add(entry.name)
  }

  for (const entry of pending.values()) visit(entry)
  return defined
}
