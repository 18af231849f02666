export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}

export type ExternalSchemaMode = 'document' | 'complex_type'

export interface SchemaElement {
  name: string
  type: string
  className?: string
  collection?: boolean
  collectionElementName?: string
  required?: boolean
}

export interface SchemaContainer {
  name: string
  attributes?: Record<string, string>
}

export interface SchemaDocumentKind {
  container?: SchemaContainer
  elements: SchemaElement[]
}

export interface SchemaDocument {
  documents?: Record<string, SchemaDocumentKind>
  complexTypes?: Record<string, SchemaDocumentKind>
}

export interface ProjectConfig {
  schema?: string
  kind?: string
}
