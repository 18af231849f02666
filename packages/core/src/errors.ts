/**
 * Base class for failures raised by the schema engine. Validation problems are
 * never thrown; they are reported through `ValidationResult`.
 */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Raised while a kind is being declared: unknown type, unsupported option,
 * duplicate attribute, unresolvable nested kind.
 */
export class DeclarationError extends SchemaError {}

export class UnknownAttributeError extends SchemaError {
  readonly kindName: string
  readonly attribute: string

  constructor(kindName: string, attribute: string) {
    super(`Unknown attribute for ${kindName}: ${attribute}`)
    this.kindName = kindName
    this.attribute = attribute
  }
}

export class TypeCastError extends SchemaError {
  readonly value: unknown
  readonly type: string

  constructor(value: unknown, type: string, detail?: string) {
    super(`Cannot cast ${describeValue(value)} to ${type}${detail ? `: ${detail}` : ''}`)
    this.value = value
    this.type = type
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value)
  if (value instanceof Date) return `Date(${Number.isNaN(value.getTime()) ? 'invalid' : value.toISOString()})`
  if (Array.isArray(value)) return 'array'
  if (value === null) return 'null'
  if (typeof value === 'object') return 'object'
  return String(value)
}
