import type { ValidationError } from 'shared'
import { humanize, type AttributeValue } from './descriptor.js'
import type { Resource } from './resource.js'

export const BLANK = 'blank'
export const INVALID_RESOURCE = 'invalid_resource'

const DEFAULT_MESSAGES: Record<string, string> = {
  [BLANK]: "can't be blank",
  [INVALID_RESOURCE]: 'is invalid',
}

export interface AttributeError {
  attribute: string
  kind: string
  message: string
}

export type ValidationRule = (record: Resource, errors: ValidationErrors) => void

/**
 * Errors keyed by attribute name, in the order they were first added.
 */
export class ValidationErrors {
  private readonly entries = new Map<string, AttributeError[]>()

  add(attribute: string, kind: string, message?: string): void {
    const entry = { attribute, kind, message: message ?? DEFAULT_MESSAGES[kind] ?? 'is invalid' }
    const existing = this.entries.get(attribute)
    if (existing) {
      existing.push(entry)
    } else {
      this.entries.set(attribute, [entry])
    }
  }

  on(attribute: string): AttributeError[] {
    return [...(this.entries.get(attribute) ?? [])]
  }

  messagesFor(attribute: string): string[] {
    return this.on(attribute).map(entry => entry.message)
  }

  has(attribute: string): boolean {
    return this.entries.has(attribute)
  }

  attributes(): string[] {
    return [...this.entries.keys()]
  }

  get size(): number {
    let count = 0
    for (const list of this.entries.values()) count += list.length
    return count
  }

  isEmpty(): boolean {
    return this.entries.size === 0
  }

  all(): AttributeError[] {
    return [...this.entries.values()].flat()
  }

  fullMessages(): string[] {
    return this.all().map(fullMessage)
  }

  toJSON(): Record<string, string[]> {
    const json: Record<string, string[]> = {}
    for (const attribute of this.entries.keys()) {
      json[attribute] = this.messagesFor(attribute)
    }
    return json
  }
}

export interface NestedValidation {
  attribute: string
  /** Position inside a collection attribute; absent for single resources. */
  index?: number
  result: ValidationResult
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationErrors
  nested: NestedValidation[]
}

export function fullMessage(error: AttributeError): string {
  return `${humanize(error.attribute)} ${error.message}`
}

export function isBlank(value: AttributeValue): boolean {
  if (value === undefined) return true
  if (typeof value === 'string') return value.trim() === ''
  if (Array.isArray(value)) return value.length === 0
  return false
}

export function presenceRule(attribute: string): ValidationRule {
  return (record, errors) => {
    if (isBlank(record.get(attribute))) {
      errors.add(attribute, BLANK)
    }
  }
}

/**
 * Runs the kind's own rules, then validates every nested resource. Each nested
 * failure is folded into the parent under the attribute holding it.
 * Recomputed on every call; nothing is cached on the instance.
 */
export function validate(resource: Resource): ValidationResult {
  const errors = new ValidationErrors()
  for (const rule of resource.kind.rules()) {
    rule(resource, errors)
  }

  const nested: NestedValidation[] = []
  for (const [attribute, children] of resource.resources()) {
    const collection = resource.kind.getDescriptor(attribute)?.collection ?? false
    children.forEach((child, index) => {
      const result = validate(child)
      nested.push(collection ? { attribute, index, result } : { attribute, result })
      if (!result.valid) {
        errors.add(attribute, INVALID_RESOURCE, result.errors.fullMessages().join(', '))
      }
    })
  }

  return { valid: errors.isEmpty(), errors, nested }
}

/**
 * Flattens a result into path-attributed errors, e.g. `lines[1].sku`.
 * Nested failures are reported at their own path instead of the folded
 * parent entry.
 */
export function collectIssues(result: ValidationResult, prefix = ''): ValidationError[] {
  const issues: ValidationError[] = []

  for (const error of result.errors.all()) {
    if (error.kind === INVALID_RESOURCE) continue
    issues.push({ path: `${prefix}${error.attribute}`, message: fullMessage(error) })
  }

  for (const { attribute, index, result: child } of result.nested) {
    if (child.valid) continue
    const path = index === undefined ? `${prefix}${attribute}.` : `${prefix}${attribute}[${index}].`
    issues.push(...collectIssues(child, path))
  }

  return issues
}
