import { TypeCastError } from './errors.js'
import { RESOURCE_TYPE, isPlainObject, type Primitive } from './descriptor.js'
import type { ResourceKind } from './kind.js'
import { Resource } from './resource.js'

export type CastValue = Primitive | Resource | undefined

/**
 * Coerces raw input into typed attribute values. `nestedKind` is only passed
 * for `resource` attributes.
 */
export interface TypeCaster {
  isKnownType(type: string): boolean
  cast(value: unknown, type: string, nestedKind?: ResourceKind): CastValue
}

/**
 * Casts a non-null raw value. Returning `undefined` leaves the attribute unset.
 */
export type PrimitiveCast = (value: unknown, type: string) => Primitive | undefined

const INTEGER_PATTERN = /^[+-]?\d+$/
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

const castString: PrimitiveCast = (value, type) => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value === 'boolean') return String(value)
  if (isValidDate(value)) return value.toISOString()
  throw new TypeCastError(value, type)
}

const castInteger: PrimitiveCast = (value, type) => {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value
  if (typeof value === 'string') {
    const text = value.trim()
    if (text === '') return undefined
    if (INTEGER_PATTERN.test(text)) {
      const parsed = Number.parseInt(text, 10)
      // past 2^53 the parsed value is no longer the written one
      if (Number.isSafeInteger(parsed)) return parsed
    }
  }
  throw new TypeCastError(value, type)
}

const castNumber: PrimitiveCast = (value, type) => {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string') {
    const text = value.trim()
    if (text === '') return undefined
    if (NUMBER_PATTERN.test(text)) {
      const parsed = Number(text)
      if (Number.isFinite(parsed)) return parsed
    }
  }
  throw new TypeCastError(value, type)
}

const castBoolean: PrimitiveCast = (value, type) => {
  if (typeof value === 'boolean') return value
  if (value === 1 || value === 0) return value === 1
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase()
    if (text === '') return undefined
    if (text === 'true' || text === '1') return true
    if (text === 'false' || text === '0') return false
  }
  throw new TypeCastError(value, type)
}

const castDate: PrimitiveCast = (value, type) => {
  if (isValidDate(value)) return new Date(value.getTime())
  if (typeof value === 'string') {
    const text = value.trim()
    if (text === '') return undefined
    const match = text.match(DATE_PATTERN)
    if (match) {
      const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])]
      const date = new Date(Date.UTC(year, month - 1, day))
      // Date.UTC rolls 2024-02-30 over into March
      if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
        return date
      }
    }
  }
  throw new TypeCastError(value, type)
}

const castDateTime: PrimitiveCast = (value, type) => {
  if (isValidDate(value)) return new Date(value.getTime())
  if (typeof value === 'string') {
    const text = value.trim()
    if (text === '') return undefined
    const ms = Date.parse(text)
    if (!Number.isNaN(ms)) return new Date(ms)
  }
  throw new TypeCastError(value, type)
}

export const builtinCasts: Readonly<Record<string, PrimitiveCast>> = {
  string: castString,
  integer: castInteger,
  float: castNumber,
  decimal: castNumber,
  boolean: castBoolean,
  date: castDate,
  datetime: castDateTime,
}

function castResource(value: unknown, nestedKind: ResourceKind | undefined): Resource {
  if (!nestedKind) {
    throw new TypeCastError(value, RESOURCE_TYPE, 'no nested kind given')
  }
  if (value instanceof Resource || isPlainObject(value)) {
    return nestedKind.create(value)
  }
  throw new TypeCastError(value, nestedKind.name)
}

/**
 * Builds a caster over the built-in primitive types plus `custom` ones.
 * Custom casts may override built-ins; `resource` is always handled here.
 */
export function createTypeCaster(custom: Record<string, PrimitiveCast> = {}): TypeCaster {
  const casts = new Map<string, PrimitiveCast>([...Object.entries(builtinCasts), ...Object.entries(custom)])

  return {
    isKnownType(type: string): boolean {
      return type === RESOURCE_TYPE || casts.has(type)
    },

    cast(value: unknown, type: string, nestedKind?: ResourceKind): CastValue {
      if (value === undefined || value === null) return undefined
      if (type === RESOURCE_TYPE) return castResource(value, nestedKind)

      const cast = casts.get(type)
      if (!cast) {
        throw new TypeCastError(value, type, 'unknown type')
      }
      return cast(value, type)
    },
  }
}

export const defaultCaster: TypeCaster = createTypeCaster()
