import { describe, it, expect } from 'vitest'
import type { SchemaDocument, Result } from '../src/types.js'
import { schemaDocumentSchema } from '../src/schema.js'

describe('types', () => {
  it('SchemaDocument type accepts a complex type declaration', () => {
    const doc: SchemaDocument = {
      complexTypes: {
        Line: { elements: [{ name: 'sku', type: 'string', required: true }] },
      },
    }
    expect(doc.complexTypes?.Line.elements[0].name).toBe('sku')
  })

  it('Result type works for success', () => {
    const result: Result<string> = { ok: true, value: 'hello' }
    expect(result.ok).toBe(true)
  })

  it('Result type works for failure', () => {
    const result: Result<string> = { ok: false, error: new Error('fail') }
    expect(result.ok).toBe(false)
  })

  it('schema document schema rejects unknown top-level keys', () => {
    expect(schemaDocumentSchema.additionalProperties).toBe(false)
    expect(Object.keys(schemaDocumentSchema.properties)).toEqual(['documents', 'complexTypes'])
  })
})
