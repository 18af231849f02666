import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { fileURLToPath } from 'node:url'
import { describeCommand } from '../src/commands/describe.js'
import { validateCommand } from '../src/commands/validate.js'
import { exportCommand } from '../src/commands/export.js'

const exampleDir = fileURLToPath(new URL('../../../examples/invoice', import.meta.url))
const config = join(exampleDir, 'recordkit.yaml')

describe('recordkit commands', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'recordkit-cli-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  describe('describe', () => {
    it('describes every declared kind', async () => {
      const result = await describeCommand(undefined, { config })
      expect(result).toEqual({
        ok: true,
        value: [
          'Party vatNumber: string, name: string',
          'InvoiceLine description: string, quantity: integer, netValue: decimal',
          'Invoice uid: string, issueDate: date, issuer: Party, counterpart: Party, lines: [InvoiceLine], paid: boolean',
        ],
      })
      expect(console.log).toHaveBeenCalledWith('Party vatNumber: string, name: string')
    })

    it('describes a single kind', async () => {
      const result = await describeCommand('Party', { config })
      expect(result).toEqual({ ok: true, value: ['Party vatNumber: string, name: string'] })
    })

    it('reports unknown kinds', async () => {
      const result = await describeCommand('Receipt', { config })
      expect(result).toEqual({ ok: false, error: 'Unknown kind "Receipt". Declared kinds: Party, InvoiceLine, Invoice' })
    })

    it('reports schema declaration errors', async () => {
      const schema = join(tempDir, 'schema.yaml')
      await writeFile(schema, 'complexTypes:\n  Price:\n    elements:\n      - { name: amount, type: money }\n')

      const result = await describeCommand(undefined, { config: join(tempDir, 'recordkit.yaml'), schema })
      expect(result).toEqual({ ok: false, error: `Invalid schema ${schema}: Wrong type: amount: money` })
    })
  })

  describe('validate', () => {
    it('passes a valid record', async () => {
      const result = await validateCommand(join(exampleDir, 'invoice.yaml'), { config })
      expect(result).toEqual({ ok: true, value: { kind: 'Invoice', valid: true, issues: [] } })
    })

    it('reports nested failures with their paths', async () => {
      const result = await validateCommand(join(exampleDir, 'invalid-invoice.yaml'), { config })
      expect(result).toEqual({
        ok: true,
        value: {
          kind: 'Invoice',
          valid: false,
          issues: [
            { path: 'issuer.vatNumber', message: "Vat number can't be blank" },
            { path: 'lines[0].netValue', message: "Net value can't be blank" },
          ],
        },
      })
      expect(console.error).toHaveBeenCalledWith("  ✗ issuer.vatNumber: Vat number can't be blank")
    })

    it('prints a JSON report', async () => {
      await validateCommand(join(exampleDir, 'invalid-invoice.yaml'), { config, json: true })
      const [[output]] = vi.mocked(console.log).mock.calls
      expect(JSON.parse(String(output)).valid).toBe(false)
    })

    it('turns cast failures into errors', async () => {
      const data = join(tempDir, 'bad.yaml')
      await writeFile(data, 'uid: X\nlines:\n  - quantity: many\n')

      const result = await validateCommand(data, { config })
      expect(result).toEqual({ ok: false, error: `Invalid data in ${data}: Cannot cast "many" to integer` })
    })

    it('rejects data files that are not a single record', async () => {
      const data = join(tempDir, 'list.yaml')
      await writeFile(data, '- a\n- b\n')

      const result = await validateCommand(data, { config })
      expect(result).toEqual({ ok: false, error: `${data} must contain a single record` })
    })

    it('needs a root kind', async () => {
      const result = await validateCommand(join(exampleDir, 'invoice.yaml'), {
        config: join(tempDir, 'recordkit.yaml'),
        schema: join(exampleDir, 'schema.yaml'),
      })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toContain('No kind given')
      }
    })
  })

  describe('export', () => {
    it('exports the serializable view as JSON', async () => {
      const result = await exportCommand(join(exampleDir, 'invoice.yaml'), { config })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(JSON.parse(result.value)).toEqual({
          uid: 'INV-0001',
          issueDate: '2024-03-05T00:00:00.000Z',
          issuer: { vatNumber: '000000000', name: 'Example Supplies' },
          lines: [{ description: 'Paper', quantity: 2, netValue: 12.5 }],
          paid: true,
        })
      }
    })

    it('exports XML', async () => {
      const result = await exportCommand(join(exampleDir, 'invoice.yaml'), { config, format: 'xml' })
      expect(result).toEqual({
        ok: true,
        value: [
          '<?xml version="1.0" encoding="UTF-8"?>',
          '<InvoicesDoc xmlns="urn:example:invoices">',
          '  <uid>INV-0001</uid>',
          '  <issueDate>2024-03-05</issueDate>',
          '  <issuer>',
          '    <vatNumber>000000000</vatNumber>',
          '    <name>Example Supplies</name>',
          '  </issuer>',
          '  <lines>',
          '    <line>',
          '      <description>Paper</description>',
          '      <quantity>2</quantity>',
          '      <netValue>12.5</netValue>',
          '    </line>',
          '  </lines>',
          '  <paid>true</paid>',
          '</InvoicesDoc>',
        ].join('\n'),
      })
    })

    it('writes to a file', async () => {
      const out = join(tempDir, 'invoice.xml')
      const result = await exportCommand(join(exampleDir, 'invoice.yaml'), { config, format: 'xml', out })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(await readFile(out, 'utf-8')).toBe(`${result.value}\n`)
      }
      expect(console.log).not.toHaveBeenCalled()
    })

    it('reports files it cannot write', async () => {
      const out = join(tempDir, 'missing', 'invoice.xml')
      const result = await exportCommand(join(exampleDir, 'invoice.yaml'), { config, format: 'xml', out })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.startsWith(`Failed to write ${out}: `)).toBe(true)
      }
      expect(console.error).not.toHaveBeenCalledWith(`Wrote ${out}`)
    })

    it('rejects unknown formats', async () => {
      const result = await exportCommand(join(exampleDir, 'invoice.yaml'), { config, format: 'csv' })
      expect(result).toEqual({ ok: false, error: 'Unknown format "csv". Use one of: json, xml' })
    })
  })
})
