import { writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { Result } from 'shared'
import type { ProjectOptions } from '../lib/project-config.js'
import { loadRecord } from '../lib/workspace.js'

export const EXPORT_FORMATS = ['json', 'xml'] as const
export type ExportFormat = typeof EXPORT_FORMATS[number]

export interface ExportOptions extends ProjectOptions {
  format?: string
  out?: string
}

function isExportFormat(format: string): format is ExportFormat {
  return EXPORT_FORMATS.some(f => f === format)
}

export async function exportCommand(dataPath: string, options: ExportOptions): Promise<Result<string, string>> {
  const format = options.format ?? 'json'
  if (!isExportFormat(format)) {
    return { ok: false, error: `Unknown format "${format}". Use one of: ${EXPORT_FORMATS.join(', ')}` }
  }

  const record = await loadRecord(dataPath, options)
  if (!record.ok) return record

  const output = format === 'xml'
    ? record.value.renderMarkup()
    : JSON.stringify(record.value.serializableView(), null, 2)

  if (options.out) {
    const outPath = resolve(options.out)
    try {
      await writeFile(outPath, `${output}\n`)
    } catch (error) {
      return { ok: false, error: `Failed to write ${outPath}: ${error}` }
    }
    console.error(`Wrote ${outPath}`)
  } else {
    console.log(output)
  }

  return { ok: true, value: output }
}
