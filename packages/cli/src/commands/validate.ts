import type { Result, ValidationError } from 'shared'
import { collectIssues } from 'recordkit'
import type { ProjectOptions } from '../lib/project-config.js'
import { loadRecord } from '../lib/workspace.js'

export interface ValidateOptions extends ProjectOptions {
  json?: boolean
}

export interface ValidateReport {
  kind: string
  valid: boolean
  issues: ValidationError[]
}

export async function validateCommand(dataPath: string, options: ValidateOptions): Promise<Result<ValidateReport, string>> {
  const record = await loadRecord(dataPath, options)
  if (!record.ok) return record

  const result = record.value.validate()
  const report: ValidateReport = {
    kind: record.value.kind.name,
    valid: result.valid,
    issues: collectIssues(result),
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2))
  } else {
    console.error(`\nValidation ${report.kind}: ${report.valid ? '✅ PASSED' : '❌ FAILED'}\n`)
    for (const issue of report.issues) {
      console.error(`  ✗ ${issue.path}: ${issue.message}`)
    }
    if (report.issues.length === 0) {
      console.error('  All checks passed.')
    }
    console.error('')
  }

  return { ok: true, value: report }
}
