import { readFile, access } from 'node:fs/promises'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { projectConfigSchema } from 'shared'
import type { ProjectConfig, Result } from 'shared'

export const CONFIG_FILE = 'recordkit.yaml'

// ajv ships CommonJS; the class sits on the default export
const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ProjectConfig>(projectConfigSchema)

export interface ProjectOptions {
  config?: string
  schema?: string
  kind?: string
}

export interface ResolvedProject {
  schemaPath: string
  kind?: string
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load recordkit.yaml. A missing file is an empty config.
 */
export async function loadProjectConfig(configPath: string): Promise<Result<ProjectConfig, string>> {
  if (!(await fileExists(configPath))) {
    return { ok: true, value: {} }
  }

  let config: unknown
  try {
    const content = await readFile(configPath, 'utf-8')
    config = parseYaml(content) ?? {}
  } catch (error) {
    return { ok: false, error: `Failed to parse ${configPath}: ${error}` }
  }

  if (!validateConfig(config)) {
    const messages = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    return { ok: false, error: `Invalid ${configPath}: ${messages.join(', ')}` }
  }

  return { ok: true, value: config }
}

/**
 * Work out which schema document and root kind a command uses. Flags win over
 * the config file; a schema path from the config is relative to the config.
 */
export async function resolveProject(options: ProjectOptions): Promise<Result<ResolvedProject, string>> {
  const configPath = resolve(options.config ?? join(process.cwd(), CONFIG_FILE))
  const configResult = await loadProjectConfig(configPath)
  if (!configResult.ok) {
    return configResult
  }
  const config = configResult.value

  let schemaPath: string | undefined
  if (options.schema) {
    schemaPath = resolve(options.schema)
  } else if (config.schema) {
    schemaPath = isAbsolute(config.schema) ? config.schema : join(dirname(configPath), config.schema)
  }

  if (!schemaPath) {
    return { ok: false, error: `No schema document given. Pass --schema or set "schema" in ${CONFIG_FILE}.` }
  }

  return { ok: true, value: { schemaPath, kind: options.kind ?? config.kind } }
}
