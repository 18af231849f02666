import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import type { Result } from 'shared'
import {
  DeclarationError,
  SchemaError,
  SchemaRegistry,
  defineKindsFromDocument,
  loadSchemaDocument,
  type Resource,
  type ResourceKind,
} from 'recordkit'
import { resolveProject, type ProjectOptions } from './project-config.js'

/**
 * Declare every kind of a schema document in a fresh registry.
 */
export function loadKinds(schemaPath: string): Result<SchemaRegistry, string> {
  const document = loadSchemaDocument(schemaPath)
  if (!document.ok) {
    return { ok: false, error: document.error.map(e => `${e.path}: ${e.message}`).join(', ') }
  }

  const registry = new SchemaRegistry()
  try {
    defineKindsFromDocument(registry, document.value)
  } catch (error) {
    if (error instanceof DeclarationError) {
      return { ok: false, error: `Invalid schema ${schemaPath}: ${error.message}` }
    }
    throw error
  }
  return { ok: true, value: registry }
}

export function findKind(registry: SchemaRegistry, name: string | undefined): Result<ResourceKind, string> {
  if (!name) {
    return { ok: false, error: 'No kind given. Pass --kind or set "kind" in recordkit.yaml.' }
  }
  const kind = registry.get(name)
  if (!kind) {
    const known = registry.list().map(k => k.name).join(', ')
    return { ok: false, error: `Unknown kind "${name}". Declared kinds: ${known}` }
  }
  return { ok: true, value: kind }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read a YAML or JSON data file holding one record.
 */
export async function loadRecordData(dataPath: string): Promise<Result<Record<string, unknown>, string>> {
  let data: unknown
  try {
    data = parseYaml(await readFile(dataPath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: `Failed to read ${dataPath}: ${error}` }
  }

  if (!isRecord(data)) {
    return { ok: false, error: `${dataPath} must contain a single record` }
  }
  return { ok: true, value: data }
}

/**
 * Resolve the project, declare its kinds and build the root record from a
 * data file. Cast failures come back as errors.
 */
export async function loadRecord(dataPath: string, options: ProjectOptions): Promise<Result<Resource, string>> {
  const project = await resolveProject(options)
  if (!project.ok) return project

  const registry = loadKinds(project.value.schemaPath)
  if (!registry.ok) return registry

  const kind = findKind(registry.value, project.value.kind)
  if (!kind.ok) return kind

  const data = await loadRecordData(dataPath)
  if (!data.ok) return data

  try {
    return { ok: true, value: kind.value.create(data.value) }
  } catch (error) {
    if (error instanceof SchemaError) {
      return { ok: false, error: `Invalid data in ${dataPath}: ${error.message}` }
    }
    throw error
  }
}
