import type { Result } from 'shared'
import { resolveProject, type ProjectOptions } from '../lib/project-config.js'
import { findKind, loadKinds } from '../lib/workspace.js'

export type DescribeOptions = Omit<ProjectOptions, 'kind'>

export async function describeCommand(kindName: string | undefined, options: DescribeOptions): Promise<Result<string[], string>> {
  const project = await resolveProject(options)
  if (!project.ok) return project

  const registry = loadKinds(project.value.schemaPath)
  if (!registry.ok) return registry

  let kinds = registry.value.list()
  if (kindName) {
    const kind = findKind(registry.value, kindName)
    if (!kind.ok) return kind
    kinds = [kind.value]
  }

  const lines = kinds.map(kind => kind.describe())
  for (const line of lines) {
    console.log(line)
  }
  return { ok: true, value: lines }
}
