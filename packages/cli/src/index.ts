#!/usr/bin/env node
import { Command } from 'commander'
import { describeCommand } from './commands/describe.js'
import { validateCommand } from './commands/validate.js'
import { exportCommand } from './commands/export.js'

const program = new Command()

program
  .name('recordkit')
  .description('Describe, validate and export records declared in a schema document')
  .version('0.1.0')

program
  .command('describe [kind]')
  .description('Print the attributes of one kind, or of every declared kind')
  .option('--config <path>', 'Project config file (default: ./recordkit.yaml)')
  .option('--schema <path>', 'Schema document')
  .action(async (kind, options) => {
    const result = await describeCommand(kind, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('validate <data>')
  .description('Validate a YAML or JSON record against its kind')
  .option('--config <path>', 'Project config file (default: ./recordkit.yaml)')
  .option('--schema <path>', 'Schema document')
  .option('--kind <name>', 'Root kind of the record')
  .option('--json', 'Output as JSON')
  .action(async (data, options) => {
    const result = await validateCommand(data, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.valid) {
      process.exit(1)
    }
  })

program
  .command('export <data>')
  .description('Export a YAML or JSON record as JSON or XML')
  .option('--config <path>', 'Project config file (default: ./recordkit.yaml)')
  .option('--schema <path>', 'Schema document')
  .option('--kind <name>', 'Root kind of the record')
  .option('--format <format>', 'Output format: json, xml', 'json')
  .option('--out <path>', 'Write to a file instead of stdout')
  .action(async (data, options) => {
    const result = await exportCommand(data, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program.parse()
