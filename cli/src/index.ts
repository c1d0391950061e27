import { defineCommand } from 'citty'
import { installCommand } from './commands/install.js'
import { verifyCommand } from './commands/verify.js'
import { configCommand } from './commands/config.js'
import { toolsCommand } from './commands/tools.js'

export const root = defineCommand({
  meta: {
    name: 'devstrap',
    version: '0.1.0',
    description: 'Bootstrap a macOS development machine: tools, workspace, shell profile and app config'
  },
  subCommands: {
    install: installCommand,
    verify: verifyCommand,
    config: configCommand,
    tools: toolsCommand
  }
})

const PASSTHROUGH_FLAGS = new Set(['--help', '-h', '--version', '-v'])

// `devstrap` with no subcommand runs the installer.
export function withDefaultCommand(rawArgs: string[]): string[] {
  const first = rawArgs[0]
  if (first === undefined) return ['install']
  if (first.startsWith('-') && !PASSTHROUGH_FLAGS.has(first)) return ['install', ...rawArgs]
  return rawArgs
}
