import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import { runInstaller } from '../installers/main.js'
import type { InstallerOptions } from '../installers/types.js'
import { isInteractive } from '../installers/utils.js'
import { findRepoRoot } from '../lib/repoRoot.js'

const repoRoot = findRepoRoot()

export const installArgs = {
  yes: { type: 'boolean', description: 'Non-interactive; run remote installer scripts without asking' },
  'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
  'skip-confirmation': { type: 'boolean', description: 'Skip prompts' },
  'skip-verify': { type: 'boolean', description: 'Skip the verification pass after installing' },
  manifest: { type: 'string', description: 'Path to a tools.toml manifest (default: bundled, or $DEVSTRAP_MANIFEST)' }
} as const

export function toInstallerOptions(args: Record<string, unknown>): InstallerOptions {
  const manifest = typeof args.manifest === 'string' && args.manifest.trim() ? args.manifest.trim() : undefined
  return {
    dryRun: args['dry-run'] === true,
    assumeYes: args.yes === true,
    skipConfirmation: args['skip-confirmation'] === true,
    skipVerify: args['skip-verify'] === true,
    manifestPath: manifest
  }
}

export const installCommand = defineCommand({
  meta: {
    name: 'install',
    description: 'Install the declared tools, write configuration and verify the result'
  },
  args: installArgs,
  async run({ args }) {
    const options = toInstallerOptions(args)

    if (isInteractive(options)) {
      p.intro('devstrap · Install')
      p.note([
        'This will install missing tools with Homebrew and npm, build Ghostty from source,',
        'clone the MCP workspace and append PATH exports and aliases to your shell profiles.',
        'Tools that are already present are left untouched.'
      ].join('\n'))
      const proceed = await p.confirm({ message: 'Continue?', initialValue: true })
      if (p.isCancel(proceed) || !proceed) return p.cancel('Install aborted')
    }

    const result = await runInstaller(options, repoRoot)
    if (result.status === 'aborted') {
      process.exitCode = 1
      return
    }
    if (isInteractive(options)) p.outro('Setup complete! Restart your terminal to use all features.')
  }
})
