import { defineCommand } from 'citty'
import { createActionContext } from '../actions/context.js'
import { loadContextManifest } from '../installers/main.js'
import { buildFragments } from '../installers/fragments.js'
import { applyConfig, displayPath } from '../installers/configWriter.js'

const manifestArg = { type: 'string', description: 'Path to a tools.toml manifest' } as const

export const configCommand = defineCommand({
  meta: { name: 'config', description: 'Manage shell profile and application config files' },
  subCommands: {
    apply: defineCommand({
      meta: { name: 'apply', description: 'Write config files and profile entries without installing tools' },
      args: {
        'dry-run': { type: 'boolean', description: 'Print actions without making changes' },
        manifest: manifestArg
      },
      async run({ args }) {
        const manifestPath = typeof args.manifest === 'string' && args.manifest ? args.manifest : undefined
        const ctx = await createActionContext({ dryRun: args['dry-run'] === true, manifestPath }, 'config')
        const manifest = await loadContextManifest(ctx)
        const results = await applyConfig(ctx, await buildFragments(ctx, manifest))
        if (results.some((r) => r.action === 'failed')) process.exitCode = 1
      }
    }),
    list: defineCommand({
      meta: { name: 'list', description: 'List config targets and how they are written' },
      args: { manifest: manifestArg },
      async run({ args }) {
        const manifestPath = typeof args.manifest === 'string' && args.manifest ? args.manifest : undefined
        const ctx = await createActionContext({ manifestPath }, 'config')
        const manifest = await loadContextManifest(ctx)
        const fragments = await buildFragments(ctx, manifest)
        const lines = fragments.map((f) => `${f.mode.padEnd(9)} ${displayPath(ctx, f.target)}${f.marker ? `  [${f.marker}]` : ''}`)
        process.stdout.write(lines.join('\n') + '\n')
      }
    })
  }
})
