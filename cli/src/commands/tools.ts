import { defineCommand } from 'citty'
import { createActionContext } from '../actions/context.js'
import { loadContextManifest } from '../installers/main.js'
import type { ToolSpec } from '../installers/types.js'

export function formatToolRow(tool: ToolSpec): string {
  const kind = tool.required ? 'required' : 'optional'
  return `${tool.name.padEnd(14)} ${kind.padEnd(9)} ${tool.install.kind.padEnd(7)} ${tool.displayName}`
}

export const toolsCommand = defineCommand({
  meta: { name: 'tools', description: 'List the declared tool table' },
  args: {
    manifest: { type: 'string', description: 'Path to a tools.toml manifest' }
  },
  async run({ args }) {
    const manifestPath = typeof args.manifest === 'string' && args.manifest ? args.manifest : undefined
    const ctx = await createActionContext({ manifestPath }, 'tools')
    const manifest = await loadContextManifest(ctx)
    process.stdout.write(manifest.tools.map(formatToolRow).join('\n') + '\n')
  }
})
