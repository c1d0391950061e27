import { defineCommand } from 'citty'
import { createActionContext } from '../actions/context.js'
import { loadContextManifest } from '../installers/main.js'
import { verify } from '../installers/verify.js'
import { printHints, printVerifyReport } from '../installers/report.js'

// Advisory: failed checks are reported, never turned into a failing exit code,
// so `devstrap verify` can sit inside a larger script.
export const verifyCommand = defineCommand({
  meta: { name: 'verify', description: 'Check installed tools, runtime packages and config directories' },
  args: {
    manifest: { type: 'string', description: 'Path to a tools.toml manifest' }
  },
  async run({ args }) {
    const manifestPath = typeof args.manifest === 'string' && args.manifest ? args.manifest : undefined
    const ctx = await createActionContext({ manifestPath }, 'verify')
    const manifest = await loadContextManifest(ctx)

    if (ctx.platform !== manifest.preconditions.platform) {
      ctx.logger.err(`Not running on ${manifest.preconditions.platform === 'darwin' ? 'macOS' : manifest.preconditions.platform}`)
      process.exitCode = 1
      return
    }

    const report = await verify(manifest)
    printVerifyReport(ctx.logger, report)
    printHints(ctx.logger, report)
  }
})
