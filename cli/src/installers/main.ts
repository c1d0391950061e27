import * as path from 'path'
import type { FragmentResult, InstallationRecord, InstallerContext, InstallerOptions, Manifest, VerifyReport } from './types.js'
import { createActionContext, PROJECT } from '../actions/context.js'
import { loadManifest, resolveManifestPath, USER_CONFIG_FILE } from './manifest.js'
import { augmentSessionPath, checkPreconditions, checkXcodeTools } from './probe.js'
import { installAll } from './ensureInstalled.js'
import { ensureWorkspace, installRuntimePackages } from './workspace.js'
import { buildFragments, launcherPath } from './fragments.js'
import { applyConfig, displayPath } from './configWriter.js'
import { verify } from './verify.js'
import { printHints, printInstallSummary, printVerifyReport } from './report.js'

export type InstallRunResult =
  | { status: 'aborted'; reason: string }
  | { status: 'completed'; records: InstallationRecord[]; fragments: FragmentResult[]; report?: VerifyReport }

export async function runInstaller(options: InstallerOptions, rootDir: string): Promise<InstallRunResult> {
  const ctx = await createActionContext(options, 'install', rootDir)
  ctx.logger.info(`==> ${PROJECT} installer`)
  ctx.logger.info(`Log: ${ctx.logFile}`)
  try {
    const manifest = await loadContextManifest(ctx)
    return await orchestrate(ctx, manifest)
  } catch (error) {
    ctx.logger.err(`Installation failed: ${error}`)
    throw error
  }
}

export function loadContextManifest(ctx: InstallerContext): Promise<Manifest> {
  const file = resolveManifestPath(ctx.rootDir, ctx.options.manifestPath)
  return loadManifest(file, ctx.homeDir, path.join(ctx.logDir, USER_CONFIG_FILE))
}

// Prober -> Installer -> workspace -> Configuration Writer -> Verifier -> Reporter.
export async function orchestrate(ctx: InstallerContext, manifest: Manifest): Promise<InstallRunResult> {
  const { logger } = ctx

  const pre = await checkPreconditions(ctx, manifest.preconditions)
  if (!pre.ok) return abort(ctx, pre.reason, pre.hint)
  const xcode = await checkXcodeTools(ctx)
  if (!xcode.ok) return abort(ctx, xcode.reason, xcode.hint)

  logger.info('Validating PATH...')
  await augmentSessionPath(ctx)

  logger.info('Installing development tools...')
  const records: InstallationRecord[] = [
    { name: 'xcode-clt', displayName: 'Xcode Command Line Tools', status: 'already-present', path: xcode.path },
    ...(await installAll(ctx, manifest.tools))
  ]

  await ensureWorkspace(ctx, manifest.workspace)
  await installRuntimePackages(ctx, manifest.runtimePackages)

  logger.info('Writing configuration...')
  const fragments = await applyConfig(ctx, await buildFragments(ctx, manifest))

  printInstallSummary(logger, records)

  let report: VerifyReport | undefined
  if (!ctx.options.skipVerify) {
    report = await verify(manifest)
    printVerifyReport(logger, report)
    printHints(logger, report)
  }

  printNextSteps(ctx, manifest)
  return report ? { status: 'completed', records, fragments, report } : { status: 'completed', records, fragments }
}

function abort(ctx: InstallerContext, reason: string, hint?: string): InstallRunResult {
  ctx.logger.err(`Error: ${reason}`)
  if (hint) ctx.logger.info(hint)
  return { status: 'aborted', reason }
}

function printNextSteps(ctx: InstallerContext, manifest: Manifest): void {
  const { logger } = ctx
  logger.ok('Dev environment ready. Open a new shell or \'source ~/.zshrc\' to load aliases.')
  logger.info('Next steps:')
  logger.info('  1) source ~/.zshrc        # or restart the terminal')
  logger.info('  2) gemini                 # log in to Gemini CLI')
  logger.info('  3) docker-start           # launch Docker Desktop if needed')
  logger.info('  4) claude                 # launch Claude Code CLI')
  logger.info(`  5) ${displayPath(ctx, launcherPath(manifest))}   # start the ${manifest.workspace.serverName} server`)
}
