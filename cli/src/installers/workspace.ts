import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, RuntimePackagesSpec, WorkspaceSpec } from './types.js'
import { errorText, needCmd, runCommand } from './utils.js'

export type WorkspaceResult = 'cloned' | 'updated' | 'update-failed' | 'clone-failed'

export async function ensureWorkspace(ctx: InstallerContext, ws: WorkspaceSpec): Promise<WorkspaceResult> {
  const opts = { dryRun: ctx.options.dryRun, logger: ctx.logger }
  const checkoutDir = path.join(ws.dir, ws.checkout)
  ctx.logger.info('Setting up workspace...')
  if (!ctx.options.dryRun) await fs.ensureDir(ws.dir)

  if (await fs.pathExists(checkoutDir)) {
    ctx.logger.info(`${ws.checkout} already exists, updating...`)
    try {
      await runCommand('git', ['pull', 'origin', ws.branch], { ...opts, cwd: checkoutDir })
      ctx.logger.ok(`${ws.checkout} updated`)
      return 'updated'
    } catch (error) {
      ctx.logger.warn(`Failed to update ${ws.checkout}: ${errorText(error)}`)
      return 'update-failed'
    }
  }

  try {
    await runCommand('git', ['clone', ws.repo, checkoutDir], opts)
    ctx.logger.ok(`${ws.checkout} cloned into ${checkoutDir}`)
    return 'cloned'
  } catch (error) {
    ctx.logger.err(`Failed to clone ${ws.repo}: ${errorText(error)}`)
    ctx.logger.err('Please check your internet connection and re-run')
    return 'clone-failed'
  }
}

export interface BatchResult {
  label: string
  ok: boolean
}

export async function installRuntimePackages(ctx: InstallerContext, spec: RuntimePackagesSpec): Promise<BatchResult[]> {
  const opts = { dryRun: ctx.options.dryRun, logger: ctx.logger }
  if (!ctx.options.dryRun && !(await needCmd(spec.interpreter))) {
    ctx.logger.warn(`${spec.interpreter} not found; skipping Python packages`)
    return spec.batches.map((batch) => ({ label: batch.label, ok: false }))
  }

  ctx.logger.info('Installing Python packages (this may take a few minutes)...')
  try {
    await runCommand(spec.interpreter, ['-m', 'pip', 'install', '--upgrade', 'pip', '--user'], opts)
  } catch {
    ctx.logger.warn('pip upgrade failed (continuing anyway)')
  }

  const results: BatchResult[] = []
  for (const batch of spec.batches) {
    ctx.logger.info(`Installing ${batch.label.toLowerCase()}...`)
    try {
      await runCommand(spec.interpreter, ['-m', 'pip', 'install', '--user', ...batch.packages], opts)
      ctx.logger.ok(`${batch.label} installed`)
      results.push({ label: batch.label, ok: true })
    } catch {
      ctx.logger.err(`Failed to install some ${batch.label.toLowerCase()}`)
      results.push({ label: batch.label, ok: false })
    }
  }
  return results
}
