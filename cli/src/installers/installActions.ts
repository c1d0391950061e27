import fs from 'fs-extra'
import * as path from 'path'
import * as p from '@clack/prompts'
import type { FailureKind, InstallOutcome, InstallerContext, ToolSpec } from './types.js'
import { errorText, isInteractive, needCmd, runCommand } from './utils.js'
import { buildFromSource } from './buildFromSource.js'
import { prependToPath } from './probe.js'

// Where a freshly installed binary can land before the shell profile picks it up.
const SCRIPT_INSTALL_PREFIXES = ['/opt/homebrew/bin', '/usr/local/bin']

export interface InstallSession {
  brewUpdated: boolean
}

export function createInstallSession(): InstallSession {
  return { brewUpdated: false }
}

export async function runInstallAction(
  ctx: InstallerContext,
  tool: ToolSpec,
  session: InstallSession
): Promise<InstallOutcome> {
  const opts = { dryRun: ctx.options.dryRun, logger: ctx.logger }
  const spec = tool.install

  switch (spec.kind) {
    case 'brew':
      await ensureBrewUpdated(ctx, session)
      return attempt(() => runCommand('brew', ['install', spec.formula], opts), 'package-manager', `brew install ${spec.formula} failed`)
    case 'cask':
      await ensureBrewUpdated(ctx, session)
      return attempt(
        () => runCommand('brew', ['install', '--cask', spec.cask], opts),
        'package-manager',
        `brew install --cask ${spec.cask} failed`
      )
    case 'npm': {
      ctx.logger.info(`Installing via npm (${spec.pkg})...`)
      const viaNpm = await attempt(() => runCommand('npm', ['install', '-g', spec.pkg], opts), 'package-manager', `npm install -g ${spec.pkg} failed`)
      if (viaNpm.ok || !spec.fallbackScript) return viaNpm
      ctx.logger.info('npm installation failed, trying the vendor install script...')
      return runRemoteScript(ctx, spec.fallbackScript, `${tool.displayName} installer`, 'pipe')
    }
    case 'script': {
      const outcome = await runRemoteScript(ctx, spec.url, `${tool.displayName} installer`, 'subshell')
      if (outcome.ok && tool.probe.kind === 'command') {
        await exposeScriptInstall(ctx, tool.probe.bins)
      }
      return outcome
    }
    case 'source':
      return buildFromSource(ctx, spec)
    case 'clone':
      return attempt(
        async () => {
          await runCommand('git', ['clone', spec.repo, spec.dest], opts)
          // Starter configs are meant to be owned by the user, not tracked upstream.
          if (!ctx.options.dryRun) await fs.remove(path.join(spec.dest, '.git'))
        },
        'download',
        `git clone ${spec.repo} failed`
      )
  }
}

async function ensureBrewUpdated(ctx: InstallerContext, session: InstallSession): Promise<void> {
  if (session.brewUpdated) return
  session.brewUpdated = true
  if (!ctx.options.dryRun && !(await needCmd('brew'))) return
  ctx.logger.info('Updating Homebrew...')
  try {
    await runCommand('brew', ['update'], { dryRun: ctx.options.dryRun, logger: ctx.logger })
  } catch {
    ctx.logger.warn('Homebrew update failed (continuing anyway)')
  }
}

async function runRemoteScript(
  ctx: InstallerContext,
  url: string,
  label: string,
  style: 'subshell' | 'pipe'
): Promise<InstallOutcome> {
  if (isInteractive(ctx.options)) {
    const answer = await p.confirm({
      message: `This will download and run the ${label} script (${url}). Continue?`,
      initialValue: true
    })
    if (p.isCancel(answer) || !answer) {
      return { ok: false, kind: 'declined', message: `${label} declined by user` }
    }
  }
  const script =
    style === 'subshell'
      ? `script="$(curl -fsSL '${url}')" || exit 1; /bin/bash -c "$script"`
      : `set -o pipefail; curl -fsSL '${url}' | bash`
  return attempt(
    () => runCommand('/bin/bash', ['-c', script], { dryRun: ctx.options.dryRun, logger: ctx.logger, env: { NONINTERACTIVE: '1' } }),
    'download',
    `${label} failed`
  )
}

async function exposeScriptInstall(ctx: InstallerContext, bins: string[]): Promise<void> {
  for (const bin of bins) {
    if (await needCmd(bin)) return
    for (const prefix of SCRIPT_INSTALL_PREFIXES) {
      if (await fs.pathExists(path.join(prefix, bin))) {
        prependToPath(prefix)
        ctx.logger.ok(`Added ${prefix} to current session PATH`)
        return
      }
    }
  }
}

async function attempt(fn: () => Promise<void>, kind: FailureKind, message: string): Promise<InstallOutcome> {
  try {
    await fn()
    return { ok: true }
  } catch (error) {
    return { ok: false, kind, message: `${message}: ${errorText(error)}` }
  }
}
