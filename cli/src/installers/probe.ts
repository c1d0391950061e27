import fs from 'fs-extra'
import * as path from 'path'
import type { InstallerContext, PreconditionResult, Preconditions, ProbeResult, ProbeSpec, XcodeCheck } from './types.js'
import { execCapture, resolveCmd, runCommand } from './utils.js'

const NOT_FOUND: ProbeResult = { found: false }

export const COMMON_BIN_DIRS = ['/opt/homebrew/bin', '/opt/homebrew/sbin', '/usr/local/bin', '~/.local/bin', '/usr/bin', '/bin']

// Absence is a normal outcome: a probe never throws and never writes.
export async function probe(spec: ProbeSpec): Promise<ProbeResult> {
  try {
    switch (spec.kind) {
      case 'command':
        for (const bin of spec.bins) {
          const found = await resolveCmd(bin)
          if (found) return { found: true, path: found }
        }
        return NOT_FOUND
      case 'path':
        return (await fs.pathExists(spec.path)) ? { found: true, path: spec.path } : NOT_FOUND
      case 'exec': {
        const res = await execCapture(spec.cmd, spec.args)
        const out = res.stdout.trim().split('\n')[0] ?? ''
        return res.ok ? { found: true, path: out || spec.cmd } : NOT_FOUND
      }
    }
  } catch {
    return NOT_FOUND
  }
}

export async function checkPreconditions(ctx: InstallerContext, pre: Preconditions): Promise<PreconditionResult> {
  if (ctx.platform !== pre.platform) {
    return { ok: false, reason: `This installer supports ${describePlatform(pre.platform)} only (detected ${ctx.platform})` }
  }
  for (const cmd of pre.commands) {
    if (!(await resolveCmd(cmd))) {
      return cmd === 'git'
        ? { ok: false, reason: 'git is required but not installed', hint: 'Install Xcode Command Line Tools: xcode-select --install' }
        : { ok: false, reason: `${cmd} is required but not installed` }
    }
  }
  return { ok: true }
}

// Xcode Command Line Tools ship the compilers Homebrew builds with.
// Missing tools trigger Apple's installer dialog and stop the run.
export async function checkXcodeTools(ctx: InstallerContext): Promise<XcodeCheck> {
  const found = await probe({ kind: 'exec', cmd: 'xcode-select', args: ['-p'] })
  if (found.found) {
    ctx.logger.ok(`Xcode Command Line Tools present (${found.path})`)
    return { ok: true, path: found.path }
  }
  ctx.logger.warn('Xcode Command Line Tools not found; starting the installer')
  try {
    await runCommand('xcode-select', ['--install'], { dryRun: ctx.options.dryRun, logger: ctx.logger })
  } catch (error) {
    ctx.logger.warn(`xcode-select --install did not start: ${error}`)
  }
  return {
    ok: false,
    reason: 'Xcode Command Line Tools are being installed',
    hint: 'Complete the Xcode Command Line Tools installation, then re-run devstrap'
  }
}

// Prepends existing common bin directories missing from PATH, for this process only.
export async function augmentSessionPath(ctx: InstallerContext, dirs: string[] = COMMON_BIN_DIRS): Promise<string[]> {
  const added: string[] = []
  for (const raw of dirs) {
    const dir = raw.startsWith('~/') ? path.join(ctx.homeDir, raw.slice(2)) : raw
    const current = (process.env.PATH || '').split(path.delimiter)
    if (current.includes(dir)) continue
    if (!(await fs.pathExists(dir))) continue
    prependToPath(dir)
    added.push(dir)
    ctx.logger.ok(`Added ${dir} to current session PATH`)
  }
  return added
}

export function prependToPath(dir: string): void {
  const current = process.env.PATH || ''
  process.env.PATH = current ? `${dir}${path.delimiter}${current}` : dir
}

function describePlatform(platform: NodeJS.Platform): string {
  return platform === 'darwin' ? 'macOS' : platform
}
