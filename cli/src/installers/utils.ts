import { which } from 'zx'
import { execa } from 'execa'
import { spawn } from 'node:child_process'
import type { Logger } from './types.js'

export const BACKUP_SUFFIX = '.devstrap-backup'

export async function needCmd(cmd: string): Promise<boolean> {
  return (await resolveCmd(cmd)) !== undefined
}

export async function resolveCmd(cmd: string): Promise<string | undefined> {
  try {
    return await which(cmd)
  } catch {
    return undefined
  }
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

// Streams output to the terminal; rejects on a non-zero exit.
export async function runCommand(
  cmd: string,
  args: string[],
  options: { dryRun: boolean; logger?: Logger; cwd?: string; env?: Record<string, string> } = { dryRun: false }
): Promise<void> {
  if (options.dryRun) {
    options.logger?.log(`[dry-run] ${formatCommand(cmd, args)}`)
    return
  }
  const proc = spawn(cmd, args, {
    stdio: 'inherit',
    cwd: options.cwd || process.cwd(),
    env: options.env ? { ...process.env, ...options.env } : process.env,
    shell: false
  })
  await new Promise<void>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('exit', (code) => {
      if (code === 0) return resolve()
      reject(new Error(`Command failed (${code}): ${cmd} ${args.join(' ')}`))
    })
  })
}

export interface CaptureResult {
  ok: boolean
  exitCode: number | undefined
  stdout: string
  stderr: string
  timedOut: boolean
}

// Never rejects; a missing binary is reported as ok: false.
export async function execCapture(
  cmd: string,
  args: string[],
  options: { timeoutMs?: number } = {}
): Promise<CaptureResult> {
  const res = await execa(cmd, args, { reject: false, timeout: options.timeoutMs, stdin: 'ignore' })
  return {
    ok: !res.failed && res.exitCode === 0,
    exitCode: res.exitCode,
    stdout: res.stdout,
    stderr: res.stderr,
    timedOut: res.timedOut
  }
}

// Copies into /usr/local/bin need sudo unless we already run as root.
export function createPrivilegedCmd(cmd: string): { cmd: string; argsPrefix: string[] } {
  const isRoot = typeof process.getuid === 'function' && process.getuid() === 0
  if (isRoot) return { cmd, argsPrefix: [] }
  return { cmd: 'sudo', argsPrefix: [cmd] }
}

export function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function createBackupPath(originalPath: string): string {
  return `${originalPath}${BACKUP_SUFFIX}`
}

export function createTimestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5)
}

export function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir
  if (value.startsWith('~/')) return `${homeDir}/${value.slice(2)}`
  return value
}

export function isInteractive(options: { dryRun: boolean; assumeYes: boolean; skipConfirmation: boolean }): boolean {
  return Boolean(process.stdout.isTTY) && !options.dryRun && !options.skipConfirmation && !options.assumeYes
}
