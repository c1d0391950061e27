import fs from 'fs-extra'
import type {
  CapabilityCheck,
  ConfigDirCheck,
  Manifest,
  MissingSeverity,
  ToolSpec,
  VerifyEntry,
  VerifyReport,
  VerifyState
} from './types.js'
import { probe } from './probe.js'
import { execCapture } from './utils.js'

const READY_TOKEN = 'devstrap:ready'
const MISSING_TOKEN = 'devstrap:missing'
const MODULE_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/
// Upper bound for one import check.
export const CAPABILITY_TIMEOUT_MS = 30_000

export function capabilityScript(module: string): string {
  return [
    'try:',
    `    import ${module}`,
    `    print('${READY_TOKEN}')`,
    'except ImportError:',
    `    print('${MISSING_TOKEN}')`
  ].join('\n')
}

function absentState(severity: MissingSeverity): VerifyState {
  return severity === 'error' ? 'missing' : 'warning'
}

export async function verifyTool(tool: ToolSpec): Promise<VerifyEntry> {
  const base = { name: tool.name, displayName: tool.displayName }
  const found = await probe(tool.probe)
  if (found.found) return { ...base, state: 'ok', detail: found.path }
  const state = absentState(tool.missing)
  const detail = state === 'warning' && tool.note ? tool.note : tool.probe.kind === 'command' ? 'not found in PATH' : 'not found'
  return tool.hint ? { ...base, state, detail, hint: tool.hint } : { ...base, state, detail }
}

export async function verifyCapability(check: CapabilityCheck): Promise<VerifyEntry> {
  const base = { name: check.name, displayName: check.displayName }
  const fail = (detail: string): VerifyEntry => {
    const state = absentState(check.missing)
    return check.hint ? { ...base, state, detail, hint: check.hint } : { ...base, state, detail }
  }
  if (!MODULE_NAME.test(check.module)) return fail(`invalid module name "${check.module}"`)

  const res = await execCapture(check.interpreter, ['-c', capabilityScript(check.module)], { timeoutMs: CAPABILITY_TIMEOUT_MS })
  if (res.timedOut) return fail(`${check.interpreter} timed out after ${CAPABILITY_TIMEOUT_MS / 1000}s`)
  if (!res.ok) {
    return fail(res.exitCode === undefined ? `${check.interpreter} not available` : `${check.interpreter} exited with ${res.exitCode}`)
  }
  const lines = res.stdout.split('\n').map((line) => line.trim())
  if (lines.includes(READY_TOKEN)) return { ...base, state: 'ok', detail: 'Ready' }
  return fail(`cannot import ${check.module}`)
}

export async function verifyConfigDir(dir: ConfigDirCheck): Promise<VerifyEntry> {
  const base = { name: dir.name, displayName: dir.displayName }
  return (await fs.pathExists(dir.path))
    ? { ...base, state: 'ok', detail: dir.path }
    : { ...base, state: 'warning', detail: `${dir.path} not found` }
}

export function tally(entries: VerifyEntry[]): VerifyReport {
  return {
    entries,
    errors: entries.filter((e) => e.state === 'missing').length,
    warnings: entries.filter((e) => e.state === 'warning').length
  }
}

// Sequential on purpose: each probe may shell out.
export async function verify(manifest: Pick<Manifest, 'tools' | 'capabilities' | 'configDirs'>): Promise<VerifyReport> {
  const entries: VerifyEntry[] = []
  for (const tool of manifest.tools) entries.push(await verifyTool(tool))
  for (const check of manifest.capabilities) entries.push(await verifyCapability(check))
  for (const dir of manifest.configDirs) entries.push(await verifyConfigDir(dir))
  return tally(entries)
}
