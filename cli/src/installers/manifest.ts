import fs from 'fs-extra'
import * as path from 'path'
import TOML from 'toml'
import type {
  CapabilityCheck,
  ConfigDirCheck,
  InstallSpec,
  Manifest,
  MissingSeverity,
  PackageBatch,
  ProbeSpec,
  ToolSpec
} from './types.js'
import { expandHome } from './utils.js'

export const MANIFEST_FILE = 'tools.toml'
export const USER_CONFIG_FILE = 'config.toml'

type Table = Record<string, unknown>
type SourceInstall = Extract<InstallSpec, { kind: 'source' }>

export interface ToolOverride {
  enabled?: boolean
  required?: boolean
  missing?: MissingSeverity
}

export function resolveManifestPath(rootDir: string, explicit?: string): string {
  const fromEnv = process.env.DEVSTRAP_MANIFEST
  if (explicit) return path.resolve(explicit)
  if (fromEnv) return path.resolve(fromEnv)
  return path.join(rootDir, 'templates', MANIFEST_FILE)
}

export async function loadManifest(file: string, homeDir: string, overridesFile?: string): Promise<Manifest> {
  const raw = await readToml(file)
  const manifest = parseManifest(raw, homeDir, file)
  if (overridesFile && (await fs.pathExists(overridesFile))) {
    const overrides = parseOverrides(await readToml(overridesFile), overridesFile)
    return { ...manifest, tools: applyOverrides(manifest.tools, overrides) }
  }
  return manifest
}

async function readToml(file: string): Promise<unknown> {
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (error) {
    throw new Error(`Cannot read ${file}: ${error}`)
  }
  try {
    return TOML.parse(text) as unknown
  } catch (error) {
    throw new Error(`Invalid TOML in ${file}: ${error}`)
  }
}

export function parseManifest(raw: unknown, homeDir: string, source = MANIFEST_FILE): Manifest {
  const root = asTable(raw, source)
  const pre = asTable(root.preconditions, `${source}: preconditions`)
  const platform = readString(pre, 'platform', `${source}: preconditions`)
  if (!isPlatform(platform)) throw new Error(`${source}: preconditions.platform "${platform}" is not a Node.js platform`)

  const toolsRaw = readArray(root, 'tools', source)
  const tools = toolsRaw.map((entry, i) => parseTool(entry, homeDir, `${source}: tools[${i}]`))
  const seen = new Set<string>()
  for (const tool of tools) {
    if (seen.has(tool.name)) throw new Error(`${source}: duplicate tool name "${tool.name}"`)
    seen.add(tool.name)
  }

  const ws = asTable(root.workspace, `${source}: workspace`)
  const rp = asTable(root.runtime_packages, `${source}: runtime_packages`)

  return {
    preconditions: {
      platform,
      commands: readStringArray(pre, 'commands', `${source}: preconditions`)
    },
    tools,
    capabilities: readArray(root, 'capabilities', source, true).map((entry, i) =>
      parseCapability(entry, `${source}: capabilities[${i}]`)
    ),
    configDirs: readArray(root, 'config_dirs', source, true).map((entry, i) =>
      parseConfigDir(entry, homeDir, `${source}: config_dirs[${i}]`)
    ),
    workspace: {
      dir: expandHome(readString(ws, 'dir', `${source}: workspace`), homeDir),
      checkout: readString(ws, 'checkout', `${source}: workspace`),
      repo: readString(ws, 'repo', `${source}: workspace`),
      branch: readOptionalString(ws, 'branch', `${source}: workspace`) ?? 'main',
      serverName: readString(ws, 'server_name', `${source}: workspace`),
      entry: readString(ws, 'entry', `${source}: workspace`),
      desktopConfig: expandHome(readString(ws, 'desktop_config', `${source}: workspace`), homeDir)
    },
    runtimePackages: {
      interpreter: readString(rp, 'interpreter', `${source}: runtime_packages`),
      batches: readArray(rp, 'batches', `${source}: runtime_packages`, true).map((entry, i) =>
        parseBatch(entry, `${source}: runtime_packages.batches[${i}]`)
      )
    }
  }
}

function parseTool(raw: unknown, homeDir: string, where: string): ToolSpec {
  const t = asTable(raw, where)
  const name = readString(t, 'name', where)
  const required = readOptionalBoolean(t, 'required', where) ?? false
  const tool: ToolSpec = {
    name,
    displayName: readOptionalString(t, 'display_name', where) ?? name,
    required,
    missing: readSeverity(t, 'missing', where) ?? (required ? 'error' : 'warning'),
    probe: parseProbe(t.probe, homeDir, `${where}.probe`),
    install: parseInstall(t.install, homeDir, `${where}.install`)
  }
  const note = readOptionalString(t, 'note', where)
  const hint = readOptionalString(t, 'hint', where)
  if (note) tool.note = note
  if (hint) tool.hint = hint
  return tool
}

function parseProbe(raw: unknown, homeDir: string, where: string): ProbeSpec {
  const t = asTable(raw, where)
  const kind = readString(t, 'kind', where)
  switch (kind) {
    case 'command':
      return { kind: 'command', bins: readStringArray(t, 'bins', where) }
    case 'path':
      return { kind: 'path', path: expandHome(readString(t, 'path', where), homeDir) }
    case 'exec':
      return { kind: 'exec', cmd: readString(t, 'cmd', where), args: readStringArray(t, 'args', where, true) }
    default:
      throw new Error(`${where}: unknown probe kind "${kind}"`)
  }
}

function parseInstall(raw: unknown, homeDir: string, where: string): InstallSpec {
  const t = asTable(raw, where)
  const kind = readString(t, 'kind', where)
  switch (kind) {
    case 'brew':
      return { kind: 'brew', formula: readString(t, 'formula', where) }
    case 'cask':
      return { kind: 'cask', cask: readString(t, 'cask', where) }
    case 'npm': {
      const fallbackScript = readOptionalString(t, 'fallback_script', where)
      return fallbackScript
        ? { kind: 'npm', pkg: readString(t, 'pkg', where), fallbackScript }
        : { kind: 'npm', pkg: readString(t, 'pkg', where) }
    }
    case 'script':
      return { kind: 'script', url: readString(t, 'url', where) }
    case 'source': {
      const spec: SourceInstall = {
        kind: 'source',
        repo: readString(t, 'repo', where),
        build: readStringArray(t, 'build', where),
        artifact: readString(t, 'artifact', where),
        destination: readString(t, 'destination', where),
        tempName: readString(t, 'temp_name', where)
      }
      if (spec.build.length === 0) throw new Error(`${where}.build must name a command`)
      if (t.toolchain !== undefined) {
        const tc = asTable(t.toolchain, `${where}.toolchain`)
        spec.toolchain = {
          formula: readString(tc, 'formula', `${where}.toolchain`),
          bin: readString(tc, 'bin', `${where}.toolchain`),
          displayName: readOptionalString(tc, 'display_name', `${where}.toolchain`) ?? readString(tc, 'formula', `${where}.toolchain`)
        }
      }
      return spec
    }
    case 'clone':
      return { kind: 'clone', repo: readString(t, 'repo', where), dest: expandHome(readString(t, 'dest', where), homeDir) }
    default:
      throw new Error(`${where}: unknown install kind "${kind}"`)
  }
}

function parseCapability(raw: unknown, where: string): CapabilityCheck {
  const t = asTable(raw, where)
  const check: CapabilityCheck = {
    name: readString(t, 'name', where),
    displayName: readString(t, 'display_name', where),
    interpreter: readString(t, 'interpreter', where),
    module: readString(t, 'module', where),
    missing: readSeverity(t, 'missing', where) ?? 'warning'
  }
  const hint = readOptionalString(t, 'hint', where)
  if (hint) check.hint = hint
  return check
}

function parseConfigDir(raw: unknown, homeDir: string, where: string): ConfigDirCheck {
  const t = asTable(raw, where)
  return {
    name: readString(t, 'name', where),
    displayName: readString(t, 'display_name', where),
    path: expandHome(readString(t, 'path', where), homeDir)
  }
}

function parseBatch(raw: unknown, where: string): PackageBatch {
  const t = asTable(raw, where)
  return { label: readString(t, 'label', where), packages: readStringArray(t, 'packages', where) }
}

export function parseOverrides(raw: unknown, source = USER_CONFIG_FILE): Map<string, ToolOverride> {
  const root = asTable(raw, source)
  const out = new Map<string, ToolOverride>()
  if (root.tools === undefined) return out
  const tools = asTable(root.tools, `${source}: tools`)
  for (const [name, value] of Object.entries(tools)) {
    const where = `${source}: tools.${name}`
    const t = asTable(value, where)
    const override: ToolOverride = {}
    const enabled = readOptionalBoolean(t, 'enabled', where)
    const required = readOptionalBoolean(t, 'required', where)
    const missing = readSeverity(t, 'missing', where)
    if (enabled !== undefined) override.enabled = enabled
    if (required !== undefined) override.required = required
    if (missing !== undefined) override.missing = missing
    out.set(name, override)
  }
  return out
}

export function applyOverrides(tools: ToolSpec[], overrides: Map<string, ToolOverride>): ToolSpec[] {
  const out: ToolSpec[] = []
  for (const tool of tools) {
    const o = overrides.get(tool.name)
    if (!o) {
      out.push(tool)
      continue
    }
    if (o.enabled === false) continue
    const required = o.required ?? tool.required
    // Flipping `required` without an explicit severity moves the severity with it.
    const missing = o.missing ?? (o.required === undefined ? tool.missing : required ? 'error' : 'warning')
    out.push({ ...tool, required, missing })
  }
  return out
}

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPlatform(value: string): value is NodeJS.Platform {
  return ['aix', 'android', 'darwin', 'freebsd', 'haiku', 'linux', 'openbsd', 'sunos', 'win32', 'cygwin', 'netbsd'].includes(value)
}

function asTable(value: unknown, where: string): Table {
  if (!isTable(value)) throw new Error(`${where}: expected a table`)
  return value
}

function readString(t: Table, key: string, where: string): string {
  const value = t[key]
  if (typeof value !== 'string' || value.trim() === '') throw new Error(`${where}.${key}: expected a non-empty string`)
  return value
}

function readOptionalString(t: Table, key: string, where: string): string | undefined {
  if (t[key] === undefined) return undefined
  return readString(t, key, where)
}

function readOptionalBoolean(t: Table, key: string, where: string): boolean | undefined {
  const value = t[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') throw new Error(`${where}.${key}: expected true or false`)
  return value
}

function readSeverity(t: Table, key: string, where: string): MissingSeverity | undefined {
  const value = t[key]
  if (value === undefined) return undefined
  if (value !== 'error' && value !== 'warning') throw new Error(`${where}.${key}: expected "error" or "warning"`)
  return value
}

function readArray(t: Table, key: string, where: string, optional = false): unknown[] {
  const value = t[key]
  if (value === undefined && optional) return []
  if (!Array.isArray(value)) throw new Error(`${where}.${key}: expected an array`)
  return value
}

function readStringArray(t: Table, key: string, where: string, optional = false): string[] {
  return readArray(t, key, where, optional).map((item, i) => {
    if (typeof item !== 'string') throw new Error(`${where}.${key}[${i}]: expected a string`)
    return item
  })
}
