export type MissingSeverity = 'error' | 'warning'
export type InstallStatus = 'already-present' | 'installed' | 'failed' | 'planned'
export type FailureKind = 'package-manager' | 'build' | 'download' | 'permission' | 'declined' | 'not-found-after-install'

export interface InstallerOptions {
  dryRun: boolean
  assumeYes: boolean
  skipConfirmation: boolean
  skipVerify: boolean
  manifestPath: string | undefined
}

export interface InstallerContext {
  cwd: string
  homeDir: string
  rootDir: string
  logDir: string
  logFile: string
  platform: NodeJS.Platform
  options: InstallerOptions
  logger: Logger
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}

export type ProbeResult = { found: true; path: string } | { found: false }

// How presence of a tool is detected.
export type ProbeSpec =
  | { kind: 'command'; bins: string[] }
  | { kind: 'path'; path: string }
  | { kind: 'exec'; cmd: string; args: string[] }

// What gets run when the probe comes back empty.
export type InstallSpec =
  | { kind: 'brew'; formula: string }
  | { kind: 'cask'; cask: string }
  | { kind: 'npm'; pkg: string; fallbackScript?: string }
  | { kind: 'script'; url: string }
  | {
      kind: 'source'
      repo: string
      toolchain?: { formula: string; bin: string; displayName: string }
      build: string[]
      artifact: string
      destination: string
      tempName: string
    }
  | { kind: 'clone'; repo: string; dest: string }

export interface ToolSpec {
  name: string
  displayName: string
  required: boolean
  missing: MissingSeverity
  note?: string
  hint?: string
  probe: ProbeSpec
  install: InstallSpec
}

export type InstallOutcome = { ok: true } | { ok: false; kind: FailureKind; message: string }

export interface InstallationRecord {
  name: string
  displayName: string
  status: InstallStatus
  path?: string
  failure?: { kind: FailureKind; message: string }
}

export interface CapabilityCheck {
  name: string
  displayName: string
  interpreter: string
  module: string
  missing: MissingSeverity
  hint?: string
}

export interface ConfigDirCheck {
  name: string
  displayName: string
  path: string
}

export interface WorkspaceSpec {
  dir: string
  checkout: string
  repo: string
  branch: string
  serverName: string
  entry: string
  desktopConfig: string
}

export interface PackageBatch {
  label: string
  packages: string[]
}

export interface RuntimePackagesSpec {
  interpreter: string
  batches: PackageBatch[]
}

export interface Preconditions {
  platform: NodeJS.Platform
  commands: string[]
}

export interface Manifest {
  preconditions: Preconditions
  tools: ToolSpec[]
  capabilities: CapabilityCheck[]
  configDirs: ConfigDirCheck[]
  workspace: WorkspaceSpec
  runtimePackages: RuntimePackagesSpec
}

export type FragmentMode = 'append' | 'overwrite'

export interface ConfigFragment {
  target: string
  mode: FragmentMode
  content: string
  // Append mode: a line containing this text means the fragment is already present.
  marker?: string
  onlyIfExists?: boolean
  fileMode?: number
}

export type FragmentAction = 'appended' | 'present' | 'written' | 'skipped' | 'failed'

export interface FragmentResult {
  target: string
  mode: FragmentMode
  action: FragmentAction
  backup?: string
  error?: string
}

export type VerifyState = 'ok' | 'missing' | 'warning'

export interface VerifyEntry {
  name: string
  displayName: string
  state: VerifyState
  detail: string
  hint?: string
}

export interface VerifyReport {
  entries: VerifyEntry[]
  errors: number
  warnings: number
}

export type PreconditionResult = { ok: true } | { ok: false; reason: string; hint?: string }

export type XcodeCheck = { ok: true; path: string } | { ok: false; reason: string; hint?: string }
