import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { runCommand } from 'citty'

const runInstaller = vi.hoisted(() => vi.fn())
vi.mock('../src/installers/main.js', () => ({ runInstaller }))

import { installCommand, toInstallerOptions } from '../src/commands/install.js'
import { buildRawArgsFromFlags } from './test-utils.js'

describe('install command', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    process.exitCode = undefined
    runInstaller.mockResolvedValue({ status: 'completed', records: [], fragments: [] })
  })

  afterEach(() => {
    process.exitCode = undefined
  })

  it('maps flags onto installer options', () => {
    expect(toInstallerOptions({ 'dry-run': true, yes: true, manifest: '  /tmp/tools.toml ' })).toEqual({
      dryRun: true,
      assumeYes: true,
      skipConfirmation: false,
      skipVerify: false,
      manifestPath: '/tmp/tools.toml'
    })
    expect(toInstallerOptions({ manifest: '   ' }).manifestPath).toBeUndefined()
  })

  it('passes parsed flags to the installer', async () => {
    const rawArgs = buildRawArgsFromFlags({ 'dry-run': true, 'skip-verify': true, manifest: '/tmp/tools.toml' })
    await runCommand(installCommand, { rawArgs })
    expect(runInstaller).toHaveBeenCalledWith(
      { dryRun: true, assumeYes: false, skipConfirmation: false, skipVerify: true, manifestPath: '/tmp/tools.toml' },
      expect.any(String)
    )
    expect(process.exitCode ?? 0).toBe(0)
  })

  it('exits non-zero when preconditions abort the run', async () => {
    runInstaller.mockResolvedValueOnce({ status: 'aborted', reason: 'This installer supports macOS only (detected linux)' })
    await runCommand(installCommand, { rawArgs: ['--yes'] })
    expect(process.exitCode).toBe(1)
  })
})
