import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import { tmpdir } from 'os'
import { join } from 'path'
import { brewTool, createMockLogger, makeCtx } from './test-utils.js'

vi.mock('zx', () => ({ which: vi.fn(), $: vi.fn() }))

vi.mock('../src/installers/utils.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/utils.js')>('../src/installers/utils.js')
  return { ...actual, runCommand: vi.fn(async () => {}) }
})

import { which } from 'zx'
import { runCommand } from '../src/installers/utils.js'
import { ensureInstalled, installAll } from '../src/installers/ensureInstalled.js'
import { countInstalled } from '../src/installers/report.js'
import type { ToolSpec } from '../src/installers/types.js'

const whichMock = which as unknown as ReturnType<typeof vi.fn>
const runCommandMock = vi.mocked(runCommand)

// Binaries currently "on PATH"; brew installs add the formula name.
const onPath = new Set<string>()

function brewCalls(sub: string): string[][] {
  return runCommandMock.mock.calls.filter(([cmd, args]) => cmd === 'brew' && args[0] === sub).map(([, args]) => args)
}

describe('installers/ensureInstalled', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    onPath.clear()
    onPath.add('brew')
    whichMock.mockImplementation(async (cmd: string) => {
      if (onPath.has(cmd)) return `/opt/homebrew/bin/${cmd}`
      throw new Error(`not found: ${cmd}`)
    })
    runCommandMock.mockImplementation(async (cmd, args, options) => {
      if (options?.dryRun) return
      if (cmd === 'brew' && args[0] === 'install') {
        const formula = args[args.length - 1] ?? ''
        if (formula === 'broken') throw new Error('Command failed (1): brew install broken')
        onPath.add(formula)
      }
      if (cmd === 'npm') throw new Error('Command failed (243): npm install -g claude')
      if (cmd === '/bin/bash') onPath.add('claude')
    })
  })

  it('skips a tool that is already present without running any installer', async () => {
    onPath.add('git')
    const logger = createMockLogger()
    const record = await ensureInstalled(makeCtx({ logger }), brewTool('git'))
    expect(record).toEqual({ name: 'git', displayName: 'git', status: 'already-present', path: '/opt/homebrew/bin/git' })
    expect(runCommandMock).not.toHaveBeenCalled()
    expect(logger.ok).toHaveBeenCalledWith('git already installed, skipping (/opt/homebrew/bin/git)')
  })

  it('keeps going after a failed tool and reports it', async () => {
    const logger = createMockLogger()
    const records = await installAll(makeCtx({ logger }), [brewTool('jq'), brewTool('broken'), brewTool('fd')])

    expect(records.map((r) => r.status)).toEqual(['installed', 'failed', 'installed'])
    expect(records[1]?.failure).toEqual({
      kind: 'package-manager',
      message: 'brew install broken failed: Command failed (1): brew install broken'
    })
    expect(logger.err).toHaveBeenCalledWith('Failed to install broken: brew install broken failed: Command failed (1): brew install broken')
    expect(countInstalled(records)).toBe(2)
  })

  it('updates Homebrew once per run, before the first brew install', async () => {
    await installAll(makeCtx(), [brewTool('jq'), brewTool('fd')])
    expect(brewCalls('update')).toEqual([['update']])
    expect(runCommandMock.mock.calls[0]?.[1]).toEqual(['update'])
    expect(brewCalls('install')).toEqual([['install', 'jq'], ['install', 'fd']])
  })

  it('installs nothing on a second run', async () => {
    const tools = [brewTool('jq'), brewTool('fd')]
    await installAll(makeCtx(), tools)
    runCommandMock.mockClear()

    const again = await installAll(makeCtx(), tools)
    expect(again.map((r) => r.status)).toEqual(['already-present', 'already-present'])
    expect(runCommandMock).not.toHaveBeenCalled()
  })

  it('plans instead of installing in dry-run mode', async () => {
    const record = await ensureInstalled(makeCtx({ options: { dryRun: true } }), brewTool('jq'))
    expect(record).toEqual({ name: 'jq', displayName: 'jq', status: 'planned' })
    expect(onPath.has('jq')).toBe(false)
    expect(brewCalls('install')).toEqual([['install', 'jq']])
  })

  it('fails when the binary is still missing after a successful install', async () => {
    const record = await ensureInstalled(makeCtx(), brewTool('ripgrep', 'rg'))
    expect(record.status).toBe('failed')
    expect(record.failure).toEqual({ kind: 'not-found-after-install', message: 'ripgrep still not found after install' })
  })

  it('falls back to the vendor script when the npm install fails', async () => {
    const tool: ToolSpec = {
      name: 'claude',
      displayName: 'Claude Code',
      required: false,
      missing: 'warning',
      probe: { kind: 'command', bins: ['claude'] },
      install: { kind: 'npm', pkg: '@anthropic-ai/claude-code', fallbackScript: 'https://example.test/install.sh' }
    }
    const logger = createMockLogger()
    const record = await ensureInstalled(makeCtx({ logger }), tool)

    expect(record).toEqual({ name: 'claude', displayName: 'Claude Code', status: 'installed', path: '/opt/homebrew/bin/claude' })
    expect(runCommandMock).toHaveBeenCalledWith(
      '/bin/bash',
      ['-c', "set -o pipefail; curl -fsSL 'https://example.test/install.sh' | bash"],
      { dryRun: false, logger, env: { NONINTERACTIVE: '1' } }
    )
  })

  describe('source builds with a toolchain', () => {
    function ghostty(formula = 'zig'): ToolSpec {
      return {
        name: 'ghostty',
        displayName: 'Ghostty',
        required: false,
        missing: 'warning',
        probe: { kind: 'command', bins: ['ghostty'] },
        install: {
          kind: 'source',
          repo: 'https://example.test/ghostty.git',
          toolchain: { formula, bin: formula, displayName: 'Zig' },
          build: ['zig', 'build'],
          artifact: 'zig-out/bin/ghostty',
          destination: '/usr/local/bin/ghostty',
          tempName: 'devstrap-test-ghostty-build'
        }
      }
    }

    afterEach(async () => {
      await fs.remove(join(tmpdir(), 'devstrap-test-ghostty-build'))
    })

    it('records the toolchain as its own tool before building', async () => {
      const logger = createMockLogger()
      const records = await installAll(makeCtx({ logger }), [ghostty()])

      expect(records.map((r) => `${r.name}:${r.status}`)).toEqual(['zig:installed', 'ghostty:failed'])
      expect(records[0]).toMatchObject({ displayName: 'Zig', path: '/opt/homebrew/bin/zig' })
      expect(records[1]?.failure?.kind).toBe('build')
      expect(logger.err).toHaveBeenCalledWith('Failed to build Ghostty from source: Build finished but zig-out/bin/ghostty was not produced')
      expect(countInstalled(records)).toBe(1)
    })

    it('skips the build when the toolchain cannot be installed', async () => {
      const records = await installAll(makeCtx(), [ghostty('broken')])

      expect(records.map((r) => `${r.name}:${r.status}`)).toEqual(['broken:failed', 'ghostty:failed'])
      expect(records[1]?.failure).toEqual({ kind: 'package-manager', message: 'Ghostty needs Zig, which failed to install' })
      expect(runCommandMock.mock.calls.some(([cmd]) => cmd === 'git')).toBe(false)
    })

    it('adds no toolchain record when the tool is already present', async () => {
      onPath.add('ghostty')
      const records = await installAll(makeCtx(), [ghostty()])
      expect(records.map((r) => `${r.name}:${r.status}`)).toEqual(['ghostty:already-present'])
      expect(runCommandMock).not.toHaveBeenCalled()
    })
  })
})
