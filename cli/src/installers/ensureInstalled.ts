import type { InstallOutcome, InstallationRecord, InstallerContext, ToolSpec } from './types.js'
import { probe } from './probe.js'
import { createInstallSession, runInstallAction, type InstallSession } from './installActions.js'
import { errorText } from './utils.js'

export async function ensureInstalled(
  ctx: InstallerContext,
  tool: ToolSpec,
  session: InstallSession = createInstallSession()
): Promise<InstallationRecord> {
  const base = { name: tool.name, displayName: tool.displayName }

  const before = await probe(tool.probe)
  if (before.found) {
    ctx.logger.ok(`${tool.displayName} already installed, skipping (${before.path})`)
    return { ...base, status: 'already-present', path: before.path }
  }

  ctx.logger.info(`Installing ${tool.displayName}...`)
  let outcome: InstallOutcome
  try {
    outcome = await runInstallAction(ctx, tool, session)
  } catch (error) {
    outcome = { ok: false, kind: 'package-manager', message: errorText(error) }
  }

  if (ctx.options.dryRun) {
    return outcome.ok ? { ...base, status: 'planned' } : { ...base, status: 'failed', failure: { kind: outcome.kind, message: outcome.message } }
  }

  const after = await probe(tool.probe)
  if (after.found) {
    ctx.logger.ok(`${tool.displayName} installed at: ${after.path}`)
    return { ...base, status: 'installed', path: after.path }
  }

  const failure = outcome.ok
    ? { kind: 'not-found-after-install' as const, message: `${tool.displayName} still not found after install` }
    : { kind: outcome.kind, message: outcome.message }
  if (failure.kind === 'build') {
    ctx.logger.err(`Failed to build ${tool.displayName} from source: ${failure.message}`)
  } else {
    ctx.logger.err(`Failed to install ${tool.displayName}: ${failure.message}`)
  }
  return { ...base, status: 'failed', failure }
}

type Toolchain = NonNullable<Extract<ToolSpec['install'], { kind: 'source' }>['toolchain']>

// A build toolchain is tracked like any other tool, so it shows up in the summary.
export function toolchainTool(toolchain: Toolchain): ToolSpec {
  return {
    name: toolchain.formula,
    displayName: toolchain.displayName,
    required: false,
    missing: 'warning',
    probe: { kind: 'command', bins: [toolchain.bin] },
    install: { kind: 'brew', formula: toolchain.formula }
  }
}

// Tools are processed in declared order; a failure never stops the loop.
// A source build whose toolchain cannot be installed is skipped.
export async function installAll(ctx: InstallerContext, tools: ToolSpec[]): Promise<InstallationRecord[]> {
  const session = createInstallSession()
  const records: InstallationRecord[] = []
  for (const tool of tools) {
    const toolchain = tool.install.kind === 'source' ? tool.install.toolchain : undefined
    if (toolchain && !(await probe(tool.probe)).found) {
      const prepared = await ensureInstalled(ctx, toolchainTool(toolchain), session)
      records.push(prepared)
      if (prepared.status === 'failed') {
        const message = `${tool.displayName} needs ${toolchain.displayName}, which failed to install`
        ctx.logger.err(`Failed to build ${tool.displayName} from source: ${message}`)
        records.push({ name: tool.name, displayName: tool.displayName, status: 'failed', failure: { kind: 'package-manager', message } })
        continue
      }
    }
    records.push(await ensureInstalled(ctx, tool, session))
  }
  return records
}
