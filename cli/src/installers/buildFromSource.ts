import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { InstallOutcome, InstallSpec, InstallerContext } from './types.js'
import { createPrivilegedCmd, errorText, runCommand } from './utils.js'

export type SourceInstall = Extract<InstallSpec, { kind: 'source' }>

// clone -> compile -> copy the binary into place with sudo. The toolchain is
// installed beforehand as its own tool (see installAll).
// The work dir has a fixed name so a leftover from an interrupted run
// is removed before cloning again, and it is always removed afterwards.
export async function buildFromSource(
  ctx: InstallerContext,
  spec: SourceInstall,
  tmpRoot: string = os.tmpdir()
): Promise<InstallOutcome> {
  const dryRun = ctx.options.dryRun
  const run = (cmd: string, args: string[], cwd?: string) =>
    runCommand(cmd, args, cwd ? { dryRun, logger: ctx.logger, cwd } : { dryRun, logger: ctx.logger })

  const workDir = path.join(tmpRoot, spec.tempName)
  const srcDir = path.join(workDir, 'src')

  if (!dryRun) {
    await fs.remove(workDir)
    await fs.ensureDir(workDir)
  }

  try {
    try {
      await run('git', ['clone', '--depth', '1', spec.repo, srcDir])
    } catch (error) {
      return { ok: false, kind: 'download', message: `Failed to clone ${spec.repo}: ${errorText(error)}` }
    }

    const [buildCmd, ...buildArgs] = spec.build
    if (!buildCmd) return { ok: false, kind: 'build', message: 'No build command declared' }
    ctx.logger.info('Building from source (this may take a few minutes)...')
    try {
      await run(buildCmd, buildArgs, srcDir)
    } catch (error) {
      return { ok: false, kind: 'build', message: `Build failed: ${errorText(error)}` }
    }

    const artifact = path.join(srcDir, spec.artifact)
    if (!dryRun && !(await fs.pathExists(artifact))) {
      return { ok: false, kind: 'build', message: `Build finished but ${spec.artifact} was not produced` }
    }

    const { cmd, argsPrefix } = createPrivilegedCmd('cp')
    try {
      await run(cmd, [...argsPrefix, artifact, spec.destination])
    } catch (error) {
      return { ok: false, kind: 'permission', message: `Failed to copy binary to ${spec.destination}: ${errorText(error)}` }
    }
    return { ok: true }
  } finally {
    if (!dryRun) await fs.remove(workDir)
  }
}
