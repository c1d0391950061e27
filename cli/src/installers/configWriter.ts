import fs from 'fs-extra'
import * as path from 'path'
import type { ConfigFragment, FragmentResult, InstallerContext } from './types.js'
import { createBackupPath, errorText } from './utils.js'

// Applies fragments in order. Append fragments are idempotent on their marker;
// overwrite fragments always replace the whole file.
export async function applyConfig(ctx: InstallerContext, fragments: ConfigFragment[]): Promise<FragmentResult[]> {
  const backedUp = new Set<string>()
  const results: FragmentResult[] = []
  for (const fragment of fragments) {
    try {
      results.push(
        fragment.mode === 'append'
          ? await appendFragment(ctx, fragment, backedUp)
          : await overwriteFragment(ctx, fragment)
      )
    } catch (error) {
      ctx.logger.err(`Failed to write ${displayPath(ctx, fragment.target)}: ${errorText(error)}`)
      results.push({ target: fragment.target, mode: fragment.mode, action: 'failed', error: errorText(error) })
    }
  }
  return results
}

export function hasMarker(content: string, marker: string): boolean {
  return content.split('\n').some((line) => line.includes(marker))
}

async function appendFragment(
  ctx: InstallerContext,
  fragment: ConfigFragment,
  backedUp: Set<string>
): Promise<FragmentResult> {
  const { target } = fragment
  const marker = fragment.marker ?? firstLine(fragment.content)
  const exists = await fs.pathExists(target)

  if (!exists && fragment.onlyIfExists) {
    return { target, mode: 'append', action: 'skipped' }
  }

  const current = exists ? await fs.readFile(target, 'utf8') : ''
  if (hasMarker(current, marker)) {
    return { target, mode: 'append', action: 'present' }
  }

  const result: FragmentResult = { target, mode: 'append', action: 'appended' }
  const separator = current.length === 0 || current.endsWith('\n') ? '' : '\n'
  const block = ensureEndsWithNewline(fragment.content)

  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] append to ${target}`)
    ctx.logger.log(block.trimEnd())
    return result
  }

  if (exists && !backedUp.has(target)) {
    const backup = createBackupPath(target)
    // A backup from an earlier run holds the oldest content; never replace it.
    if (!(await fs.pathExists(backup))) {
      await fs.copy(target, backup)
      result.backup = backup
      ctx.logger.info(`Backed up ${displayPath(ctx, target)} to ${displayPath(ctx, backup)}`)
    }
    backedUp.add(target)
  }

  await fs.ensureDir(path.dirname(target))
  await fs.appendFile(target, separator + block, 'utf8')
  ctx.logger.ok(`Updated ${displayPath(ctx, target)} (${marker.trim()})`)
  return result
}

async function overwriteFragment(ctx: InstallerContext, fragment: ConfigFragment): Promise<FragmentResult> {
  const { target } = fragment
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] write ${target}`)
    return { target, mode: 'overwrite', action: 'written' }
  }

  const dir = path.dirname(target)
  await fs.ensureDir(dir)
  const tmp = path.join(dir, `.${path.basename(target)}.devstrap-${process.pid}.tmp`)
  try {
    await fs.writeFile(tmp, fragment.content, { encoding: 'utf8', mode: fragment.fileMode ?? 0o644 })
    if (fragment.fileMode !== undefined) await fs.chmod(tmp, fragment.fileMode)
    // Same directory, so rename replaces the target in one step.
    await fs.rename(tmp, target)
  } catch (error) {
    await fs.remove(tmp)
    throw error
  }
  ctx.logger.ok(`Wrote ${displayPath(ctx, target)}`)
  return { target, mode: 'overwrite', action: 'written' }
}

export function displayPath(ctx: InstallerContext, file: string): string {
  return file.startsWith(ctx.homeDir + path.sep) ? `~${file.slice(ctx.homeDir.length)}` : file
}

function firstLine(text: string): string {
  return text.split('\n').find((line) => line.trim() !== '') ?? text
}

function ensureEndsWithNewline(text: string): string {
  return text.endsWith('\n') ? text : text + '\n'
}
