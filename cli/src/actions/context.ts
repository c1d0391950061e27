import os from 'os'
import * as path from 'path'
import { promises as fs } from 'fs'
import type { InstallerContext, InstallerOptions } from '../installers/types.js'
import { createLogger } from '../installers/logger.js'
import { createTimestamp } from '../installers/utils.js'
import { findRepoRoot } from '../lib/repoRoot.js'

export const PROJECT = 'devstrap'

export function createBaseOptions(): InstallerOptions {
  return {
    dryRun: false,
    assumeYes: false,
    skipConfirmation: false,
    skipVerify: false,
    manifestPath: undefined
  }
}

export function stateDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, `.${PROJECT}`)
}

export async function createActionContext(
  options: Partial<InstallerOptions> = {},
  logName = 'command',
  rootDir: string = findRepoRoot()
): Promise<InstallerContext> {
  const homeDir = os.homedir()
  const logDir = stateDir(homeDir)
  await fs.mkdir(logDir, { recursive: true })
  try {
    await fs.chmod(logDir, 0o700)
  } catch {
    // best-effort on platforms without POSIX perms
  }
  const logFile = path.join(logDir, `${logName}-${createTimestamp()}.log`)
  const logger = createLogger(logFile)
  return {
    cwd: process.cwd(),
    homeDir,
    rootDir,
    logDir,
    logFile,
    platform: process.platform,
    options: { ...createBaseOptions(), ...options },
    logger
  }
}
