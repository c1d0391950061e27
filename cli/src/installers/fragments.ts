import fs from 'fs-extra'
import * as path from 'path'
import type { ConfigFragment, InstallerContext, Manifest } from './types.js'

export const PROFILE_FILES = ['.zshrc', '.bash_profile', '.bashrc']
export const ENVIRONMENT_MARKER = '# devstrap: workspace environment'
export const ALIASES_MARKER = '# devstrap: aliases'

export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, key: string) => {
    const value = vars[key]
    if (value === undefined) throw new Error(`Template variable {{${key}}} has no value`)
    return value
  })
}

// "$HOME/..." keeps profile lines portable between accounts.
export function toShellPath(file: string, homeDir: string): string {
  if (file === homeDir) return '$HOME'
  if (file.startsWith(homeDir + path.sep)) return `$HOME/${file.slice(homeDir.length + 1)}`
  return file
}

export function launcherPath(manifest: Manifest): string {
  return path.join(manifest.workspace.dir, `launch-${manifest.workspace.serverName}.sh`)
}

export function buildDesktopConfig(manifest: Manifest): string {
  const { workspace, runtimePackages } = manifest
  const checkoutDir = path.join(workspace.dir, workspace.checkout)
  const config = {
    mcpServers: {
      [workspace.serverName]: {
        command: runtimePackages.interpreter,
        args: [path.join(checkoutDir, workspace.entry)],
        env: { PYTHONPATH: checkoutDir }
      }
    }
  }
  return JSON.stringify(config, null, 2) + '\n'
}

export async function buildFragments(ctx: InstallerContext, manifest: Manifest): Promise<ConfigFragment[]> {
  const templates = path.join(ctx.rootDir, 'templates')
  const read = (name: string) => fs.readFile(path.join(templates, name), 'utf8')
  const { workspace, runtimePackages } = manifest
  const checkoutDir = path.join(workspace.dir, workspace.checkout)
  const vars = {
    WORKSPACE: toShellPath(workspace.dir, ctx.homeDir),
    CHECKOUT: workspace.checkout,
    CHECKOUT_DIR: checkoutDir,
    INTERPRETER: runtimePackages.interpreter,
    SERVER_NAME: workspace.serverName,
    ENTRY: workspace.entry
  }

  const homebrewPath = await read('shell/path-homebrew.sh')
  const localBinPath = await read('shell/path-local-bin.sh')
  const fragments: ConfigFragment[] = []

  for (const profile of PROFILE_FILES) {
    const target = path.join(ctx.homeDir, profile)
    fragments.push(
      { target, mode: 'append', marker: '/opt/homebrew/bin', content: homebrewPath, onlyIfExists: true },
      { target, mode: 'append', marker: '$HOME/.local/bin', content: localBinPath, onlyIfExists: true }
    )
  }

  const zshrc = path.join(ctx.homeDir, '.zshrc')
  fragments.push(
    { target: zshrc, mode: 'append', marker: ENVIRONMENT_MARKER, content: renderTemplate(await read('shell/zshrc-environment.sh'), vars) },
    { target: zshrc, mode: 'append', marker: ALIASES_MARKER, content: renderTemplate(await read('shell/zshrc-aliases.sh'), vars) },
    { target: workspace.desktopConfig, mode: 'overwrite', content: buildDesktopConfig(manifest) },
    { target: launcherPath(manifest), mode: 'overwrite', content: renderTemplate(await read('launch-server.sh'), vars), fileMode: 0o755 },
    { target: path.join(ctx.homeDir, '.config', 'ghostty', 'config'), mode: 'overwrite', content: await read('ghostty.conf') },
    { target: path.join(ctx.homeDir, '.config', 'gemini', 'setup-guide.md'), mode: 'overwrite', content: await read('gemini-setup-guide.md') }
  )
  return fragments
}
