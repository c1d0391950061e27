import { describe, it, expect } from 'vitest'
import {
  ALIASES_MARKER,
  ENVIRONMENT_MARKER,
  buildDesktopConfig,
  buildFragments,
  launcherPath,
  renderTemplate,
  toShellPath
} from '../src/installers/fragments.js'
import { hasMarker } from '../src/installers/configWriter.js'
import { makeCtx, makeManifest } from './test-utils.js'

describe('installers/fragments', () => {
  it('fills template variables', () => {
    expect(renderTemplate('exec {{INTERPRETER}} {{ENTRY}}', { INTERPRETER: 'python3.12', ENTRY: 'main.py' })).toBe('exec python3.12 main.py')
  })

  it('refuses to render a template with an unknown variable', () => {
    expect(() => renderTemplate('cd {{CHECKOUT_DIR}}', {})).toThrow('Template variable {{CHECKOUT_DIR}} has no value')
  })

  it('writes home-relative paths with $HOME', () => {
    expect(toShellPath('/Users/dev/mcp-workspace', '/Users/dev')).toBe('$HOME/mcp-workspace')
    expect(toShellPath('/Users/dev', '/Users/dev')).toBe('$HOME')
    expect(toShellPath('/opt/workspace', '/Users/dev')).toBe('/opt/workspace')
  })

  it('registers the server in the desktop config with absolute paths', () => {
    const text = buildDesktopConfig(makeManifest())
    expect(text.endsWith('}\n')).toBe(true)
    expect(JSON.parse(text)).toEqual({
      mcpServers: {
        'mcp-system': {
          command: 'python3.12',
          args: ['/tmp/home/mcp-workspace/mcp-system/src/main.py'],
          env: { PYTHONPATH: '/tmp/home/mcp-workspace/mcp-system' }
        }
      }
    })
  })

  it('names the launcher after the server', () => {
    expect(launcherPath(makeManifest())).toBe('/tmp/home/mcp-workspace/launch-mcp-system.sh')
  })

  describe('buildFragments', () => {
    it('lists profile PATH lines first, then the zshrc blocks and generated files', async () => {
      const fragments = await buildFragments(makeCtx(), makeManifest())
      expect(fragments.map((f) => `${f.mode} ${f.target}`)).toEqual([
        'append /tmp/home/.zshrc',
        'append /tmp/home/.zshrc',
        'append /tmp/home/.bash_profile',
        'append /tmp/home/.bash_profile',
        'append /tmp/home/.bashrc',
        'append /tmp/home/.bashrc',
        'append /tmp/home/.zshrc',
        'append /tmp/home/.zshrc',
        'overwrite /tmp/home/Library/Application Support/Claude/claude_desktop_config.json',
        'overwrite /tmp/home/mcp-workspace/launch-mcp-system.sh',
        'overwrite /tmp/home/.config/ghostty/config',
        'overwrite /tmp/home/.config/gemini/setup-guide.md'
      ])
    })

    it('only touches existing profiles for the PATH lines', async () => {
      const fragments = await buildFragments(makeCtx(), makeManifest())
      expect(fragments.slice(0, 6).every((f) => f.onlyIfExists === true)).toBe(true)
      expect(fragments.slice(6).some((f) => f.onlyIfExists)).toBe(false)
    })

    it('carries its own marker in every appended block', async () => {
      const fragments = await buildFragments(makeCtx(), makeManifest())
      for (const fragment of fragments.filter((f) => f.mode === 'append')) {
        expect(hasMarker(fragment.content, fragment.marker ?? '')).toBe(true)
      }
      expect(fragments[6]?.marker).toBe(ENVIRONMENT_MARKER)
      expect(fragments[7]?.marker).toBe(ALIASES_MARKER)
    })

    it('renders workspace values into the shell blocks and launcher', async () => {
      const fragments = await buildFragments(makeCtx(), makeManifest())
      const env = fragments[6]?.content.split('\n') ?? []
      const aliases = fragments[7]?.content.split('\n') ?? []
      const launcher = fragments[9]

      expect(env).toContain('export MCP_WORKSPACE="$HOME/mcp-workspace"')
      expect(env).toContain('export MCP_SYSTEM_PATH="$MCP_WORKSPACE/mcp-system"')
      expect(aliases).toContain('alias mcp-scan="cd $MCP_SYSTEM_PATH && python3.12 scripts/version_keeper.py"')
      expect(launcher?.fileMode).toBe(0o755)
      expect(launcher?.content.split('\n')).toContain('cd "/tmp/home/mcp-workspace/mcp-system" || exit 1')
      expect(launcher?.content.split('\n')).toContain('exec python3.12 src/main.py')
      for (const fragment of fragments) expect(fragment.content).not.toContain('{{')
    })
  })
})
