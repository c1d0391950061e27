import { describe, it, expect } from 'vitest'
import { createBackupPath, errorText, expandHome, formatCommand } from '../src/installers/utils.js'

describe('installers/utils', () => {
  it('turns thrown values into messages', () => {
    expect(errorText(new Error('Command failed (1): brew install fd'))).toBe('Command failed (1): brew install fd')
    expect(errorText('plain string')).toBe('plain string')
  })

  it('quotes arguments containing spaces', () => {
    expect(formatCommand('open', ['-a', 'Docker Desktop'])).toBe('open -a "Docker Desktop"')
  })

  it('expands a leading tilde only', () => {
    expect(expandHome('~/.config/nvim', '/Users/dev')).toBe('/Users/dev/.config/nvim')
    expect(expandHome('~', '/Users/dev')).toBe('/Users/dev')
    expect(expandHome('/opt/~x', '/Users/dev')).toBe('/opt/~x')
  })

  it('places the backup beside the original', () => {
    expect(createBackupPath('/Users/dev/.zshrc')).toBe('/Users/dev/.zshrc.devstrap-backup')
  })
})
