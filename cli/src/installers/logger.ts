import type { Logger } from './types.js'
import { createWriteStream } from 'fs'

type Level = 'log' | 'info' | 'ok' | 'warn' | 'err'

const GLYPHS: Record<Level, string> = { log: '', info: '', ok: '✔', warn: '⚠', err: '✖' }

// Terminal lines carry a glyph; the log file gets a timestamp and level so
// repeated runs appended to ~/.devstrap can be told apart.
export function createLogger(logFile: string): Logger {
  let logStream: ReturnType<typeof createWriteStream> | null = createWriteStream(logFile, { flags: 'a', mode: 0o600 })
  // createWriteStream reports open failures through "error", not by throwing.
  logStream.on('error', () => {
    logStream = null
  })

  const write = (level: Level, msg: string) => {
    const glyph = GLYPHS[level]
    process.stdout.write(glyph ? `${glyph} ${msg}\n` : `${msg}\n`)
    logStream?.write(`${new Date().toISOString()} ${level.toUpperCase().padEnd(4)} ${msg}\n`)
  }

  return {
    log: (msg: string) => write('log', msg),
    info: (msg: string) => write('info', msg),
    ok: (msg: string) => write('ok', msg),
    warn: (msg: string) => write('warn', msg),
    err: (msg: string) => write('err', msg)
  }
}
