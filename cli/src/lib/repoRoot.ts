import { accessSync } from 'fs'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

// Walk up to 6 levels looking for templates/tools.toml; works from src/ and dist/.
export function findRepoRoot(start: string = __dirname): string {
  let cur = start
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'templates', 'tools.toml'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(start, '..')
}
