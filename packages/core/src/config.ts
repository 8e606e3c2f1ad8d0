import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'

export const DATA_DIR_NAME = '.daybook'
const CONFIG_FILENAME = 'config.yaml'

export function findDataDir(): string {
  // Walk up from cwd looking for an existing .daybook/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, DATA_DIR_NAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // No .daybook/ found, default to the project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, DATA_DIR_NAME)
    }
    dir = path.dirname(dir)
  }
  // Fallback: cwd
  return path.resolve(DATA_DIR_NAME)
}

/**
 * Explicit directory, then $DAYBOOK_DIR, then the nearest .daybook/
 */
export function resolveDataDir(dataDir?: string): string {
  return dataDir ?? process.env.DAYBOOK_DIR ?? findDataDir()
}

/**
 * Parsed config.yaml, or null when it is missing or unreadable
 */
export function loadYamlConfig(dataDir: string): unknown {
  const configPath = path.join(dataDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }
  try {
    const raw = readFileSync(configPath, 'utf-8')
    return parse(raw)
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return null
  }
}
