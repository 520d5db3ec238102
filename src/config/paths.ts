import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getSkiffHome(): string {
  const custom = process.env.SKIFF_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.skiff')
}

export function getGlobalEnvPath(): string {
  return resolve(getSkiffHome(), '.env')
}

export function getMemoryPath(homeDir = getSkiffHome()): string {
  return resolve(homeDir, 'memory.md')
}

export function getSessionsDir(homeDir = getSkiffHome()): string {
  return resolve(homeDir, 'sessions')
}

export function getLogsDir(homeDir = getSkiffHome()): string {
  return resolve(homeDir, 'logs')
}

export function getEventLogPath(sessionId: string, homeDir = getSkiffHome()): string {
  return resolve(getLogsDir(homeDir), `${sessionId}.jsonl`)
}
