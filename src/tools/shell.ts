import {execa} from 'execa'

const MAX_OUTPUT_CHARS = 16_000

function resolveShell(): string | true {
  if (process.env.SHELL?.trim()) return process.env.SHELL
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

function clip(text: string): string {
  return text.length > MAX_OUTPUT_CHARS ? `${text.slice(0, MAX_OUTPUT_CHARS)}\n...[truncated]` : text
}

export type ShellOutcome = {
  exitCode: number | undefined
  output: string
}

export async function runShell(command: string, cwd = process.cwd(), signal?: AbortSignal): Promise<ShellOutcome> {
  const result = await execa(command, {
    cwd,
    reject: false,
    shell: resolveShell(),
    cancelSignal: signal
  })
  if (result.isCanceled) {
    throw new Error(`command cancelled: ${command}`)
  }

  const header = `exit_code=${result.exitCode ?? 'unknown'}`
  const stdout = String(result.stdout ?? '')
  const stderr = String(result.stderr ?? '')
  if (!stdout && !stderr) return {exitCode: result.exitCode, output: `${header}\n(no output)`}
  return {exitCode: result.exitCode, output: clip([header, stdout, stderr].filter(Boolean).join('\n'))}
}

const DESTRUCTIVE_PATTERNS = [
  /\brm\b/,
  /\brmdir\b/,
  /\bunlink\b/,
  /\bmv\b.+\s\/dev\/null/,
  /\bgit\s+reset\s+--hard\b/,
  /\bgit\s+clean\b/,
  /\bterraform\s+(apply|destroy)\b/,
  /\bkubectl\s+delete\b/
]

export function looksDestructiveCommand(command: string): boolean {
  const text = command.toLowerCase().trim()
  return DESTRUCTIVE_PATTERNS.some((pattern) => pattern.test(text))
}
