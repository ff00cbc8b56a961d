import type { Readable } from "node:stream"

export type SessionState = "created" | "running" | "completed" | "killed"

export type MirrorMode = "raw" | "plain" | "off"

export interface Expectation {
  readonly label: string
  readonly expected: string
}

export interface ExpectationOutcome extends Expectation {
  readonly passed: boolean
}

export interface TestResult {
  readonly outcomes: readonly ExpectationOutcome[]
  readonly passed: number
  readonly total: number
  readonly ok: boolean
}

export interface ProcessExit {
  readonly code: number | null
  readonly signal: NodeJS.Signals | null
  readonly error?: Error
}

/**
 * Handle on a running console process. `output` carries stdout and stderr
 * merged in arrival order.
 */
export interface ConsoleProcess {
  readonly pid: number | undefined
  readonly output: Readable
  readonly exited: Promise<ProcessExit>
  write(text: string): Promise<void>
  kill(signal?: NodeJS.Signals): boolean
}

export interface EmulatorCommand {
  readonly command: string
  readonly args: readonly string[]
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
}

export interface SessionScript {
  readonly prompt: string
  readonly bootTimeoutMs: number
  readonly promptTimeoutMs: number
  readonly settleMs: number
  readonly commands: readonly string[]
  readonly shutdownCommand: string
}

export interface LifecycleTimeouts {
  readonly exitTimeoutMs: number
  readonly killGraceMs: number
  readonly drainTimeoutMs: number
}

export interface HarnessConfig extends SessionScript, LifecycleTimeouts {
  readonly emulator: EmulatorCommand
  readonly artifactPath: string
  readonly mirror: MirrorMode
  readonly expectations: readonly Expectation[]
}
