import chalk, { type ChalkInstance } from "chalk"
import stripAnsi from "strip-ansi"
import { HarnessError } from "./errors.js"
import { consoleLogger, type HarnessLogger } from "./logging.js"
import { persistTranscript } from "./report/transcriptStore.js"
import { exitCodeFor, formatReport, verifyTranscript } from "./report/verifier.js"
import { runScript, type DriverStatus } from "./session/driver.js"
import { launchEmulator } from "./session/launcher.js"
import { installInterruptHandlers, settleSession, type SettledSession } from "./session/lifecycle.js"
import { ConsoleSession } from "./session/session.js"
import type { ConsoleProcess, EmulatorCommand, HarnessConfig, MirrorMode, SessionState, TestResult } from "./types.js"

export interface HarnessDependencies {
  readonly launch?: (command: EmulatorCommand) => ConsoleProcess
  readonly logger?: HarnessLogger
  /** Receives each line of the verdict report. */
  readonly print?: (line: string) => void
  /** Replaces the stdout mirror selected by `config.mirror`. */
  readonly mirror?: (unit: string) => void
  /** External cancellation; when absent, SIGINT/SIGTERM cancel the run. */
  readonly signal?: AbortSignal
  readonly painter?: ChalkInstance
}

export interface HarnessReport {
  readonly result: TestResult
  readonly exitCode: number
  readonly sessionState: SessionState
  readonly driverStatus: DriverStatus
  readonly transcript: string
  readonly artifactPath: string | null
  readonly incidents: readonly HarnessError[]
}

export const createMirror = (
  mode: MirrorMode,
  write: (text: string) => void = (text) => {
    process.stdout.write(text)
  },
): ((unit: string) => void) | undefined => {
  switch (mode) {
    case "raw":
      return write
    case "plain":
      return (unit) => {
        const text = stripAnsi(unit)
        if (text.length > 0) write(text)
      }
    case "off":
      return undefined
  }
}

const linkCancellation = (controller: AbortController, signal: AbortSignal | undefined): (() => void) => {
  if (!signal) return installInterruptHandlers(controller)
  if (signal.aborted) {
    controller.abort()
    return () => undefined
  }
  const forward = () => controller.abort()
  signal.addEventListener("abort", forward, { once: true })
  return () => signal.removeEventListener("abort", forward)
}

interface SessionRun {
  readonly settled: SettledSession
  readonly driverStatus: DriverStatus
  readonly incidents: readonly HarnessError[]
}

const runSession = async (config: HarnessConfig, deps: HarnessDependencies, logger: HarnessLogger): Promise<SessionRun> => {
  const controller = new AbortController()
  const detach = linkCancellation(controller, deps.signal)
  const launch = deps.launch ?? launchEmulator
  try {
    logger.info(`Starting ${config.emulator.command}...`)
    const child = launch(config.emulator)
    const session = new ConsoleSession(child, { mirror: deps.mirror ?? createMirror(config.mirror) })
    session.start()
    try {
      const outcome = await runScript(session, config, { signal: controller.signal, logger })
      const settled = await settleSession(session, outcome, config, { signal: controller.signal, logger })
      const incidents = [...outcome.incidents, ...settled.incidents]
      const launchError = session.exit?.error
      if (launchError) {
        const incident = new HarnessError("LaunchFailed", `Could not run ${config.emulator.command}: ${launchError.message}`, launchError)
        logger.error(incident.message)
        incidents.unshift(incident)
      }
      return { settled, driverStatus: outcome.status, incidents }
    } finally {
      if (session.exit === null && !session.wasKilled) {
        session.kill("SIGKILL")
      }
    }
  } finally {
    detach()
  }
}

/**
 * One complete run: spawn, script, settle, persist, verify. Recoverable
 * failures end up in `incidents`; the verdict depends on the transcript only.
 */
export const runHarness = async (config: HarnessConfig, deps: HarnessDependencies = {}): Promise<HarnessReport> => {
  const logger = deps.logger ?? consoleLogger
  const print = deps.print ?? ((line: string) => console.log(line))
  const painter = deps.painter ?? chalk

  const { settled, driverStatus, incidents } = await runSession(config, deps, logger)

  let artifactPath: string | null = null
  try {
    artifactPath = await persistTranscript(config.artifactPath, settled.transcript)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error(`Could not save transcript to ${config.artifactPath}: ${message}`)
  }

  const result = verifyTranscript(settled.transcript, config.expectations)
  print("")
  print("=== Test Results ===")
  for (const line of formatReport(result, painter)) {
    print(line)
  }
  if (artifactPath) {
    print(`Full output saved to ${artifactPath}`)
  }

  return {
    result,
    exitCode: exitCodeFor(result),
    sessionState: settled.state,
    driverStatus,
    transcript: settled.transcript,
    artifactPath,
    incidents,
  }
}
