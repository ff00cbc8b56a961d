import { HarnessError } from "../errors.js"
import type { HarnessLogger } from "../logging.js"
import { silentLogger } from "../logging.js"
import type { LifecycleTimeouts, SessionState } from "../types.js"
import type { DriverOutcome } from "./driver.js"
import { drainOutput } from "./reader.js"
import type { ConsoleSession } from "./session.js"

export type ExitWaitResult = "exited" | "timeout" | "interrupted"

export interface SettledSession {
  readonly state: SessionState
  readonly transcript: string
  readonly incidents: readonly HarnessError[]
}

export interface SettleOptions {
  readonly signal?: AbortSignal
  readonly logger?: HarnessLogger
}

export const awaitExit = (
  session: ConsoleSession,
  timeoutMs: number,
  options: { readonly signal?: AbortSignal } = {},
): Promise<ExitWaitResult> => {
  const { signal } = options
  if (session.exit) return Promise.resolve("exited")
  if (signal?.aborted) return Promise.resolve("interrupted")
  return new Promise<ExitWaitResult>((resolve) => {
    let settled = false
    const finish = (result: ExitWaitResult) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener("abort", onAbort)
      resolve(result)
    }
    const onAbort = () => finish("interrupted")
    const timer = setTimeout(() => finish("timeout"), Math.max(0, timeoutMs))
    signal?.addEventListener("abort", onAbort, { once: true })
    session.exited.then(
      () => finish("exited"),
      () => finish("exited"),
    )
  })
}

/**
 * Sends SIGKILL and waits up to `graceMs` for the exit to be observed.
 * Resolves true when the child is known to be gone.
 */
export const forceTerminate = async (
  session: ConsoleSession,
  graceMs: number,
  logger: HarnessLogger = silentLogger,
): Promise<boolean> => {
  if (session.exit) return true
  session.kill("SIGKILL")
  const result = await awaitExit(session, graceMs)
  if (result !== "exited") {
    logger.error(`Emulator (pid ${session.pid ?? "unknown"}) did not exit ${graceMs}ms after SIGKILL.`)
    return false
  }
  return true
}

/**
 * Brings the child to a terminal state after the script: a completed script
 * gets a bounded wait for a clean exit, anything else is killed at once. The
 * remaining output is then drained and the transcript sealed.
 */
export const settleSession = async (
  session: ConsoleSession,
  outcome: DriverOutcome,
  timeouts: LifecycleTimeouts,
  options: SettleOptions = {},
): Promise<SettledSession> => {
  const logger = options.logger ?? silentLogger
  const incidents: HarnessError[] = []

  if (outcome.status === "completed") {
    const waited = await awaitExit(session, timeouts.exitTimeoutMs, { signal: options.signal })
    if (waited === "timeout") {
      const incident = new HarnessError(
        "ShutdownTimeout",
        `Emulator did not shut down within ${timeouts.exitTimeoutMs}ms, killing...`,
      )
      incidents.push(incident)
      logger.warn(incident.message)
      await forceTerminate(session, timeouts.killGraceMs, logger)
    } else if (waited === "interrupted") {
      const incident = new HarnessError("Interrupted", "Interrupted, killing emulator...")
      incidents.push(incident)
      logger.warn(incident.message)
      await forceTerminate(session, timeouts.killGraceMs, logger)
    }
  } else {
    logger.warn("Script did not complete, killing emulator...")
    await forceTerminate(session, timeouts.killGraceMs, logger)
  }

  await drainOutput(session, timeouts.drainTimeoutMs)
  const transcript = session.finish()
  return { state: session.state, transcript, incidents }
}

/**
 * Routes SIGINT/SIGTERM into the run's abort controller. Returns a disposer
 * that removes the listeners.
 */
export const installInterruptHandlers = (
  controller: AbortController,
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): (() => void) => {
  const onSignal = () => controller.abort()
  for (const name of signals) {
    process.on(name, onSignal)
  }
  return () => {
    for (const name of signals) {
      process.removeListener(name, onSignal)
    }
  }
}
