import { HarnessError, SessionStateError } from "../errors.js"
import type { HarnessLogger } from "../logging.js"
import { silentLogger } from "../logging.js"
import type { SessionScript } from "../types.js"
import { readUntilMarker, type MarkerReadResult } from "./reader.js"
import type { ConsoleSession } from "./session.js"

export type DriverStatus = "completed" | "aborted" | "interrupted"

export interface DriverOutcome {
  readonly status: DriverStatus
  /** Command lines written to the console, shutdown included. */
  readonly sent: readonly string[]
  readonly incidents: readonly HarnessError[]
}

export interface DriverOptions {
  readonly signal?: AbortSignal
  readonly logger?: HarnessLogger
}

/** Pause that ends early, without error, when the signal aborts. */
export const settleDelay = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (ms <= 0 || signal?.aborted) return Promise.resolve()
  return new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener("abort", done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener("abort", done, { once: true })
  })
}

const describeMiss = (read: MarkerReadResult, phase: "boot" | "command", timeoutMs: number): HarnessError => {
  switch (read.reason) {
    case "interrupted":
      return new HarnessError("Interrupted", `Interrupted while waiting for the ${phase} prompt.`)
    case "closed":
      return new HarnessError("StreamClosed", `Console output closed before the ${phase} prompt appeared.`)
    default:
      return phase === "boot"
        ? new HarnessError("BootTimeout", `Shell prompt not found within ${timeoutMs}ms of boot.`)
        : new HarnessError("PromptTimeout", `Prompt did not return within ${timeoutMs}ms.`)
  }
}

/**
 * Runs the scripted console exchange: boot prompt, each command followed by its
 * prompt, then the shutdown command. A command is only ever sent after its
 * preceding prompt was read; any miss stops the script.
 */
export const runScript = async (
  session: ConsoleSession,
  script: SessionScript,
  options: DriverOptions = {},
): Promise<DriverOutcome> => {
  const { signal } = options
  const logger = options.logger ?? silentLogger
  const sent: string[] = []
  const incidents: HarnessError[] = []

  const stop = (incident: HarnessError): DriverOutcome => {
    incidents.push(incident)
    logger.warn(incident.message)
    return { status: incident.kind === "Interrupted" ? "interrupted" : "aborted", sent, incidents }
  }

  const send = async (line: string): Promise<HarnessError | null> => {
    logger.info(`Sending '${line}' command...`)
    try {
      await session.sendLine(line)
    } catch (error) {
      if (error instanceof SessionStateError) throw error
      const reason = error instanceof Error ? error.message : String(error)
      return new HarnessError("StreamClosed", `Could not write '${line}' to the console: ${reason}`, error)
    }
    sent.push(line)
    await settleDelay(script.settleMs, signal)
    return signal?.aborted ? new HarnessError("Interrupted", `Interrupted after sending '${line}'.`) : null
  }

  logger.info("Waiting for shell...")
  const boot = await readUntilMarker(session, script.prompt, script.bootTimeoutMs, { signal })
  if (!boot.found) {
    return stop(describeMiss(boot, "boot", script.bootTimeoutMs))
  }

  for (const command of script.commands) {
    const failure = await send(command)
    if (failure) return stop(failure)
    const prompt = await readUntilMarker(session, script.prompt, script.promptTimeoutMs, { signal })
    if (!prompt.found) {
      return stop(describeMiss(prompt, "command", script.promptTimeoutMs))
    }
  }

  const failure = await send(script.shutdownCommand)
  if (failure) return stop(failure)
  return { status: "completed", sent, incidents }
}
