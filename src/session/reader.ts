import type { ConsoleSession } from "./session.js"

export type MarkerReadReason = "marker" | "timeout" | "closed" | "interrupted"

export interface MarkerReadResult {
  readonly found: boolean
  readonly reason: MarkerReadReason
  /** Text consumed by this call only; the transcript holds everything. */
  readonly text: string
  readonly elapsedMs: number
}

export interface ReadOptions {
  readonly signal?: AbortSignal
}

/**
 * Consumes console output until the text read by this call ends with `marker`,
 * the deadline passes, the output closes, or the signal aborts. Every unit read
 * lands in the transcript before the deadline is checked. When the marker ends
 * inside a chunk, the rest of the chunk stays pending for the next read.
 */
export const readUntilMarker = async (
  session: ConsoleSession,
  marker: string,
  timeoutMs: number,
  options: ReadOptions = {},
): Promise<MarkerReadResult> => {
  if (marker.length === 0) {
    throw new RangeError("Marker must be a non-empty string.")
  }
  const { signal } = options
  const startedAt = Date.now()
  const deadline = startedAt + timeoutMs
  const lastChar = marker[marker.length - 1]
  let text = ""

  const settle = (found: boolean, reason: MarkerReadReason): MarkerReadResult => {
    if (found) session.markPromptReady()
    return { found, reason, text, elapsedMs: Date.now() - startedAt }
  }

  for (;;) {
    if (signal?.aborted) return settle(false, "interrupted")

    const chunk = session.takeChunk()
    if (chunk !== undefined) {
      // Carry the previous tail so a marker split across chunks still matches.
      const window = text.slice(-marker.length) + chunk
      const offset = window.length - chunk.length
      let matchedAt = -1
      for (let index = 0; index < chunk.length; index += 1) {
        if (chunk[index] === lastChar && window.endsWith(marker, offset + index + 1)) {
          matchedAt = index
          break
        }
      }
      if (matchedAt >= 0) {
        const unit = chunk.slice(0, matchedAt + 1)
        text += unit
        session.record(unit)
        session.pushBack(chunk.slice(matchedAt + 1))
        return settle(true, "marker")
      }
      text += chunk
      session.record(chunk)
      continue
    }

    if (session.outputClosed) return settle(false, "closed")
    const remaining = deadline - Date.now()
    if (remaining <= 0) return settle(false, "timeout")
    await session.waitForOutput(remaining, signal)
  }
}

/**
 * Consumes whatever output is left once the process is gone, until end-of-stream
 * or the deadline. Returns the text consumed.
 */
export const drainOutput = async (session: ConsoleSession, timeoutMs: number): Promise<string> => {
  const deadline = Date.now() + timeoutMs
  let text = ""
  for (;;) {
    const chunk = session.takeChunk()
    if (chunk !== undefined) {
      text += chunk
      session.record(chunk)
      continue
    }
    const remaining = deadline - Date.now()
    if (session.outputClosed || remaining <= 0) return text
    await session.waitForOutput(remaining)
  }
}
