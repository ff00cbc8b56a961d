import { SessionStateError } from "../errors.js"
import type { ConsoleProcess, ProcessExit, SessionState } from "../types.js"
import { Transcript } from "./transcript.js"

export interface ConsoleSessionOptions {
  /** Receives every unit as it is consumed into the transcript. */
  readonly mirror?: (unit: string) => void
}

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)))

/**
 * One end-to-end run of the emulated target. Owns the child process, the output
 * not yet consumed by a reader, and the transcript of everything that was.
 */
export class ConsoleSession {
  readonly transcript = new Transcript()

  private current: SessionState = "created"
  private readonly pending: string[] = []
  private readonly waiters = new Set<() => void>()
  private closed = false
  private promptReady = false
  private killRequested = false
  private exitInfo: ProcessExit | null = null

  constructor(
    private readonly child: ConsoleProcess,
    private readonly options: ConsoleSessionOptions = {},
  ) {}

  get state(): SessionState {
    return this.current
  }

  get pid(): number | undefined {
    return this.child.pid
  }

  get outputClosed(): boolean {
    return this.closed
  }

  get hasPendingOutput(): boolean {
    return this.pending.length > 0
  }

  get isPromptReady(): boolean {
    return this.promptReady
  }

  get exit(): ProcessExit | null {
    return this.exitInfo
  }

  get exited(): Promise<ProcessExit> {
    return this.child.exited
  }

  get wasKilled(): boolean {
    return this.killRequested
  }

  start(): void {
    if (this.current !== "created") {
      throw new SessionStateError(`Session cannot start from state ${this.current}.`, this.current)
    }
    const { output } = this.child
    output.setEncoding("utf8")
    output.on("data", (chunk: string | Buffer) => {
      this.enqueue(typeof chunk === "string" ? chunk : chunk.toString("utf8"))
    })
    // A read failure is treated the same as end-of-stream.
    output.once("end", () => this.markClosed())
    output.once("close", () => this.markClosed())
    output.on("error", () => this.markClosed())
    this.child.exited
      .then((exit) => this.recordExit(exit))
      .catch((error: unknown) => this.recordExit({ code: null, signal: null, error: toError(error) }))
    this.current = "running"
  }

  takeChunk(): string | undefined {
    return this.pending.shift()
  }

  /** Returns unconsumed text to the front of the pending output. */
  pushBack(rest: string): void {
    if (rest.length > 0) {
      this.pending.unshift(rest)
    }
  }

  record(unit: string): void {
    this.transcript.append(unit)
    this.options.mirror?.(unit)
  }

  markPromptReady(): void {
    this.promptReady = true
  }

  waitForOutput(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (this.pending.length > 0 || this.closed || signal?.aborted || timeoutMs <= 0) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer)
        this.waiters.delete(done)
        signal?.removeEventListener("abort", done)
        resolve()
      }
      const timer = setTimeout(done, timeoutMs)
      this.waiters.add(done)
      signal?.addEventListener("abort", done, { once: true })
    })
  }

  async sendLine(line: string): Promise<void> {
    if (this.current !== "running") {
      throw new SessionStateError(`Cannot send "${line}" while the session is ${this.current}.`, this.current)
    }
    if (!this.promptReady) {
      throw new SessionStateError(`Cannot send "${line}" before a prompt was detected.`, this.current)
    }
    this.promptReady = false
    await this.child.write(`${line}\n`)
  }

  /** A child that already exited is not counted as killed. */
  kill(signal: NodeJS.Signals = "SIGKILL"): boolean {
    const delivered = this.child.kill(signal)
    if (delivered) {
      this.killRequested = true
    }
    return delivered
  }

  /** Moves the session to its terminal state and seals the transcript. */
  finish(): string {
    if (this.current === "running" || this.current === "created") {
      this.current = this.killRequested ? "killed" : "completed"
    }
    this.promptReady = false
    return this.transcript.seal()
  }

  private enqueue(chunk: string): void {
    if (chunk.length === 0) return
    this.pending.push(chunk)
    this.wake()
  }

  private markClosed(): void {
    if (this.closed) return
    this.closed = true
    this.wake()
  }

  private recordExit(exit: ProcessExit): void {
    this.exitInfo ??= exit
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) {
      waiter()
    }
  }
}
