import type { SessionState } from "./types.js"

export type HarnessErrorKind =
  | "BootTimeout"
  | "PromptTimeout"
  | "StreamClosed"
  | "ShutdownTimeout"
  | "Interrupted"
  | "LaunchFailed"

/**
 * A failure the harness recovers from. These are collected as incidents on the
 * run and logged; the harness always goes on to persist and verify.
 */
export class HarnessError extends Error {
  readonly kind: HarnessErrorKind

  constructor(kind: HarnessErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "HarnessError"
    this.kind = kind
  }
}

export class SessionStateError extends Error {
  readonly state: SessionState

  constructor(message: string, state: SessionState) {
    super(message)
    this.name = "SessionStateError"
    this.state = state
  }
}

export interface ConfigIssue {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export class HarnessConfigError extends Error {
  readonly source: string
  readonly issues: readonly ConfigIssue[]

  constructor(source: string, issues: readonly ConfigIssue[]) {
    super(`Invalid harness config at ${source}\n${issues.map((issue) => `- ${issue.path}: ${issue.message}`).join("\n")}`)
    this.name = "HarnessConfigError"
    this.source = source
    this.issues = issues
  }
}
