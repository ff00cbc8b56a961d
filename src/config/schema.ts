import type { ConfigIssue } from "../errors.js"
import type { Expectation, MirrorMode } from "../types.js"

export interface HarnessConfigInput {
  emulator?: {
    command?: string
    args?: string[]
    kernelImage?: string
    cwd?: string
  }
  prompt?: string
  timeouts?: {
    bootMs?: number
    promptMs?: number
    settleMs?: number
    exitMs?: number
    killGraceMs?: number
    drainMs?: number
  }
  commands?: string[]
  shutdownCommand?: string
  artifactPath?: string
  mirror?: MirrorMode
  expectations?: Expectation[]
}

type ValidationResult = {
  readonly config: HarnessConfigInput
  readonly issues: readonly ConfigIssue[]
}

type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const MIRROR_MODES: readonly MirrorMode[] = ["raw", "plain", "off"]
const ROOT_KEYS = [
  "emulator",
  "prompt",
  "timeouts",
  "commands",
  "shutdownCommand",
  "artifactPath",
  "mirror",
  "expectations",
]
const EMULATOR_KEYS = ["command", "args", "kernelImage", "cwd"]
const TIMEOUT_KEYS = ["bootMs", "promptMs", "settleMs", "exitMs", "killGraceMs", "drainMs"] as const

const toPath = (parts: readonly string[]): string => (parts.length > 0 ? parts.join(".") : "<root>")

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isMirrorMode = (value: string): value is MirrorMode =>
  MIRROR_MODES.some((mode) => mode === value)

const flagUnknownKeys = (
  source: Record<string, unknown>,
  known: readonly string[],
  path: readonly string[],
  issues: ConfigIssue[],
  strict: boolean,
) => {
  for (const key of Object.keys(source)) {
    if (known.includes(key)) continue
    issues.push({
      severity: strict ? "error" : "warning",
      path: toPath([...path, key]),
      message: "Unknown key.",
    })
  }
}

const readRecord = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ConfigIssue[],
): Record<string, unknown> | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!isRecord(value)) {
    issues.push({ severity: "error", path: toPath([...path, key]), message: `Expected object, received ${typeof value}.` })
    return undefined
  }
  return value
}

const readString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ConfigIssue[],
): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string") {
    issues.push({ severity: "error", path: toPath([...path, key]), message: `Expected string, received ${typeof value}.` })
    return undefined
  }
  if (value.length === 0) {
    issues.push({ severity: "error", path: toPath([...path, key]), message: "Must not be empty." })
    return undefined
  }
  return value
}

const readDuration = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ConfigIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected a non-negative number of milliseconds.",
    })
    return undefined
  }
  return value
}

const readStringList = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ConfigIssue[],
): string[] | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!Array.isArray(value)) {
    issues.push({ severity: "error", path: toPath([...path, key]), message: "Expected a list of strings." })
    return undefined
  }
  const items: string[] = []
  value.forEach((item: unknown, index) => {
    if (typeof item === "string") {
      items.push(item)
    } else {
      issues.push({ severity: "error", path: toPath([...path, key, String(index)]), message: "Expected string." })
    }
  })
  return items
}

const readExpectations = (
  source: Record<string, unknown>,
  path: readonly string[],
  issues: ConfigIssue[],
): Expectation[] | undefined => {
  if (!("expectations" in source) || source.expectations == null) return undefined
  const value = source.expectations
  if (!Array.isArray(value)) {
    issues.push({ severity: "error", path: toPath([...path, "expectations"]), message: "Expected a list." })
    return undefined
  }
  if (value.length === 0) {
    issues.push({ severity: "error", path: toPath([...path, "expectations"]), message: "At least one expectation is required." })
    return undefined
  }
  const expectations: Expectation[] = []
  value.forEach((entry: unknown, index) => {
    const entryPath = [...path, "expectations", String(index)]
    if (!isRecord(entry)) {
      issues.push({ severity: "error", path: toPath(entryPath), message: "Expected an object with label and expected." })
      return
    }
    const label = readString(entry, "label", entryPath, issues)
    const expected = readString(entry, "expected", entryPath, issues)
    if (entry.label == null) {
      issues.push({ severity: "error", path: toPath([...entryPath, "label"]), message: "Required." })
    }
    if (entry.expected == null) {
      issues.push({ severity: "error", path: toPath([...entryPath, "expected"]), message: "Required." })
    }
    if (label !== undefined && expected !== undefined) {
      expectations.push({ label, expected })
    }
  })
  return expectations
}

export const validateHarnessConfigInput = (
  value: unknown,
  options: ValidationOptions = { strictUnknownKeys: false },
): ValidationResult => {
  const issues: ConfigIssue[] = []
  if (value == null) return { config: {}, issues }
  if (!isRecord(value)) {
    issues.push({ severity: "error", path: "<root>", message: "Config must be a mapping." })
    return { config: {}, issues }
  }
  flagUnknownKeys(value, ROOT_KEYS, [], issues, options.strictUnknownKeys)

  const config: HarnessConfigInput = {}

  const emulator = readRecord(value, "emulator", [], issues)
  if (emulator) {
    flagUnknownKeys(emulator, EMULATOR_KEYS, ["emulator"], issues, options.strictUnknownKeys)
    config.emulator = {
      command: readString(emulator, "command", ["emulator"], issues),
      args: readStringList(emulator, "args", ["emulator"], issues),
      kernelImage: readString(emulator, "kernelImage", ["emulator"], issues),
      cwd: readString(emulator, "cwd", ["emulator"], issues),
    }
  }

  config.prompt = readString(value, "prompt", [], issues)

  const timeouts = readRecord(value, "timeouts", [], issues)
  if (timeouts) {
    flagUnknownKeys(timeouts, TIMEOUT_KEYS, ["timeouts"], issues, options.strictUnknownKeys)
    const parsed: NonNullable<HarnessConfigInput["timeouts"]> = {}
    for (const key of TIMEOUT_KEYS) {
      parsed[key] = readDuration(timeouts, key, ["timeouts"], issues)
    }
    config.timeouts = parsed
  }

  config.commands = readStringList(value, "commands", [], issues)
  config.shutdownCommand = readString(value, "shutdownCommand", [], issues)
  config.artifactPath = readString(value, "artifactPath", [], issues)

  const mirror = readString(value, "mirror", [], issues)
  if (mirror !== undefined) {
    if (isMirrorMode(mirror)) {
      config.mirror = mirror
    } else {
      issues.push({ severity: "error", path: "mirror", message: `Expected one of ${MIRROR_MODES.join(", ")}.` })
    }
  }

  config.expectations = readExpectations(value, [], issues)

  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ConfigIssue[]): string[] =>
  issues.map((issue) => `${issue.severity.toUpperCase()} ${issue.path}: ${issue.message}`)
