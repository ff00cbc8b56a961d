import dotenv from "dotenv"
import { promises as fs } from "node:fs"
import path from "node:path"
import { parse } from "yaml"
import { HarnessConfigError, type ConfigIssue } from "../errors.js"
import { DEFAULT_ARTIFACT_PATH } from "../report/transcriptStore.js"
import { DEFAULT_EXPECTATIONS } from "../report/verifier.js"
import { buildEmulatorArgs, DEFAULT_KERNEL_IMAGE, DEFAULT_QEMU_BINARY } from "../session/launcher.js"
import type { HarnessConfig, MirrorMode } from "../types.js"
import { formatValidationIssues, isMirrorMode, validateHarnessConfigInput, type HarnessConfigInput } from "./schema.js"

dotenv.config()

export const DEFAULT_CONFIG_FILE = "harness.yaml"
export const DEFAULT_PROMPT = "> "
export const DEFAULT_BOOT_TIMEOUT_MS = 10_000
export const DEFAULT_PROMPT_TIMEOUT_MS = 5_000
export const DEFAULT_SETTLE_MS = 2_000
export const DEFAULT_EXIT_TIMEOUT_MS = 5_000
const DEFAULT_KILL_GRACE_MS = 2_000
const DEFAULT_DRAIN_TIMEOUT_MS = 1_000

export interface HarnessConfigOverrides {
  readonly configPath?: string
  readonly artifactPath?: string
  readonly kernelImage?: string
  readonly mirror?: MirrorMode
}

export interface LoadHarnessConfigOptions extends HarnessConfigOverrides {
  readonly env?: NodeJS.ProcessEnv
  readonly cwd?: string
  readonly strictUnknownKeys?: boolean
  readonly onWarning?: (message: string) => void
}

const mergeConfigInput = (base: HarnessConfigInput, patch: HarnessConfigInput): HarnessConfigInput => ({
  emulator: {
    command: patch.emulator?.command ?? base.emulator?.command,
    args: patch.emulator?.args ?? base.emulator?.args,
    kernelImage: patch.emulator?.kernelImage ?? base.emulator?.kernelImage,
    cwd: patch.emulator?.cwd ?? base.emulator?.cwd,
  },
  prompt: patch.prompt ?? base.prompt,
  timeouts: {
    bootMs: patch.timeouts?.bootMs ?? base.timeouts?.bootMs,
    promptMs: patch.timeouts?.promptMs ?? base.timeouts?.promptMs,
    settleMs: patch.timeouts?.settleMs ?? base.timeouts?.settleMs,
    exitMs: patch.timeouts?.exitMs ?? base.timeouts?.exitMs,
    killGraceMs: patch.timeouts?.killGraceMs ?? base.timeouts?.killGraceMs,
    drainMs: patch.timeouts?.drainMs ?? base.timeouts?.drainMs,
  },
  commands: patch.commands ?? base.commands,
  shutdownCommand: patch.shutdownCommand ?? base.shutdownCommand,
  artifactPath: patch.artifactPath ?? base.artifactPath,
  mirror: patch.mirror ?? base.mirror,
  expectations: patch.expectations ?? base.expectations,
})

const readYamlInput = async (
  filePath: string,
  { required, strictUnknownKeys }: { required: boolean; strictUnknownKeys: boolean },
): Promise<{ config: HarnessConfigInput; warnings: string[] }> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT" && !required) {
      return { config: {}, warnings: [] }
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new HarnessConfigError(filePath, [{ severity: "error", path: "<root>", message }])
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new HarnessConfigError(filePath, [{ severity: "error", path: "<root>", message }])
  }
  const validated = validateHarnessConfigInput(parsed, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new HarnessConfigError(filePath, errors)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const envConfigLayer = (env: NodeJS.ProcessEnv): { config: HarnessConfigInput; issues: ConfigIssue[] } => {
  const issues: ConfigIssue[] = []
  const config: HarnessConfigInput = {}
  const command = env.BOGO_QEMU_BIN?.trim()
  const kernelImage = env.BOGO_KERNEL_IMAGE?.trim()
  if (command || kernelImage) {
    config.emulator = { command: command || undefined, kernelImage: kernelImage || undefined }
  }
  const artifactPath = env.BOGO_HARNESS_ARTIFACT?.trim()
  if (artifactPath) config.artifactPath = artifactPath
  const mirror = env.BOGO_HARNESS_MIRROR?.trim().toLowerCase()
  if (mirror) {
    if (isMirrorMode(mirror)) {
      config.mirror = mirror
    } else {
      issues.push({ severity: "warning", path: "BOGO_HARNESS_MIRROR", message: `Ignoring unknown mirror mode "${mirror}".` })
    }
  }
  return { config, issues }
}

/** Points `-kernel` at `image`, appending the flag when the list has none. */
export const withKernelImage = (args: readonly string[], image: string): string[] => {
  const flag = args.indexOf("-kernel")
  if (flag < 0 || flag === args.length - 1) {
    return [...args.slice(0, flag < 0 ? args.length : flag), "-kernel", image]
  }
  return args.map((arg, index) => (index === flag + 1 ? image : arg))
}

export const resolveHarnessConfig = (input: HarnessConfigInput, cwd: string = process.cwd()): HarnessConfig => {
  const kernelImage = input.emulator?.kernelImage ?? DEFAULT_KERNEL_IMAGE
  return {
    emulator: {
      command: input.emulator?.command ?? DEFAULT_QEMU_BINARY,
      args: input.emulator?.args ?? buildEmulatorArgs(kernelImage),
      cwd: path.resolve(cwd, input.emulator?.cwd ?? "."),
    },
    prompt: input.prompt ?? DEFAULT_PROMPT,
    bootTimeoutMs: input.timeouts?.bootMs ?? DEFAULT_BOOT_TIMEOUT_MS,
    promptTimeoutMs: input.timeouts?.promptMs ?? DEFAULT_PROMPT_TIMEOUT_MS,
    settleMs: input.timeouts?.settleMs ?? DEFAULT_SETTLE_MS,
    exitTimeoutMs: input.timeouts?.exitMs ?? DEFAULT_EXIT_TIMEOUT_MS,
    killGraceMs: input.timeouts?.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    drainTimeoutMs: input.timeouts?.drainMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
    commands: input.commands ?? ["hello"],
    shutdownCommand: input.shutdownCommand ?? "shutdown",
    artifactPath: path.resolve(cwd, input.artifactPath ?? DEFAULT_ARTIFACT_PATH),
    mirror: input.mirror ?? "raw",
    expectations: input.expectations ?? DEFAULT_EXPECTATIONS,
  }
}

/**
 * Layers defaults < config file < environment < explicit overrides. The config
 * file is optional unless named through `configPath` or BOGO_HARNESS_CONFIG.
 */
export const loadHarnessConfig = async (options: LoadHarnessConfigOptions = {}): Promise<HarnessConfig> => {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const explicitPath = options.configPath?.trim() || env.BOGO_HARNESS_CONFIG?.trim()
  const configPath = path.resolve(cwd, explicitPath || DEFAULT_CONFIG_FILE)

  const file = await readYamlInput(configPath, {
    required: Boolean(explicitPath),
    strictUnknownKeys: options.strictUnknownKeys ?? false,
  })
  const fromEnv = envConfigLayer(env)
  const warnings = [...file.warnings, ...formatValidationIssues(fromEnv.issues)]
  for (const warning of warnings) {
    options.onWarning?.(warning)
  }

  const overrides: HarnessConfigInput = {
    emulator: { kernelImage: options.kernelImage },
    artifactPath: options.artifactPath,
    mirror: options.mirror,
  }
  const merged = mergeConfigInput(mergeConfigInput(file.config, fromEnv.config), overrides)
  // Explicit args from the file still follow a kernel image given by env or flag.
  const kernelOverride = options.kernelImage ?? fromEnv.config.emulator?.kernelImage
  const fileArgs = merged.emulator?.args
  if (fileArgs && kernelOverride) {
    merged.emulator = { ...merged.emulator, args: withKernelImage(fileArgs, kernelOverride) }
  }
  return resolveHarnessConfig(merged, cwd)
}
