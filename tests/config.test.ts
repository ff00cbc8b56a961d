import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { loadHarnessConfig, resolveHarnessConfig } from "../src/config/harnessConfig.js"
import { validateHarnessConfigInput } from "../src/config/schema.js"
import { HarnessConfigError } from "../src/errors.js"
import { DEFAULT_EXPECTATIONS } from "../src/report/verifier.js"
import { buildEmulatorArgs } from "../src/session/launcher.js"

const fixturePath = fileURLToPath(new URL("./fixtures/harness.yaml", import.meta.url))

let tempDir: string

beforeEach(() => {
  tempDir = mkdtempSync(path.join(tmpdir(), "bogo-harness-config-"))
})

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true })
})

const writeConfig = (contents: string): string => {
  const file = path.join(tempDir, "harness.yaml")
  writeFileSync(file, contents)
  return file
}

const loadError = async (promise: Promise<unknown>): Promise<HarnessConfigError> => {
  try {
    await promise
  } catch (error) {
    if (error instanceof HarnessConfigError) return error
    throw error
  }
  throw new Error("expected the config to be rejected")
}

describe("loadHarnessConfig", () => {
  it("falls back to defaults without a config file", async () => {
    const config = await loadHarnessConfig({ env: {}, cwd: tempDir })
    expect(config).toEqual({
      emulator: {
        command: "qemu-system-riscv64",
        args: buildEmulatorArgs("target/riscv64gc-unknown-none-elf/debug/kernel"),
        cwd: tempDir,
      },
      prompt: "> ",
      bootTimeoutMs: 10_000,
      promptTimeoutMs: 5_000,
      settleMs: 2_000,
      exitTimeoutMs: 5_000,
      killGraceMs: 2_000,
      drainTimeoutMs: 1_000,
      commands: ["hello"],
      shutdownCommand: "shutdown",
      artifactPath: path.join(tempDir, "test_output.txt"),
      mirror: "raw",
      expectations: DEFAULT_EXPECTATIONS,
    })
  })

  it("reads a YAML config file", async () => {
    const config = await loadHarnessConfig({ configPath: fixturePath, env: {}, cwd: tempDir })
    expect(config.emulator.args).toEqual(buildEmulatorArgs("build/kernel.elf"))
    expect(config.prompt).toBe("$ ")
    expect(config.bootTimeoutMs).toBe(20_000)
    expect(config.promptTimeoutMs).toBe(5_000)
    expect(config.settleMs).toBe(500)
    expect(config.commands).toEqual(["hello", "ls"])
    expect(config.artifactPath).toBe(path.join(tempDir, "out", "console.txt"))
    expect(config.mirror).toBe("plain")
    expect(config.expectations).toEqual([{ label: "Shell loaded", expected: "Welcome to BogoShell!" }])
  })

  it("finds the config file through the environment", async () => {
    const config = await loadHarnessConfig({ env: { BOGO_HARNESS_CONFIG: fixturePath }, cwd: tempDir })
    expect(config.prompt).toBe("$ ")
  })

  it("lets the environment override the file", async () => {
    const config = await loadHarnessConfig({
      configPath: fixturePath,
      env: { BOGO_HARNESS_ARTIFACT: "env.txt", BOGO_HARNESS_MIRROR: "OFF", BOGO_KERNEL_IMAGE: "env-kernel" },
      cwd: tempDir,
    })
    expect(config.artifactPath).toBe(path.join(tempDir, "env.txt"))
    expect(config.mirror).toBe("off")
    expect(config.emulator.args).toEqual(buildEmulatorArgs("env-kernel"))
    expect(config.emulator.command).toBe("qemu-system-riscv64")
  })

  it("lets explicit overrides win over the environment", async () => {
    const config = await loadHarnessConfig({
      configPath: fixturePath,
      env: { BOGO_HARNESS_ARTIFACT: "env.txt", BOGO_HARNESS_MIRROR: "off", BOGO_KERNEL_IMAGE: "env-kernel" },
      cwd: tempDir,
      artifactPath: "cli.txt",
      kernelImage: "cli-kernel",
      mirror: "raw",
    })
    expect(config.artifactPath).toBe(path.join(tempDir, "cli.txt"))
    expect(config.mirror).toBe("raw")
    expect(config.emulator.args).toEqual(buildEmulatorArgs("cli-kernel"))
  })

  it("rejects a named config file that does not exist", async () => {
    const error = await loadError(loadHarnessConfig({ configPath: "missing.yaml", env: {}, cwd: tempDir }))
    expect(error.source).toBe(path.join(tempDir, "missing.yaml"))
    expect(error.issues).toHaveLength(1)
  })

  it("collects every invalid field", async () => {
    writeConfig(["timeouts:", "  bootMs: -1", "mirror: loud", "expectations:", "  - label: Shell loaded"].join("\n"))
    const error = await loadError(loadHarnessConfig({ env: {}, cwd: tempDir }))
    expect(error.issues).toEqual([
      { severity: "error", path: "timeouts.bootMs", message: "Expected a non-negative number of milliseconds." },
      { severity: "error", path: "mirror", message: "Expected one of raw, plain, off." },
      { severity: "error", path: "expectations.0.expected", message: "Required." },
    ])
  })

  it("reports malformed YAML as a config error", async () => {
    writeConfig("commands: [hello\n")
    const error = await loadError(loadHarnessConfig({ env: {}, cwd: tempDir }))
    expect(error.issues[0]?.path).toBe("<root>")
  })

  it("warns about unknown keys unless strict", async () => {
    writeConfig("colour: blue\nprompt: '# '\n")
    const warnings: string[] = []
    const config = await loadHarnessConfig({ env: {}, cwd: tempDir, onWarning: (message) => warnings.push(message) })
    expect(config.prompt).toBe("# ")
    expect(warnings).toEqual(["WARNING colour: Unknown key."])

    const error = await loadError(loadHarnessConfig({ env: {}, cwd: tempDir, strictUnknownKeys: true }))
    expect(error.issues).toEqual([{ severity: "error", path: "colour", message: "Unknown key." }])
  })

  it("ignores an unknown mirror mode from the environment", async () => {
    const warnings: string[] = []
    const config = await loadHarnessConfig({
      env: { BOGO_HARNESS_MIRROR: "loud" },
      cwd: tempDir,
      onWarning: (message) => warnings.push(message),
    })
    expect(config.mirror).toBe("raw")
    expect(warnings).toEqual(['WARNING BOGO_HARNESS_MIRROR: Ignoring unknown mirror mode "loud".'])
  })
})

describe("resolveHarnessConfig", () => {
  it("keeps explicit emulator arguments over the kernel image", () => {
    const config = resolveHarnessConfig(
      { emulator: { command: "qemu-system-riscv64", args: ["-nographic"], kernelImage: "ignored" } },
      tempDir,
    )
    expect(config.emulator.args).toEqual(["-nographic"])
  })

  it("points explicit arguments at a kernel image from the flag or environment", async () => {
    writeConfig(["emulator:", "  args: [-nographic, -kernel, a.elf]"].join("\n"))

    const fromFlag = await loadHarnessConfig({ env: {}, cwd: tempDir, kernelImage: "b.elf" })
    expect(fromFlag.emulator.args).toEqual(["-nographic", "-kernel", "b.elf"])

    const fromEnv = await loadHarnessConfig({ env: { BOGO_KERNEL_IMAGE: "c.elf" }, cwd: tempDir })
    expect(fromEnv.emulator.args).toEqual(["-nographic", "-kernel", "c.elf"])

    const untouched = await loadHarnessConfig({ env: {}, cwd: tempDir })
    expect(untouched.emulator.args).toEqual(["-nographic", "-kernel", "a.elf"])
  })

  it("adds -kernel to explicit arguments that lack it", async () => {
    writeConfig(["emulator:", "  args: [-machine, virt]"].join("\n"))
    const config = await loadHarnessConfig({ env: {}, cwd: tempDir, kernelImage: "b.elf" })
    expect(config.emulator.args).toEqual(["-machine", "virt", "-kernel", "b.elf"])
  })
})

describe("validateHarnessConfigInput", () => {
  it("treats an empty document as an empty config", () => {
    expect(validateHarnessConfigInput(null)).toEqual({ config: {}, issues: [] })
  })

  it("rejects a non-mapping document", () => {
    const { issues } = validateHarnessConfigInput(["hello"])
    expect(issues).toEqual([{ severity: "error", path: "<root>", message: "Config must be a mapping." }])
  })

  it("requires at least one expectation and non-empty strings", () => {
    const { issues } = validateHarnessConfigInput({ prompt: "", expectations: [], commands: ["hello", 3] })
    expect(issues).toEqual([
      { severity: "error", path: "prompt", message: "Must not be empty." },
      { severity: "error", path: "commands.1", message: "Expected string." },
      { severity: "error", path: "expectations", message: "At least one expectation is required." },
    ])
  })
})
