import { describe, it, expect } from "vitest"
import type { DriverOutcome } from "../src/session/driver.js"
import { awaitExit, forceTerminate, installInterruptHandlers, settleSession } from "../src/session/lifecycle.js"
import { ConsoleSession } from "../src/session/session.js"
import type { LifecycleTimeouts } from "../src/types.js"
import { FakeConsole } from "./helpers/fakeConsole.js"

const timeouts: LifecycleTimeouts = { exitTimeoutMs: 60, killGraceMs: 60, drainTimeoutMs: 60 }

const completed: DriverOutcome = { status: "completed", sent: ["hello", "shutdown"], incidents: [] }
const aborted: DriverOutcome = { status: "aborted", sent: [], incidents: [] }

const start = (fake: FakeConsole) => {
  const session = new ConsoleSession(fake)
  session.start()
  return session
}

describe("awaitExit", () => {
  it("resolves when the child exits", async () => {
    const fake = new FakeConsole()
    const session = start(fake)
    setTimeout(() => fake.exit(0), 10)
    await expect(awaitExit(session, 1_000)).resolves.toBe("exited")
  })

  it("times out while the child keeps running", async () => {
    const session = start(new FakeConsole())
    await expect(awaitExit(session, 30)).resolves.toBe("timeout")
  })

  it("returns early when interrupted", async () => {
    const session = start(new FakeConsole())
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 10)
    await expect(awaitExit(session, 5_000, { signal: controller.signal })).resolves.toBe("interrupted")
  })
})

describe("forceTerminate", () => {
  it("sends SIGKILL and observes the exit", async () => {
    const fake = new FakeConsole()
    const session = start(fake)
    await expect(forceTerminate(session, 100)).resolves.toBe(true)
    expect(fake.kills).toEqual(["SIGKILL"])
  })

  it("logs a child that survives the grace period", async () => {
    const fake = new FakeConsole({ exitOnKill: false })
    const errors: string[] = []
    const logger = { info: () => undefined, warn: () => undefined, error: (message: string) => errors.push(message) }
    await expect(forceTerminate(start(fake), 20, logger)).resolves.toBe(false)
    expect(errors).toEqual(["Emulator (pid 4242) did not exit 20ms after SIGKILL."])
  })
})

describe("settleSession", () => {
  it("completes a session that exits on its own and keeps trailing output", async () => {
    const fake = new FakeConsole()
    const session = start(fake)
    fake.emit("Shutting down...\n")
    setTimeout(() => fake.exit(0), 10)

    const settled = await settleSession(session, completed, timeouts)
    expect(settled.state).toBe("completed")
    expect(settled.transcript).toBe("Shutting down...\n")
    expect(settled.incidents).toEqual([])
    expect(fake.kills).toEqual([])
  })

  it("kills a session that ignores shutdown", async () => {
    const fake = new FakeConsole()
    const session = start(fake)
    fake.emit("Shutting down...\n")

    const settled = await settleSession(session, completed, timeouts)
    expect(settled.state).toBe("killed")
    expect(settled.transcript).toBe("Shutting down...\n")
    expect(settled.incidents.map((incident) => incident.kind)).toEqual(["ShutdownTimeout"])
    expect(fake.kills).toEqual(["SIGKILL"])
  })

  it("kills at once after an aborted script", async () => {
    const fake = new FakeConsole()
    const warnings: string[] = []
    const logger = { info: () => undefined, warn: (message: string) => warnings.push(message), error: () => undefined }

    const settled = await settleSession(start(fake), aborted, timeouts, { logger })
    expect(settled.state).toBe("killed")
    expect(settled.incidents).toEqual([])
    expect(warnings).toEqual(["Script did not complete, killing emulator..."])
    expect(fake.kills).toEqual(["SIGKILL"])
  })

  it("kills when interrupted during the exit wait", async () => {
    const fake = new FakeConsole()
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 10)

    const settled = await settleSession(start(fake), completed, { ...timeouts, exitTimeoutMs: 5_000 }, {
      signal: controller.signal,
    })
    expect(settled.state).toBe("killed")
    expect(settled.incidents.map((incident) => incident.kind)).toEqual(["Interrupted"])
  })
})

describe("installInterruptHandlers", () => {
  it("aborts the controller on a signal until disposed", () => {
    const controller = new AbortController()
    const before = process.listenerCount("SIGUSR2")
    const dispose = installInterruptHandlers(controller, ["SIGUSR2"])
    expect(process.listenerCount("SIGUSR2")).toBe(before + 1)

    process.emit("SIGUSR2", "SIGUSR2")
    expect(controller.signal.aborted).toBe(true)

    dispose()
    expect(process.listenerCount("SIGUSR2")).toBe(before)
  })
})
