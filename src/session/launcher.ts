import { spawn } from "node:child_process"
import { PassThrough, type Readable } from "node:stream"
import type { ConsoleProcess, EmulatorCommand, ProcessExit } from "../types.js"

export const DEFAULT_QEMU_BINARY = "qemu-system-riscv64"
export const DEFAULT_KERNEL_IMAGE = "target/riscv64gc-unknown-none-elf/debug/kernel"

export const buildEmulatorArgs = (kernelImage: string): string[] => [
  "-machine",
  "virt",
  "-m",
  "128M",
  "-nographic",
  "-bios",
  "default",
  "-kernel",
  kernelImage,
]

/**
 * Merges several readables into one stream in arrival order. The first source
 * error ends the merged stream; anything arriving after that is dropped.
 */
export const mergeOutput = (sources: readonly Readable[]): PassThrough => {
  const output = new PassThrough()
  const endOutput = () => {
    if (!output.writableEnded) {
      output.end()
    }
  }
  for (const source of sources) {
    source.on("data", (chunk: Buffer | string) => {
      if (!output.writableEnded) {
        output.write(chunk)
      }
    })
    source.on("error", endOutput)
  }
  return output
}

/**
 * Spawns the emulator with piped stdio. stdout and stderr are merged into a
 * single output stream that ends once the child has closed both.
 */
export const launchEmulator = (emulator: EmulatorCommand): ConsoleProcess => {
  const child = spawn(emulator.command, [...emulator.args], {
    cwd: emulator.cwd ?? process.cwd(),
    env: emulator.env ? { ...process.env, ...emulator.env } : process.env,
  })

  const output = mergeOutput([child.stdout, child.stderr])
  const endOutput = () => {
    if (!output.writableEnded) {
      output.end()
    }
  }

  let inputError: Error | null = null
  child.stdin.on("error", (error) => {
    inputError = error
  })

  // Never outlive the harness: kill the child if node exits first.
  const killOnExit = () => {
    if (child.exitCode === null && child.signalCode === null) {
      child.kill("SIGKILL")
    }
  }
  process.once("exit", killOnExit)

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("exit", (code, signal) => {
      process.removeListener("exit", killOnExit)
      resolve({ code, signal })
    })
    child.once("error", (error) => {
      process.removeListener("exit", killOnExit)
      endOutput()
      resolve({ code: null, signal: null, error })
    })
  })
  child.once("close", endOutput)

  return {
    pid: child.pid,
    output,
    exited,
    write: (text) =>
      new Promise<void>((resolve, reject) => {
        if (inputError) {
          reject(inputError)
          return
        }
        if (!child.stdin.writable) {
          reject(new Error("Console input is closed."))
          return
        }
        child.stdin.write(text, "utf8", (error) => {
          if (error) {
            reject(error)
          } else {
            resolve()
          }
        })
      }),
    kill: (signal = "SIGKILL") => {
      if (child.exitCode !== null || child.signalCode !== null) return false
      try {
        return child.kill(signal)
      } catch {
        return false
      }
    },
  }
}
