#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Cause, Effect, Exit } from "effect"
import { runCommand } from "./commands/run.js"

const root = Command.make("bogo-harness", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([runCommand]),
)

const cli = Command.run(root, { name: "BogoKernel console harness", version: "0.1.0" })

// A bare invocation runs the default session.
const argv = process.argv.length <= 2 ? [...process.argv.slice(0, 2), "run"] : process.argv

NodeRuntime.runMain(cli(argv).pipe(Effect.provide(NodeContext.layer)), {
  // Keep the verdict's exit status, including after SIGINT.
  teardown: (exit, onExit) => {
    if (Exit.isFailure(exit) && !Cause.isInterruptedOnly(exit.cause)) {
      onExit(1)
      return
    }
    onExit(Number(process.exitCode ?? 0))
  },
})
