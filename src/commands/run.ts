import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { loadHarnessConfig } from "../config/harnessConfig.js"
import { consoleLogger } from "../logging.js"
import { runHarness } from "../harness.js"
import type { MirrorMode } from "../types.js"

const configOption = Options.text("config").pipe(
  Options.withDescription("Harness config file (YAML). Defaults to ./harness.yaml when present."),
  Options.optional,
)
const artifactOption = Options.text("artifact").pipe(
  Options.withDescription("Where to write the session transcript."),
  Options.optional,
)
const kernelOption = Options.text("kernel").pipe(Options.withDescription("Kernel image passed to -kernel."), Options.optional)
const mirrorOption = Options.choice("mirror", ["raw", "plain", "off"] as const).pipe(
  Options.withDescription("How console output is echoed while the session runs."),
  Options.optional,
)

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

export const runCommand = Command.make(
  "run",
  {
    config: configOption,
    artifact: artifactOption,
    kernel: kernelOption,
    mirror: mirrorOption,
  },
  ({ config, artifact, kernel, mirror }) =>
    Effect.gen(function* () {
      // Anything short of a verdict is a failed run.
      process.exitCode = 1
      const mirrorMode: MirrorMode | undefined = Option.getOrUndefined(mirror)
      const harnessConfig = yield* Effect.tryPromise({
        try: () =>
          loadHarnessConfig({
            configPath: Option.getOrUndefined(config),
            artifactPath: Option.getOrUndefined(artifact),
            kernelImage: Option.getOrUndefined(kernel),
            mirror: mirrorMode,
            onWarning: (message) => consoleLogger.warn(message),
          }),
        catch: toError,
      })
      // The harness handles SIGINT itself and must still persist and verify.
      yield* Effect.promise(() => runHarness(harnessConfig)).pipe(
        Effect.tap((report) =>
          Effect.sync(() => {
            process.exitCode = report.exitCode
          }),
        ),
        Effect.uninterruptible,
      )
    }).pipe(
      Effect.catchAll((error) =>
        Console.error(error.message).pipe(
          Effect.zipRight(
            Effect.sync(() => {
              process.exitCode = 1
            }),
          ),
        ),
      ),
    ),
)
