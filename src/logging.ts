import chalk from "chalk"

export interface HarnessLogger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const TAG = "[harness]"

// Leading newline keeps log lines off the end of a mirrored console line.
export const consoleLogger: HarnessLogger = {
  info: (message) => console.log(`\n${chalk.cyan(TAG)} ${message}`),
  warn: (message) => console.warn(`\n${chalk.yellow(TAG)} ${message}`),
  error: (message) => console.error(`\n${chalk.red(TAG)} ${message}`),
}

export const silentLogger: HarnessLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
