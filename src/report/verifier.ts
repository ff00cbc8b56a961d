import chalk, { type ChalkInstance } from "chalk"
import type { Expectation, TestResult } from "../types.js"

export const DEFAULT_EXPECTATIONS: readonly Expectation[] = [
  { label: "Shell loaded", expected: "Welcome to BogoShell!" },
  { label: "Hello app ran", expected: "Hello from C World!" },
  { label: "Shutdown initiated", expected: "Shutting down..." },
]

export const verifyTranscript = (transcript: string, expectations: readonly Expectation[]): TestResult => {
  const outcomes = expectations.map((expectation) => ({
    ...expectation,
    passed: transcript.includes(expectation.expected),
  }))
  const passed = outcomes.filter((outcome) => outcome.passed).length
  return { outcomes, passed, total: outcomes.length, ok: passed === outcomes.length }
}

export const formatReport = (result: TestResult, painter: ChalkInstance = chalk): string[] => {
  const lines = result.outcomes.map((outcome) =>
    outcome.passed
      ? `${painter.green("[PASS]")} ${outcome.label}`
      : `${painter.red("[FAIL]")} ${outcome.label} - expected '${outcome.expected}'`,
  )
  const summary = `Passed ${result.passed}/${result.total} tests`
  lines.push("", result.ok ? painter.bold.green(summary) : painter.bold.red(summary))
  return lines
}

export const exitCodeFor = (result: TestResult): number => (result.ok ? 0 : 1)
