import { promises as fs } from "node:fs"
import path from "node:path"

export const DEFAULT_ARTIFACT_PATH = "test_output.txt"

/**
 * Writes the final transcript verbatim, replacing the previous run's artifact.
 * Returns the absolute path written.
 */
export const persistTranscript = async (artifactPath: string, transcript: string): Promise<string> => {
  const target = path.resolve(artifactPath)
  await fs.mkdir(path.dirname(target), { recursive: true })
  await fs.writeFile(target, transcript, "utf8")
  return target
}
