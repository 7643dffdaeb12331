import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"

import { z } from "zod"

const heuristicsFileSchema = z.object({
  codeKeywords: z.array(z.string().min(1)),
  codeModelPatterns: z.array(z.string().min(1)),
  missingImagePatterns: z.array(z.string().min(1)),
})

/**
 * Approximate matching data used for task detection, code-model recognition and the
 * "model could not see the image" check. Expect false positives and negatives.
 */
export type Heuristics = {
  codeKeywords: readonly string[]
  codeModelPatterns: readonly string[]
  missingImagePatterns: readonly RegExp[]
}

/**
 * Resolves the bundled heuristics file relative to this module, which holds for both the
 * TypeScript sources and the compiled output.
 */
export const resolveDefaultHeuristicsPath = (): string => {
  return fileURLToPath(new URL("../../data/heuristics.json", import.meta.url))
}

/**
 * Loads and validates a heuristics file. Keywords and name patterns are lower-cased,
 * phrase patterns are compiled case-insensitively.
 *
 * @param filePath Heuristics JSON path; defaults to the bundled file.
 * @returns Ready-to-use heuristics.
 */
export const loadHeuristics = (filePath = resolveDefaultHeuristicsPath()): Heuristics => {
  const source = readFileSync(filePath, "utf8")
  const validated = heuristicsFileSchema.safeParse(JSON.parse(source))
  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid heuristics file at ${filePath}: ${detail}`)
  }

  return {
    codeKeywords: validated.data.codeKeywords.map((keyword) => keyword.toLowerCase()),
    codeModelPatterns: validated.data.codeModelPatterns.map((pattern) => pattern.toLowerCase()),
    missingImagePatterns: validated.data.missingImagePatterns.map(
      (pattern) => new RegExp(pattern, "iu")
    ),
  }
}

let defaultHeuristics: Heuristics | null = null

/** Bundled heuristics, read once per process. */
export const getDefaultHeuristics = (): Heuristics => {
  if (!defaultHeuristics) {
    defaultHeuristics = loadHeuristics()
  }

  return defaultHeuristics
}
