import type { ShowResponse } from "../backend/contracts.js"

const MAX_SYSTEM_PROMPT_LENGTH = 200
const SYSTEM_DIRECTIVE = "SYSTEM "

export type ModelInfoSummary = {
  family: string | null
  parameterSize: string | null
  quantization: string | null
  architecture: string | null
  sizeBytes: number | null
  systemPrompt: string | null
}

const nonEmpty = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim() ?? ""
  return trimmed.length > 0 ? trimmed : null
}

const extractSystemPrompt = (modelfile: string | null | undefined): string | null => {
  for (const line of (modelfile ?? "").split(/\r?\n/)) {
    if (line.toUpperCase().startsWith(SYSTEM_DIRECTIVE)) {
      const prompt = nonEmpty(line.slice(SYSTEM_DIRECTIVE.length))
      return prompt ? prompt.slice(0, MAX_SYSTEM_PROMPT_LENGTH) : null
    }
  }

  return null
}

/**
 * Condenses a model introspection payload into the fields shown to operators.
 *
 * @param show `/api/show` response body.
 * @returns Summary with `null` for every field the backend did not report.
 */
export const summarizeModelInfo = (show: ShowResponse): ModelInfoSummary => {
  const family = nonEmpty(show.details?.family)

  return {
    family,
    parameterSize: nonEmpty(show.details?.parameter_size),
    quantization: nonEmpty(show.details?.quantization_level),
    architecture: nonEmpty(show.details?.architecture) ?? family,
    sizeBytes: typeof show.size === "number" && show.size > 0 ? show.size : null,
    systemPrompt: extractSystemPrompt(show.modelfile),
  }
}
