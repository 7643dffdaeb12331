import { BackendError } from "../backend/errors.js"
import { getDefaultHeuristics } from "../model-management/heuristics.js"

/** Why a request hopped from the conversational form to the single-prompt form. */
export type FallbackTrigger = "missing_image_reply" | "chat_status"

export const DEFAULT_FALLBACK_STATUSES: readonly number[] = [400, 404, 422]

export type FallbackDetectorOptions = {
  missingImagePatterns?: readonly RegExp[]
  fallbackStatuses?: readonly number[]
}

export type FallbackDetector = {
  detectFromReply: (text: string, hasImages: boolean) => FallbackTrigger | null
  detectFromError: (error: unknown) => FallbackTrigger | null
}

/**
 * Flags replies where the model asks for an image or says it cannot see one. Pattern
 * based, so replies discussing missing images in general can misfire.
 */
export const looksLikeMissingImageResponse = (
  text: string,
  patterns: readonly RegExp[] = getDefaultHeuristics().missingImagePatterns
): boolean => {
  const normalized = text.replace(/\s+/g, " ").trim()
  if (normalized.length === 0) {
    return false
  }

  return patterns.some((pattern) => pattern.test(normalized))
}

/**
 * Enumerates the conditions that send a conversational call to the single-prompt endpoint:
 * a "no image" reply to a request carrying images, or one of a few client-error statuses.
 *
 * @param options Pattern and status overrides.
 * @returns Trigger checks used by the generation service.
 */
export const createFallbackDetector = (options: FallbackDetectorOptions = {}): FallbackDetector => {
  const patterns = options.missingImagePatterns ?? getDefaultHeuristics().missingImagePatterns
  const statuses = new Set(options.fallbackStatuses ?? DEFAULT_FALLBACK_STATUSES)

  return {
    detectFromReply: (text, hasImages) => {
      if (!hasImages) {
        return null
      }

      return looksLikeMissingImageResponse(text, patterns) ? "missing_image_reply" : null
    },
    detectFromError: (error) => {
      if (error instanceof BackendError && error.status !== null && statuses.has(error.status)) {
        return "chat_status"
      }

      return null
    },
  }
}
