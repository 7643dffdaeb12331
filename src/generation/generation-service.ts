import type { ChatRequestPayload, GenerateRequestPayload } from "../backend/contracts.js"
import { buildChatPayload, buildGeneratePayload } from "../conversation/message-composer.js"
import type { GenerationRequest } from "../conversation/types.js"
import type { GatewayLogger } from "../logging/logger.js"
import type { FallbackDetector, FallbackTrigger } from "./fallback-detector.js"

export type GenerationEndpoint = "chat" | "generate"

export type GenerationResult = {
  text: string
  model: string
  endpoint: GenerationEndpoint
  fallbackTrigger: FallbackTrigger | null
}

type GenerationServiceDependencies = {
  logger: Pick<GatewayLogger, "info" | "warn">
  client: {
    chat: (payload: ChatRequestPayload) => Promise<string>
    generate: (payload: GenerateRequestPayload) => Promise<string>
  }
  detector: FallbackDetector
  useChatApi: boolean
}

export type GenerationService = {
  generate: (request: GenerationRequest) => Promise<GenerationResult>
}

type PrimaryOutcome =
  | { state: "done"; text: string }
  | { state: "fallback"; trigger: FallbackTrigger; reason: string }

/**
 * Runs a generation request as a two-state protocol: one conversational attempt, then at
 * most one single-prompt attempt when a fallback trigger fires. Errors of the fallback
 * attempt propagate unchanged.
 *
 * @param dependencies Backend calls, trigger detector and chat-endpoint toggle.
 * @returns Generation entry point for callers.
 */
export const createGenerationService = (
  dependencies: GenerationServiceDependencies
): GenerationService => {
  const attemptChat = async (request: GenerationRequest): Promise<PrimaryOutcome> => {
    const hasImages = (request.images ?? []).some((image) => image.length > 0)

    let text: string
    try {
      text = await dependencies.client.chat(buildChatPayload(request))
    } catch (error) {
      const trigger = dependencies.detector.detectFromError(error)
      if (!trigger) {
        throw error
      }

      return {
        state: "fallback",
        trigger,
        reason: error instanceof Error ? error.message : String(error),
      }
    }

    const trigger = dependencies.detector.detectFromReply(text, hasImages)
    if (trigger) {
      return { state: "fallback", trigger, reason: text.slice(0, 120) }
    }

    return { state: "done", text }
  }

  return {
    generate: async (request) => {
      if (!dependencies.useChatApi) {
        const text = await dependencies.client.generate(buildGeneratePayload(request))
        return { text, model: request.model, endpoint: "generate", fallbackTrigger: null }
      }

      const primary = await attemptChat(request)
      if (primary.state === "done") {
        return { text: primary.text, model: request.model, endpoint: "chat", fallbackTrigger: null }
      }

      dependencies.logger.warn(
        {
          model: request.model,
          trigger: primary.trigger,
          reason: primary.reason,
          images: request.images?.length ?? 0,
        },
        "Conversational attempt needs fallback; retrying on single-prompt endpoint"
      )

      const text = await dependencies.client.generate(buildGeneratePayload(request))
      dependencies.logger.info(
        { model: request.model, trigger: primary.trigger, responseChars: text.length },
        "Single-prompt fallback completed"
      )

      return {
        text,
        model: request.model,
        endpoint: "generate",
        fallbackTrigger: primary.trigger,
      }
    },
  }
}
