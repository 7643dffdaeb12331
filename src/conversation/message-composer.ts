import type {
  ChatRequestPayload,
  ConversationRole,
  GenerateRequestPayload,
  WireChatMessage,
} from "../backend/contracts.js"
import { isConversationRole, type ConversationTurn, type GenerationRequest } from "./types.js"

const ROLE_LABELS: Record<ConversationRole, string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
  tool: "Tool",
}

type KnownTurn = {
  role: ConversationRole
  content: string
}

const knownTurns = (history: readonly ConversationTurn[]): KnownTurn[] => {
  const turns: KnownTurn[] = []
  for (const turn of history) {
    if (isConversationRole(turn.role)) {
      turns.push({ role: turn.role, content: turn.content })
    }
  }

  return turns
}

const currentImages = (images: readonly string[] | undefined): string[] => {
  return (images ?? []).filter((image) => image.length > 0)
}

/**
 * Renders a request for the conversational endpoint. Historical turns never carry images;
 * only the live user turn does, because that is the only placement backends inspect.
 *
 * @param request Model, live prompt, history and optional current images.
 * @returns `/api/chat` request body.
 */
export const buildChatPayload = (request: GenerationRequest): ChatRequestPayload => {
  const messages: WireChatMessage[] = knownTurns(request.history).map((turn) => ({
    role: turn.role,
    content: turn.content,
  }))

  const images = currentImages(request.images)
  messages.push({
    role: "user",
    content: request.prompt,
    ...(images.length > 0 ? { images } : {}),
  })

  return {
    model: request.model,
    messages,
    stream: false,
    ...(request.keepAlive ? { keep_alive: request.keepAlive } : {}),
    ...(request.format ? { format: request.format } : {}),
    ...(request.options ? { options: request.options } : {}),
  }
}

/**
 * Flattens history into a `Role: content` transcript ending with the live prompt and an
 * `Assistant:` cue. With no remaining history the prompt is sent bare.
 */
const composeTranscriptPrompt = (
  prompt: string,
  history: readonly KnownTurn[]
): string => {
  if (history.length === 0) {
    return prompt
  }

  const lines = history.map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.content}`)
  lines.push(`User: ${prompt}`)
  lines.push("Assistant:")
  return lines.join("\n")
}

/**
 * Renders a request for the single-prompt endpoint. The last system turn becomes the
 * top-level `system` field; images ride alongside the prompt.
 *
 * @param request Model, live prompt, history and optional current images.
 * @returns `/api/generate` request body.
 */
export const buildGeneratePayload = (request: GenerationRequest): GenerateRequestPayload => {
  const turns = knownTurns(request.history)

  let systemIndex = -1
  for (let index = turns.length - 1; index >= 0; index -= 1) {
    if (turns[index]?.role === "system") {
      systemIndex = index
      break
    }
  }

  const system = systemIndex >= 0 ? turns[systemIndex]?.content : undefined
  const remaining = turns.filter((_, index) => index !== systemIndex)
  const images = currentImages(request.images)

  return {
    model: request.model,
    prompt: composeTranscriptPrompt(request.prompt, remaining),
    stream: false,
    ...(system !== undefined ? { system } : {}),
    ...(images.length > 0 ? { images } : {}),
    ...(request.keepAlive ? { keep_alive: request.keepAlive } : {}),
  }
}
