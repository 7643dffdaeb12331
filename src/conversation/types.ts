import { conversationRoleSchema, type ConversationRole } from "../backend/contracts.js"

/**
 * One chronological entry of a conversation. Turns arrive from an external history store,
 * so `role` is kept open and filtered when a payload is composed.
 */
export type ConversationTurn = Readonly<{
  role: string
  content: string
  images?: readonly string[]
}>

/** A generation request before it is rendered into either wire form. */
export type GenerationRequest = Readonly<{
  model: string
  prompt: string
  history: readonly ConversationTurn[]
  images?: readonly string[]
  keepAlive?: string
  format?: string
  options?: Record<string, unknown>
}>

export const isConversationRole = (role: string): role is ConversationRole => {
  return conversationRoleSchema.safeParse(role).success
}
