import { z } from "zod"

export const conversationRoleSchema = z.enum(["system", "user", "assistant", "tool"])

export const tagsResponseSchema = z.object({
  models: z
    .array(
      z
        .object({
          name: z.string().optional(),
          model: z.string().optional(),
        })
        .passthrough()
    )
    .default([]),
})

export const generateResponseSchema = z
  .object({
    response: z.string().nullish(),
  })
  .passthrough()

export const chatResponseSchema = z
  .object({
    message: z
      .object({
        content: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough()

export const showResponseSchema = z
  .object({
    capabilities: z.array(z.string()).nullish(),
    model_info: z.record(z.string(), z.unknown()).nullish(),
    projector_info: z.record(z.string(), z.unknown()).nullish(),
    modelfile: z.string().nullish(),
    details: z
      .object({
        family: z.string().nullish(),
        parameter_size: z.string().nullish(),
        quantization_level: z.string().nullish(),
        architecture: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    size: z.number().nullish(),
  })
  .passthrough()

/** One NDJSON line of a streamed pull, or the single body of a non-streamed one. */
export const pullStatusSchema = z
  .object({
    status: z.string().nullish(),
    digest: z.string().nullish(),
    total: z.number().nullish(),
    completed: z.number().nullish(),
    error: z.string().nullish(),
  })
  .passthrough()

export const statusResponseSchema = z.object({}).passthrough()

export type ConversationRole = z.infer<typeof conversationRoleSchema>
export type TagsResponse = z.infer<typeof tagsResponseSchema>
export type GenerateResponse = z.infer<typeof generateResponseSchema>
export type ChatResponse = z.infer<typeof chatResponseSchema>
export type ShowResponse = z.infer<typeof showResponseSchema>
export type PullStatus = z.infer<typeof pullStatusSchema>

export type WireChatMessage = {
  role: ConversationRole
  content: string
  images?: string[]
}

export type ChatRequestPayload = {
  model: string
  messages: WireChatMessage[]
  stream: false
  keep_alive?: string
  format?: string
  options?: Record<string, unknown>
}

export type GenerateRequestPayload = {
  model: string
  prompt: string
  stream: false
  system?: string
  images?: string[]
  keep_alive?: string
}
