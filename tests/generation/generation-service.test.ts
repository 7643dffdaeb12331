import { describe, expect, it, vi } from "vitest"

import type { ChatRequestPayload, GenerateRequestPayload } from "../../src/backend/contracts.js"
import { BackendError, GatewayConnectionError } from "../../src/backend/errors.js"
import { createFallbackDetector } from "../../src/generation/fallback-detector.js"
import { createGenerationService } from "../../src/generation/generation-service.js"

type ClientFakes = {
  chat?: (payload: ChatRequestPayload) => Promise<string>
  generate?: (payload: GenerateRequestPayload) => Promise<string>
}

const createService = (fakes: ClientFakes, useChatApi = true) => {
  const logger = { info: vi.fn(), warn: vi.fn() }
  const chat = vi.fn(async (payload: ChatRequestPayload) =>
    fakes.chat ? await fakes.chat(payload) : "chat reply"
  )
  const generate = vi.fn(async (payload: GenerateRequestPayload) =>
    fakes.generate ? await fakes.generate(payload) : "generate reply"
  )
  const service = createGenerationService({
    logger,
    client: { chat, generate },
    detector: createFallbackDetector(),
    useChatApi,
  })

  return { service, logger, chat, generate }
}

const visionRequest = {
  model: "llava:13b",
  prompt: "What is in this photo?",
  history: [{ role: "user", content: "Hi" }],
  images: ["aGVsbG8="],
}

describe("createGenerationService", () => {
  it("returns the conversational reply when nothing triggers a fallback", async () => {
    // Arrange
    const { service, generate } = createService({ chat: async () => "A red bicycle." })

    // Act
    const result = await service.generate(visionRequest)

    // Assert
    expect(result).toEqual({
      text: "A red bicycle.",
      model: "llava:13b",
      endpoint: "chat",
      fallbackTrigger: null,
    })
    expect(generate).not.toHaveBeenCalled()
  })

  it("retries once on the single-prompt endpoint when the reply asks for the image", async () => {
    // Arrange
    const { service, chat, generate, logger } = createService({
      chat: async () => "I'm sorry, I can't see any image. Please upload it.",
      generate: async () => "A red bicycle leaning on a wall.",
    })

    // Act
    const result = await service.generate(visionRequest)

    // Assert
    expect(result).toEqual({
      text: "A red bicycle leaning on a wall.",
      model: "llava:13b",
      endpoint: "generate",
      fallbackTrigger: "missing_image_reply",
    })
    expect(chat).toHaveBeenCalledTimes(1)
    expect(generate).toHaveBeenCalledTimes(1)
    expect(generate).toHaveBeenCalledWith({
      model: "llava:13b",
      prompt: "User: Hi\nUser: What is in this photo?\nAssistant:",
      stream: false,
      images: ["aGVsbG8="],
    })
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ model: "llava:13b", trigger: "missing_image_reply", images: 1 }),
      "Conversational attempt needs fallback; retrying on single-prompt endpoint"
    )
  })

  it("does not fall back on a missing-image phrase without images", async () => {
    // Arrange
    const { service, generate } = createService({
      chat: async () => "Please upload the screenshot if you have one.",
    })

    // Act
    const result = await service.generate({ model: "llama3", prompt: "Help", history: [] })

    // Assert
    expect(result.endpoint).toBe("chat")
    expect(generate).not.toHaveBeenCalled()
  })

  it("falls back when the conversational endpoint rejects the request", async () => {
    // Arrange
    const { service, generate } = createService({
      chat: async () => {
        throw new BackendError(404, "404 page not found")
      },
      generate: async () => "Paris.",
    })

    // Act
    const result = await service.generate({
      model: "llama3",
      prompt: "Capital of France?",
      history: [],
    })

    // Assert
    expect(result).toEqual({
      text: "Paris.",
      model: "llama3",
      endpoint: "generate",
      fallbackTrigger: "chat_status",
    })
    expect(generate).toHaveBeenCalledWith({
      model: "llama3",
      prompt: "Capital of France?",
      stream: false,
    })
  })

  it("propagates errors that are not fallback triggers", async () => {
    // Arrange
    const failure = new GatewayConnectionError("Could not reach backend")
    const { service, generate } = createService({
      chat: async () => {
        throw failure
      },
    })

    // Act / Assert
    await expect(
      service.generate({ model: "llama3", prompt: "Hello", history: [] })
    ).rejects.toBe(failure)
    expect(generate).not.toHaveBeenCalled()
  })

  it("propagates fallback errors without a third attempt", async () => {
    // Arrange
    const fallbackFailure = new BackendError(500, "model crashed")
    const { service, chat, generate } = createService({
      chat: async () => {
        throw new BackendError(400, "images not supported")
      },
      generate: async () => {
        throw fallbackFailure
      },
    })

    // Act / Assert
    await expect(service.generate(visionRequest)).rejects.toBe(fallbackFailure)
    expect(chat).toHaveBeenCalledTimes(1)
    expect(generate).toHaveBeenCalledTimes(1)
  })

  it("goes straight to the single-prompt endpoint when the chat API is disabled", async () => {
    // Arrange
    const { service, chat } = createService({ generate: async () => "Direct." }, false)

    // Act
    const result = await service.generate({ model: "llama3", prompt: "Hello", history: [] })

    // Assert
    expect(result).toEqual({
      text: "Direct.",
      model: "llama3",
      endpoint: "generate",
      fallbackTrigger: null,
    })
    expect(chat).not.toHaveBeenCalled()
  })
})
