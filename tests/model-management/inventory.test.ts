import { describe, expect, it, vi } from "vitest"

import { createModelInventory } from "../../src/model-management/inventory.js"

const createLogger = () => ({ debug: vi.fn(), warn: vi.fn() })

describe("createModelInventory", () => {
  it("serves the cached list within the TTL and refetches after it", async () => {
    // Arrange
    let now = 1_000
    const listModels = vi
      .fn(async () => ["second"])
      .mockResolvedValueOnce(["first"])
    const inventory = createModelInventory({
      logger: createLogger(),
      listModels,
      ttlMs: 60_000,
      now: () => now,
    })

    // Act
    const initial = await inventory.getModels()
    now += 59_999
    const cached = await inventory.getModels()
    now += 1
    const refreshed = await inventory.getModels()

    // Assert
    expect(initial).toEqual(["first"])
    expect(cached).toEqual(["first"])
    expect(refreshed).toEqual(["second"])
    expect(listModels).toHaveBeenCalledTimes(2)
  })

  it("refetches while the cached list is empty", async () => {
    // Arrange
    const listModels = vi.fn(async (): Promise<string[]> => [])
    const inventory = createModelInventory({ logger: createLogger(), listModels, now: () => 0 })

    // Act
    await inventory.getModels()
    await inventory.getModels()

    // Assert
    expect(listModels).toHaveBeenCalledTimes(2)
  })

  it("keeps the previous snapshot when a refresh fails", async () => {
    // Arrange
    let now = 0
    const logger = createLogger()
    const listModels = vi
      .fn(async (): Promise<string[]> => {
        throw new Error("connection refused")
      })
      .mockResolvedValueOnce(["llama3"])
    const inventory = createModelInventory({ logger, listModels, ttlMs: 10, now: () => now })
    await inventory.getModels()

    // Act
    now = 100
    const models = await inventory.getModels()

    // Assert
    expect(models).toEqual(["llama3"])
    expect(inventory.getSnapshot()).toEqual({ models: ["llama3"], fetchedAt: 0 })
    expect(logger.warn).toHaveBeenCalledWith(
      { error: "connection refused", cachedModelCount: 1, fetchedAt: 0 },
      "Model inventory refresh failed; keeping previous snapshot"
    )
  })

  it("returns an empty list when the first refresh fails", async () => {
    // Arrange
    const inventory = createModelInventory({
      logger: createLogger(),
      listModels: async () => {
        throw new Error("connection refused")
      },
    })

    // Act
    const models = await inventory.getModels()

    // Assert
    expect(models).toEqual([])
    expect(inventory.getSnapshot()).toBeNull()
  })

  it("shares one in-flight refresh between concurrent callers", async () => {
    // Arrange
    let release: (models: string[]) => void = () => undefined
    const listModels = vi.fn(
      () =>
        new Promise<string[]>((resolve) => {
          release = resolve
        })
    )
    const inventory = createModelInventory({ logger: createLogger(), listModels })

    // Act
    const first = inventory.getModels()
    const second = inventory.getModels()
    release(["phi3"])

    // Assert
    await expect(first).resolves.toEqual(["phi3"])
    await expect(second).resolves.toEqual(["phi3"])
    expect(listModels).toHaveBeenCalledTimes(1)
  })
})
