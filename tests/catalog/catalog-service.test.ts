import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"

import { afterEach, describe, expect, it, vi } from "vitest"

import { createCatalogService } from "../../src/catalog/catalog-service.js"

const TEMP_PREFIX = path.join(tmpdir(), "gateway-catalog-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

const createTempRoot = async (): Promise<string> => {
  const tempRoot = await mkdtemp(TEMP_PREFIX)
  cleanupPaths.push(tempRoot)
  return tempRoot
}

const listing = (...names: string[]): string => {
  return names
    .map((name) => `<li><a href="/library/${name}"><p>${name} model</p><span>7b</span></a></li>`)
    .join("\n")
}

const createLogger = () => ({ info: vi.fn(), warn: vi.fn() })

describe("createCatalogService", () => {
  it("persists fetched entries and serves them from cache within the TTL", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    let now = 10_000
    const fetchCatalogHtml = vi.fn(async () => listing("llama3", "mistral"))
    const service = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml,
      now: () => now,
      ttlMs: 300_000,
    })

    // Act
    const first = await service.getEntries()
    now += 299_999
    const second = await service.getEntries()
    const cache = await readFile(path.join(tempRoot, "model-catalog-cache.json"), "utf8")

    // Assert
    expect(first.map((entry) => entry.name)).toEqual(["llama3", "mistral"])
    expect(second).toEqual(first)
    expect(fetchCatalogHtml).toHaveBeenCalledTimes(1)
    expect(JSON.parse(cache)).toEqual({
      updatedAt: 10_000,
      entries: [
        {
          name: "llama3",
          description: "llama3 model",
          capabilities: [],
          sizes: ["7b"],
          pulls: "",
          tagCount: null,
          updatedAt: "",
        },
        {
          name: "mistral",
          description: "mistral model",
          capabilities: [],
          sizes: ["7b"],
          pulls: "",
          tagCount: null,
          updatedAt: "",
        },
      ],
    })
  })

  it("refetches after the TTL and on forced refresh", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    let now = 0
    const fetchCatalogHtml = vi
      .fn(async () => listing("phi3"))
      .mockResolvedValueOnce(listing("llama3"))
      .mockResolvedValueOnce(listing("gemma3"))
    const service = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml,
      now: () => now,
      ttlMs: 1_000,
    })

    // Act
    await service.getEntries()
    now = 1_000
    const expired = await service.getEntries()
    const forced = await service.getEntries({ forceRefresh: true })

    // Assert
    expect(expired.map((entry) => entry.name)).toEqual(["gemma3"])
    expect(forced.map((entry) => entry.name)).toEqual(["phi3"])
    expect(fetchCatalogHtml).toHaveBeenCalledTimes(3)
  })

  it("keeps the previous entries when a refresh fails", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    const logger = createLogger()
    const fetchCatalogHtml = vi
      .fn(async (): Promise<string> => {
        throw new Error("catalog unreachable")
      })
      .mockResolvedValueOnce(listing("llama3"))
    const service = createCatalogService({
      logger,
      dataDirectory: tempRoot,
      fetchCatalogHtml,
      now: () => 5,
    })
    await service.getEntries()

    // Act
    const entries = await service.getEntries({ forceRefresh: true })

    // Assert
    expect(entries.map((entry) => entry.name)).toEqual(["llama3"])
    expect(logger.warn).toHaveBeenCalledWith(
      { error: "catalog unreachable", updatedAt: 5, cachedEntryCount: 1 },
      "Model catalog refresh failed; keeping previous cache snapshot"
    )
  })

  it("keeps the previous entries when the listing suddenly parses to nothing", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    const fetchCatalogHtml = vi
      .fn(async () => "<html>redesigned page</html>")
      .mockResolvedValueOnce(listing("llama3"))
    const service = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml,
    })
    await service.getEntries()

    // Act
    const entries = await service.getEntries({ forceRefresh: true })

    // Assert
    expect(entries.map((entry) => entry.name)).toEqual(["llama3"])
  })

  it("returns an empty list when the first refresh fails without a cache", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    const service = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml: async () => {
        throw new Error("catalog unreachable")
      },
    })

    // Act
    const entries = await service.getEntries()

    // Assert
    expect(entries).toEqual([])
  })

  it("reloads the persisted cache in a new instance", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    const writer = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml: async () => listing("llama3"),
      now: () => 1_000,
    })
    await writer.getEntries()
    const fetchCatalogHtml = vi.fn(async () => listing("other"))
    const reader = createCatalogService({
      logger: createLogger(),
      dataDirectory: tempRoot,
      fetchCatalogHtml,
      now: () => 2_000,
    })

    // Act
    const entries = await reader.getEntries()

    // Assert
    expect(entries.map((entry) => entry.name)).toEqual(["llama3"])
    expect(reader.getSnapshot().source).toBe("cache")
    expect(fetchCatalogHtml).not.toHaveBeenCalled()
  })

  it("ignores an invalid cache file", async () => {
    // Arrange
    const tempRoot = await createTempRoot()
    await mkdir(tempRoot, { recursive: true })
    await writeFile(
      path.join(tempRoot, "model-catalog-cache.json"),
      JSON.stringify({ updatedAt: 1, entries: [{ name: "" }] }),
      "utf8"
    )
    const logger = createLogger()
    const service = createCatalogService({
      logger,
      dataDirectory: tempRoot,
      fetchCatalogHtml: async () => listing("mistral"),
    })

    // Act
    const entries = await service.getEntries()

    // Assert
    expect(entries.map((entry) => entry.name)).toEqual(["mistral"])
    expect(logger.warn).toHaveBeenCalledWith(
      { cachePath: path.join(tempRoot, "model-catalog-cache.json") },
      "Model catalog cache is invalid; ignoring cached data"
    )
  })
})
