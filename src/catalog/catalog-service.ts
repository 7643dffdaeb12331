import path from "node:path"
import { mkdir, readFile, writeFile } from "node:fs/promises"

import { z } from "zod"

import type { GatewayLogger } from "../logging/logger.js"
import { CATALOG_CAPABILITIES, parseCatalogHtml, type CatalogEntry } from "./catalog-scraper.js"

export const DEFAULT_CATALOG_TTL_MS = 300_000

const catalogEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  capabilities: z.array(z.enum(CATALOG_CAPABILITIES)),
  sizes: z.array(z.string()),
  pulls: z.string(),
  tagCount: z.number().int().nullable(),
  updatedAt: z.string(),
})

const cacheSchema = z.object({
  updatedAt: z.number().int().nullable(),
  entries: z.array(catalogEntrySchema),
})

export type CatalogSnapshot = {
  entries: CatalogEntry[]
  updatedAt: number | null
  source: "cache" | "network"
}

type CatalogServiceDependencies = {
  logger: Pick<GatewayLogger, "info" | "warn">
  dataDirectory: string
  fetchCatalogHtml: () => Promise<string>
  now?: () => number
  ttlMs?: number
}

export type CatalogService = {
  getEntries: (options?: { forceRefresh?: boolean }) => Promise<CatalogEntry[]>
  refreshNow: () => Promise<CatalogSnapshot>
  getSnapshot: () => CatalogSnapshot
}

export const resolveCatalogCachePath = (dataDirectory: string): string => {
  return path.join(dataDirectory, "model-catalog-cache.json")
}

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}

const copySnapshot = (snapshot: CatalogSnapshot): CatalogSnapshot => {
  return {
    entries: snapshot.entries.map((entry) => ({
      ...entry,
      capabilities: [...entry.capabilities],
      sizes: [...entry.sizes],
    })),
    updatedAt: snapshot.updatedAt,
    source: snapshot.source,
  }
}

/**
 * Keeps the public model catalog behind a TTL cache that is also persisted to disk, so a
 * restart or an unreachable listing page still leaves the last good entries available.
 *
 * @param dependencies Listing fetcher, data directory, logger and clock/TTL overrides.
 * @returns Catalog lookups used by the CLI and gateway callers.
 */
export const createCatalogService = (dependencies: CatalogServiceDependencies): CatalogService => {
  const now = dependencies.now ?? Date.now
  const ttlMs = dependencies.ttlMs ?? DEFAULT_CATALOG_TTL_MS
  const cachePath = resolveCatalogCachePath(dependencies.dataDirectory)

  let cacheLoaded = false
  let snapshot: CatalogSnapshot = {
    entries: [],
    updatedAt: null,
    source: "cache",
  }

  const saveCache = async (entries: CatalogEntry[], updatedAt: number): Promise<void> => {
    await mkdir(path.dirname(cachePath), { recursive: true })
    await writeFile(cachePath, `${JSON.stringify({ entries, updatedAt }, null, 2)}\n`, "utf8")
  }

  const loadCacheIfAvailable = async (): Promise<void> => {
    if (cacheLoaded) {
      return
    }

    cacheLoaded = true
    try {
      const source = await readFile(cachePath, "utf8")
      const validated = cacheSchema.safeParse(JSON.parse(source))
      if (!validated.success) {
        dependencies.logger.warn(
          { cachePath },
          "Model catalog cache is invalid; ignoring cached data"
        )
        return
      }

      snapshot = {
        entries: validated.data.entries,
        updatedAt: validated.data.updatedAt,
        source: "cache",
      }
    } catch (error) {
      if (!isMissingFileError(error)) {
        dependencies.logger.warn(
          { cachePath, error: describeError(error) },
          "Failed to read model catalog cache; continuing without cache"
        )
      }
    }
  }

  const fetchAndPersist = async (): Promise<CatalogSnapshot> => {
    const entries = parseCatalogHtml(await dependencies.fetchCatalogHtml())
    if (entries.length === 0 && snapshot.entries.length > 0) {
      throw new Error("Catalog listing contained no model entries")
    }

    const updatedAt = now()
    snapshot = {
      entries,
      updatedAt,
      source: "network",
    }

    try {
      await saveCache(entries, updatedAt)
    } catch (error) {
      dependencies.logger.warn(
        { cachePath, error: describeError(error) },
        "Failed to persist model catalog cache"
      )
    }

    dependencies.logger.info({ entryCount: entries.length }, "Model catalog refreshed")
    return snapshot
  }

  const isFresh = (): boolean => {
    return (
      snapshot.entries.length > 0 &&
      snapshot.updatedAt !== null &&
      now() - snapshot.updatedAt < ttlMs
    )
  }

  return {
    getEntries: async (options = {}) => {
      await loadCacheIfAvailable()
      if (!options.forceRefresh && isFresh()) {
        return copySnapshot(snapshot).entries
      }

      try {
        return copySnapshot(await fetchAndPersist()).entries
      } catch (error) {
        dependencies.logger.warn(
          {
            error: describeError(error),
            updatedAt: snapshot.updatedAt,
            cachedEntryCount: snapshot.entries.length,
          },
          "Model catalog refresh failed; keeping previous cache snapshot"
        )
        return copySnapshot(snapshot).entries
      }
    },
    refreshNow: async () => {
      await loadCacheIfAvailable()
      return copySnapshot(await fetchAndPersist())
    },
    getSnapshot: () => copySnapshot(snapshot),
  }
}
