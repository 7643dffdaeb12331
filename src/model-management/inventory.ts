import type { GatewayLogger } from "../logging/logger.js"

export const DEFAULT_INVENTORY_TTL_MS = 60_000

export type ModelInventorySnapshot = {
  models: string[]
  fetchedAt: number
}

type ModelInventoryDependencies = {
  logger: Pick<GatewayLogger, "debug" | "warn">
  listModels: () => Promise<string[]>
  ttlMs?: number
  now?: () => number
}

export type ModelInventory = {
  getModels: () => Promise<string[]>
  refreshNow: () => Promise<ModelInventorySnapshot>
  getSnapshot: () => ModelInventorySnapshot | null
  invalidate: () => void
}

/**
 * Caches the local model list for a fixed TTL. A failed refresh keeps serving the last good
 * snapshot (or nothing) and is retried on the next lookup.
 *
 * @param dependencies Listing call, logger and clock/TTL overrides.
 * @returns Inventory cache owned by one gateway instance.
 */
export const createModelInventory = (dependencies: ModelInventoryDependencies): ModelInventory => {
  const now = dependencies.now ?? Date.now
  const ttlMs = dependencies.ttlMs ?? DEFAULT_INVENTORY_TTL_MS

  let snapshot: ModelInventorySnapshot | null = null
  let inFlight: Promise<ModelInventorySnapshot> | null = null

  const refreshNow = async (): Promise<ModelInventorySnapshot> => {
    if (inFlight) {
      return await inFlight
    }

    inFlight = (async () => {
      const models = await dependencies.listModels()
      snapshot = {
        models: [...models],
        fetchedAt: now(),
      }
      dependencies.logger.debug({ count: models.length }, "Model inventory refreshed")
      return snapshot
    })()

    try {
      return await inFlight
    } finally {
      inFlight = null
    }
  }

  const isFresh = (current: ModelInventorySnapshot | null): current is ModelInventorySnapshot => {
    return current !== null && current.models.length > 0 && now() - current.fetchedAt < ttlMs
  }

  return {
    getModels: async () => {
      const current = snapshot
      if (isFresh(current)) {
        return [...current.models]
      }

      try {
        const refreshed = await refreshNow()
        return [...refreshed.models]
      } catch (error) {
        dependencies.logger.warn(
          {
            error: error instanceof Error ? error.message : String(error),
            cachedModelCount: snapshot?.models.length ?? 0,
            fetchedAt: snapshot?.fetchedAt ?? null,
          },
          "Model inventory refresh failed; keeping previous snapshot"
        )
        return snapshot ? [...snapshot.models] : []
      }
    },
    refreshNow,
    getSnapshot: () => {
      return snapshot ? { models: [...snapshot.models], fetchedAt: snapshot.fetchedAt } : null
    },
    invalidate: () => {
      snapshot = null
    },
  }
}
