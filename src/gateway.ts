import type { Logger } from "pino"

import { createEndpointRouter, type EndpointRouter } from "./backend/endpoint-router.js"
import { createOllamaClient, type OllamaClient } from "./backend/ollama-client.js"
import { createRequestExecutor, type FetchLike } from "./backend/request-executor.js"
import { createCatalogService, type CatalogService } from "./catalog/catalog-service.js"
import type { GatewayConfig } from "./config/gateway-config.js"
import {
  createDownloadCoordinator,
  type DownloadCoordinator,
} from "./downloads/download-coordinator.js"
import { createFallbackDetector } from "./generation/fallback-detector.js"
import {
  createGenerationService,
  type GenerationService,
} from "./generation/generation-service.js"
import { createComponentLogger, logger as rootLogger } from "./logging/logger.js"
import {
  createCapabilityCache,
  type CapabilityCache,
} from "./model-management/capability-cache.js"
import {
  getDefaultHeuristics,
  loadHeuristics,
  type Heuristics,
} from "./model-management/heuristics.js"
import { createModelInventory, type ModelInventory } from "./model-management/inventory.js"
import {
  createModelOrchestrator,
  type ModelOrchestrator,
} from "./model-management/orchestrator.js"

export type HealthReport = {
  ok: boolean
  modelCount: number
  latencyMs: number
  error: string | null
}

type GatewayDependencies = {
  logger?: Logger
  fetchImpl?: FetchLike
  sleep?: (delayMs: number) => Promise<void>
  now?: () => number
  heuristics?: Heuristics
}

export type Gateway = {
  config: GatewayConfig
  router: EndpointRouter
  client: OllamaClient
  capabilities: CapabilityCache
  inventory: ModelInventory
  orchestrator: ModelOrchestrator
  generation: GenerationService
  catalog: CatalogService
  downloads: DownloadCoordinator
  checkHealth: () => Promise<HealthReport>
}

/**
 * Wires one gateway instance. Caches (capabilities, inventory, catalog) and the download
 * registry belong to the returned object; separate instances share nothing.
 *
 * @param config Resolved gateway configuration.
 * @param dependencies Logger, transport and clock overrides for tests.
 * @returns Gateway components ready for callers.
 */
export const createGateway = (
  config: GatewayConfig,
  dependencies: GatewayDependencies = {}
): Gateway => {
  const parentLogger = dependencies.logger ?? rootLogger
  const now = dependencies.now ?? Date.now
  const heuristics =
    dependencies.heuristics ??
    (config.heuristicsPath ? loadHeuristics(config.heuristicsPath) : getDefaultHeuristics())

  const router = createEndpointRouter({
    localBaseUrl: config.localBaseUrl,
    remoteBaseUrl: config.remoteBaseUrl,
    apiKey: config.apiKey,
    authScheme: config.authScheme,
  })

  const executor = createRequestExecutor({
    logger: createComponentLogger("request-executor", parentLogger),
    timeoutMs: config.requestTimeoutMs,
    retries: config.retries,
    baseDelayMs: config.retryBaseDelayMs,
    fetchImpl: dependencies.fetchImpl,
    sleep: dependencies.sleep,
  })

  const client = createOllamaClient({
    executor,
    router,
    logger: createComponentLogger("backend-client", parentLogger),
  })

  const capabilities = createCapabilityCache({
    logger: createComponentLogger("capability-cache", parentLogger),
    showModel: client.showModel,
    isRoutable: router.isRoutable,
  })

  const inventory = createModelInventory({
    logger: createComponentLogger("model-inventory", parentLogger),
    listModels: client.listModels,
    ttlMs: config.inventoryTtlMs,
    now,
  })

  const orchestrator = createModelOrchestrator({
    logger: createComponentLogger("orchestrator", parentLogger),
    inventory,
    capabilities,
    heuristics,
  })

  const generation = createGenerationService({
    logger: createComponentLogger("generation", parentLogger),
    client,
    detector: createFallbackDetector({ missingImagePatterns: heuristics.missingImagePatterns }),
    useChatApi: config.useChatApi,
  })

  const catalog = createCatalogService({
    logger: createComponentLogger("catalog", parentLogger),
    dataDirectory: config.dataDirectory,
    fetchCatalogHtml: async () => await client.fetchText(config.catalogUrl),
    ttlMs: config.catalogCacheTtlMs,
    now,
  })

  const downloads = createDownloadCoordinator({
    logger: createComponentLogger("downloads", parentLogger),
    pullModel: client.pullModel,
    progressIntervalMs: config.pullProgressIntervalMs,
    now,
  })

  const healthLogger = createComponentLogger("health", parentLogger)

  return {
    config,
    router,
    client,
    capabilities,
    inventory,
    orchestrator,
    generation,
    catalog,
    downloads,
    checkHealth: async () => {
      const startedAt = now()
      try {
        const models = await client.listModels()
        const report = {
          ok: true,
          modelCount: models.length,
          latencyMs: now() - startedAt,
          error: null,
        }
        healthLogger.debug(report, "Backend health check passed")
        return report
      } catch (error) {
        const report = {
          ok: false,
          modelCount: 0,
          latencyMs: now() - startedAt,
          error: error instanceof Error ? error.message : String(error),
        }
        healthLogger.warn(report, "Backend health check failed")
        return report
      }
    },
  }
}

export * from "./backend/contracts.js"
export * from "./backend/endpoint-router.js"
export * from "./backend/errors.js"
export * from "./backend/ollama-client.js"
export * from "./backend/request-executor.js"
export * from "./catalog/catalog-scraper.js"
export * from "./catalog/catalog-service.js"
export * from "./config/gateway-config.js"
export * from "./conversation/message-composer.js"
export * from "./conversation/types.js"
export * from "./downloads/download-coordinator.js"
export * from "./generation/fallback-detector.js"
export * from "./generation/generation-service.js"
export * from "./model-management/capability-cache.js"
export * from "./model-management/heuristics.js"
export * from "./model-management/inventory.js"
export * from "./model-management/model-info.js"
export * from "./model-management/orchestrator.js"
