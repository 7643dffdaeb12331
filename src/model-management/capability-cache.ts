import type { ShowResponse } from "../backend/contracts.js"
import type { GatewayLogger } from "../logging/logger.js"

/** `null` means the capability could not be confirmed either way. */
export type VisionSupport = boolean | null

const VISION_METADATA_MARKERS = ["vision", "clip", "mmproj", "projector"]

type CapabilityCacheDependencies = {
  logger: Pick<GatewayLogger, "debug" | "warn">
  showModel: (model: string) => Promise<ShowResponse>
  isRoutable: (model: string) => boolean
}

export type CapabilityCache = {
  supportsVision: (model: string) => Promise<VisionSupport>
  peek: (model: string) => boolean | undefined
  clear: () => void
}

/**
 * Reads vision support out of a model introspection payload: the explicit capability list
 * when present, otherwise vision-related metadata keys, otherwise unknown.
 *
 * @param show `/api/show` response body.
 * @returns Vision support verdict.
 */
export const resolveVisionSupport = (show: ShowResponse): VisionSupport => {
  if (Array.isArray(show.capabilities)) {
    return show.capabilities.some((capability) => capability.toLowerCase() === "vision")
  }

  if (show.projector_info && Object.keys(show.projector_info).length > 0) {
    return true
  }

  const metadataKeys = Object.keys(show.model_info ?? {})
  if (metadataKeys.length === 0) {
    return null
  }

  return metadataKeys.some((key) => {
    const lower = key.toLowerCase()
    return VISION_METADATA_MARKERS.some((marker) => lower.includes(marker))
  })
}

/**
 * Memoizes definitive vision verdicts per model for the lifetime of the owning gateway.
 * Unknown verdicts are never stored, so the next lookup introspects again.
 *
 * @param dependencies Introspection call, routing check and logger.
 * @returns Capability lookups shared by orchestration calls.
 */
export const createCapabilityCache = (
  dependencies: CapabilityCacheDependencies
): CapabilityCache => {
  const verdicts = new Map<string, boolean>()

  return {
    supportsVision: async (model) => {
      const cached = verdicts.get(model)
      if (cached !== undefined) {
        return cached
      }

      if (!dependencies.isRoutable(model)) {
        dependencies.logger.debug({ model }, "Skipping capability lookup for unroutable model")
        return null
      }

      let verdict: VisionSupport
      try {
        verdict = resolveVisionSupport(await dependencies.showModel(model))
      } catch (error) {
        dependencies.logger.warn(
          { model, error: error instanceof Error ? error.message : String(error) },
          "Capability introspection failed; vision support unknown"
        )
        return null
      }

      if (verdict !== null) {
        verdicts.set(model, verdict)
      }

      dependencies.logger.debug({ model, supportsVision: verdict }, "Capability resolved")
      return verdict
    },
    peek: (model) => verdicts.get(model),
    clear: () => {
      verdicts.clear()
    },
  }
}
