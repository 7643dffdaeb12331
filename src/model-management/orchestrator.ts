import type { GatewayLogger } from "../logging/logger.js"
import type { VisionSupport } from "./capability-cache.js"
import { getDefaultHeuristics, type Heuristics } from "./heuristics.js"

export type TaskType = "vision" | "code" | "general"

export type OrchestrationDecision = {
  selectedModel: string
  changedFromPreferred: boolean
  suitableModelFound: boolean
}

export type OrchestrationResult = OrchestrationDecision & {
  task: TaskType
}

type ModelOrchestratorDependencies = {
  logger: Pick<GatewayLogger, "debug" | "info" | "warn">
  inventory: {
    getModels: () => Promise<string[]>
  }
  capabilities: {
    supportsVision: (model: string) => Promise<VisionSupport>
  }
  heuristics?: Pick<Heuristics, "codeKeywords" | "codeModelPatterns">
}

export type ModelOrchestrator = {
  detectTask: (prompt: string, hasAttachments: boolean) => TaskType
  selectModel: (task: TaskType, preferredModel: string) => Promise<OrchestrationDecision>
  orchestrate: (input: {
    prompt: string
    hasAttachments: boolean
    preferredModel: string
  }) => Promise<OrchestrationResult>
  isCodeModel: (model: string) => boolean
}

const keep = (model: string, suitableModelFound: boolean): OrchestrationDecision => {
  return {
    selectedModel: model,
    changedFromPreferred: false,
    suitableModelFound,
  }
}

/**
 * Picks the model that should serve a request. Vision requests need a model that reports
 * vision support; code requests prefer a code-specialised model by name; everything else
 * keeps the caller's preferred model.
 *
 * @param dependencies Inventory cache, capability cache, heuristics and logger.
 * @returns Task detection and model selection.
 */
export const createModelOrchestrator = (
  dependencies: ModelOrchestratorDependencies
): ModelOrchestrator => {
  const heuristics = dependencies.heuristics ?? getDefaultHeuristics()

  const isCodeModel = (model: string): boolean => {
    const lower = model.toLowerCase()
    return heuristics.codeModelPatterns.some((pattern) => lower.includes(pattern))
  }

  const detectTask = (prompt: string, hasAttachments: boolean): TaskType => {
    if (hasAttachments) {
      return "vision"
    }

    const text = prompt.toLowerCase()
    if (heuristics.codeKeywords.some((keyword) => text.includes(keyword))) {
      return "code"
    }

    return "general"
  }

  const selectVisionModel = async (preferredModel: string): Promise<OrchestrationDecision> => {
    if ((await dependencies.capabilities.supportsVision(preferredModel)) === true) {
      dependencies.logger.debug({ preferredModel }, "Preferred model already supports vision")
      return keep(preferredModel, true)
    }

    const models = await dependencies.inventory.getModels()
    for (const model of models) {
      if (model === preferredModel) {
        continue
      }

      if ((await dependencies.capabilities.supportsVision(model)) === true) {
        dependencies.logger.info(
          { task: "vision", selectedModel: model, preferredModel },
          "Switched to vision-capable model"
        )
        return {
          selectedModel: model,
          changedFromPreferred: true,
          suitableModelFound: true,
        }
      }
    }

    dependencies.logger.warn(
      { task: "vision", preferredModel, availableModels: models.length },
      "No vision-capable model available"
    )
    return keep(preferredModel, false)
  }

  const selectCodeModel = async (preferredModel: string): Promise<OrchestrationDecision> => {
    if (isCodeModel(preferredModel)) {
      dependencies.logger.debug({ preferredModel }, "Preferred model is already a code model")
      return keep(preferredModel, true)
    }

    const models = await dependencies.inventory.getModels()
    const codeModel = models.find((model) => isCodeModel(model))
    if (codeModel) {
      dependencies.logger.info(
        { task: "code", selectedModel: codeModel, preferredModel },
        "Switched to code model"
      )
      return {
        selectedModel: codeModel,
        changedFromPreferred: true,
        suitableModelFound: true,
      }
    }

    dependencies.logger.info(
      { task: "code", preferredModel },
      "No code model available; keeping preferred model"
    )
    return keep(preferredModel, false)
  }

  const selectModel = async (
    task: TaskType,
    preferredModel: string
  ): Promise<OrchestrationDecision> => {
    if (task === "vision") {
      return await selectVisionModel(preferredModel)
    }

    if (task === "code") {
      return await selectCodeModel(preferredModel)
    }

    return keep(preferredModel, true)
  }

  return {
    detectTask,
    selectModel,
    orchestrate: async (input) => {
      const task = detectTask(input.prompt, input.hasAttachments)
      const decision = await selectModel(task, input.preferredModel)
      return { task, ...decision }
    },
    isCodeModel,
  }
}
