import type { GatewayLogger } from "../logging/logger.js"
import {
  chatResponseSchema,
  generateResponseSchema,
  pullStatusSchema,
  showResponseSchema,
  statusResponseSchema,
  tagsResponseSchema,
  type ChatRequestPayload,
  type GenerateRequestPayload,
  type PullStatus,
  type ShowResponse,
} from "./contracts.js"
import type { EndpointRouter } from "./endpoint-router.js"
import {
  BackendError,
  GatewayConnectionError,
  GatewayError,
  GatewayTimeoutError,
} from "./errors.js"
import { classifyTransportError, type RequestExecutor } from "./request-executor.js"

type OllamaClientDependencies = {
  executor: RequestExecutor
  router: EndpointRouter
  logger: Pick<GatewayLogger, "debug" | "info" | "warn">
}

export type PullOutcome = "completed" | "cancelled"

const PULL_SUCCESS_STATUS = "success"

export type PullModelOptions = {
  onStatus?: (status: PullStatus) => void
  isCancelled?: () => boolean
}

export type OllamaClient = {
  listModels: () => Promise<string[]>
  generate: (payload: GenerateRequestPayload) => Promise<string>
  chat: (payload: ChatRequestPayload) => Promise<string>
  showModel: (model: string) => Promise<ShowResponse>
  deleteModel: (model: string) => Promise<void>
  pullModel: (model: string, options?: PullModelOptions) => Promise<PullOutcome>
  fetchText: (url: string) => Promise<string>
}

const requireText = (value: string | null | undefined, endpoint: string): string => {
  const text = (value ?? "").trim()
  if (text.length === 0) {
    throw new BackendError(null, `Empty response from ${endpoint}`)
  }

  return text
}

const parsePullLine = (line: string): PullStatus => {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch (error) {
    throw new BackendError(null, "Pull stream returned a non-JSON line", { cause: error })
  }

  const validated = pullStatusSchema.safeParse(parsed)
  if (!validated.success) {
    throw new BackendError(null, "Pull stream returned an unexpected status line")
  }

  if (validated.data.error) {
    throw new BackendError(null, validated.data.error)
  }

  return validated.data
}

const wrapStreamError = (error: unknown, model: string): GatewayError => {
  if (error instanceof GatewayError) {
    return error
  }

  const kind = classifyTransportError(error)
  if (kind === "timeout") {
    return new GatewayTimeoutError(`Pull of ${model} timed out`, { cause: error })
  }

  if (kind === "connection") {
    return new GatewayConnectionError(`Pull of ${model} lost its connection`, { cause: error })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new BackendError(null, message, { cause: error })
}

/**
 * Wraps the inference backend's HTTP API. Every call goes through the request executor;
 * model-scoped calls are routed to the local or remote endpoint by the router.
 *
 * @param dependencies Executor, router and logger.
 * @returns Backend operations used by the gateway components.
 */
export const createOllamaClient = (dependencies: OllamaClientDependencies): OllamaClient => {
  const { executor, router } = dependencies

  const assertRoutable = (model: string): void => {
    if (!router.isRoutable(model)) {
      throw new BackendError(
        null,
        `Model ${model} needs the remote endpoint but no API key is configured`
      )
    }
  }

  const modelUrl = (model: string, path: string): string => {
    return `${router.targetBaseUrl(model)}${path}`
  }

  const readPullStream = async (
    model: string,
    response: Response,
    options: PullModelOptions
  ): Promise<PullOutcome> => {
    const isCancelled = options.isCancelled ?? (() => false)
    let succeeded = false

    const handleLine = (line: string): void => {
      if (line.trim().length === 0) {
        return
      }

      const status = parsePullLine(line)
      if (status.status === PULL_SUCCESS_STATUS) {
        succeeded = true
      }
      options.onStatus?.(status)
    }

    const finish = (): PullOutcome => {
      if (isCancelled()) {
        return "cancelled"
      }

      if (!succeeded) {
        throw new BackendError(null, "Pull stream ended before completion")
      }

      return "completed"
    }

    if (!response.body) {
      const text = await response.text()
      text.split("\n").forEach(handleLine)
      return finish()
    }

    const reader = response.body.getReader()
    const decoder = new TextDecoder()
    let buffered = ""

    try {
      for (;;) {
        if (isCancelled()) {
          await reader.cancel()
          return "cancelled"
        }

        const { done, value } = await reader.read()
        if (done) {
          break
        }

        buffered += decoder.decode(value, { stream: true })
        const lines = buffered.split("\n")
        buffered = lines.pop() ?? ""

        lines.forEach(handleLine)
      }

      buffered += decoder.decode()
      handleLine(buffered)
    } catch (error) {
      throw wrapStreamError(error, model)
    } finally {
      reader.releaseLock()
    }

    return finish()
  }

  return {
    listModels: async () => {
      const payload = await executor.execute(
        { method: "GET", url: `${router.localBaseUrl()}/api/tags` },
        tagsResponseSchema
      )

      const names = new Set<string>()
      for (const entry of payload.models) {
        const name = (entry.name ?? entry.model ?? "").trim()
        if (name.length > 0) {
          names.add(name)
        }
      }

      return [...names].sort((left, right) => left.localeCompare(right))
    },
    generate: async (payload) => {
      assertRoutable(payload.model)
      const response = await executor.execute(
        {
          method: "POST",
          url: modelUrl(payload.model, "/api/generate"),
          payload,
          headers: router.authHeaders(payload.model),
        },
        generateResponseSchema
      )

      return requireText(response.response, "/api/generate")
    },
    chat: async (payload) => {
      assertRoutable(payload.model)
      const response = await executor.execute(
        {
          method: "POST",
          url: modelUrl(payload.model, "/api/chat"),
          payload,
          headers: router.authHeaders(payload.model),
        },
        chatResponseSchema
      )

      return requireText(response.message?.content, "/api/chat")
    },
    showModel: async (model) => {
      assertRoutable(model)
      return await executor.execute(
        {
          method: "POST",
          url: modelUrl(model, "/api/show"),
          payload: { model },
          headers: router.authHeaders(model),
        },
        showResponseSchema
      )
    },
    deleteModel: async (model) => {
      await executor.execute(
        {
          method: "DELETE",
          url: `${router.localBaseUrl()}/api/delete`,
          payload: { model },
        },
        statusResponseSchema
      )
      dependencies.logger.info({ model }, "Model deleted")
    },
    pullModel: async (model, options = {}) => {
      const response = await executor.open({
        method: "POST",
        url: `${router.localBaseUrl()}/api/pull`,
        payload: { model, stream: true },
        timeoutMs: null,
      })

      dependencies.logger.debug({ model }, "Pull stream opened")
      return await readPullStream(model, response, options)
    },
    fetchText: async (url) => {
      return await executor.executeText({
        method: "GET",
        url,
        headers: { accept: "text/html" },
      })
    },
  }
}
