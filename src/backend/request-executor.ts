import type { z } from "zod"

import type { GatewayLogger } from "../logging/logger.js"
import {
  BackendError,
  GatewayConnectionError,
  GatewayError,
  GatewayTimeoutError,
} from "./errors.js"

export type FetchLike = typeof fetch

export type HttpMethod = "GET" | "POST" | "DELETE"

export type BackendRequest = {
  method: HttpMethod
  url: string
  payload?: unknown
  headers?: Record<string, string>
  /** Per-call deadline override; `null` disables the deadline (long-lived streams). */
  timeoutMs?: number | null
}

/** Output type is what callers get back; input stays open so schemas may apply defaults. */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export type RequestExecutorDependencies = {
  logger: Pick<GatewayLogger, "debug" | "warn">
  timeoutMs: number
  retries: number
  baseDelayMs: number
  fetchImpl?: FetchLike
  sleep?: (delayMs: number) => Promise<void>
}

export type RequestExecutor = {
  /** Performs the call and validates the JSON body against `schema`. */
  execute: <T>(request: BackendRequest, schema: PayloadSchema<T>) => Promise<T>
  /** Performs the call and returns the raw body as text. */
  executeText: (request: BackendRequest) => Promise<string>
  /** Opens a streamed response; retries cover connection setup only. */
  open: (request: BackendRequest) => Promise<Response>
}

type TransportFailureKind = "timeout" | "connection"

export const MAX_ERROR_DETAIL_LENGTH = 300

const defaultSleep = async (delayMs: number): Promise<void> => {
  await new Promise((resolve) => setTimeout(resolve, delayMs))
}

/**
 * Exponential backoff schedule shared by every retried backend call.
 *
 * @param attempt Zero-based index of the attempt that just failed.
 * @param baseDelayMs Delay applied after the first failed attempt.
 * @returns Delay in milliseconds before the next attempt.
 */
export const calculateBackoffDelayMs = (attempt: number, baseDelayMs: number): number => {
  return baseDelayMs * 2 ** attempt
}

const readErrorName = (error: unknown): string | null => {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return null
  }

  return typeof error.name === "string" ? error.name : null
}

/**
 * Maps what fetch throws onto the two retryable transport failure kinds. Anything else is
 * not a transport failure and is never retried.
 */
export const classifyTransportError = (error: unknown): TransportFailureKind | null => {
  const name = readErrorName(error)
  if (name === "TimeoutError" || name === "AbortError") {
    return "timeout"
  }

  // undici rejects with a TypeError ("fetch failed") for DNS, refused and reset sockets.
  if (error instanceof TypeError) {
    return "connection"
  }

  return null
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : ""
    return `${error.message}${cause}`
  }

  return String(error)
}

const describeTarget = (request: BackendRequest): string => {
  try {
    const url = new URL(request.url)
    return `${request.method} ${url.pathname}`
  } catch {
    return `${request.method} ${request.url}`
  }
}

/**
 * Creates the single entry point for backend HTTP calls: bounded retries with exponential
 * backoff for timeouts and connection failures, immediate typed errors for HTTP statuses.
 *
 * @param dependencies Logger, retry policy, and transport overrides for tests.
 * @returns Executor used by the backend client.
 */
export const createRequestExecutor = (
  dependencies: RequestExecutorDependencies
): RequestExecutor => {
  const fetchImpl = dependencies.fetchImpl ?? fetch
  const sleep = dependencies.sleep ?? defaultSleep
  const maxAttempts = dependencies.retries + 1

  const send = async (request: BackendRequest): Promise<Response> => {
    const timeoutMs = request.timeoutMs === undefined ? dependencies.timeoutMs : request.timeoutMs
    const hasPayload = request.payload !== undefined

    const response = await fetchImpl(request.url, {
      method: request.method,
      headers: {
        ...(hasPayload ? { "content-type": "application/json" } : {}),
        ...request.headers,
      },
      body: hasPayload ? JSON.stringify(request.payload) : undefined,
      signal: timeoutMs == null ? undefined : AbortSignal.timeout(timeoutMs),
    })

    if (!response.ok) {
      const body = await response.text()
      throw new BackendError(response.status, body.slice(0, MAX_ERROR_DETAIL_LENGTH))
    }

    return response
  }

  const withRetries = async <T>(
    request: BackendRequest,
    perform: () => Promise<T>
  ): Promise<T> => {
    const target = describeTarget(request)

    for (let attempt = 0; ; attempt += 1) {
      try {
        return await perform()
      } catch (error) {
        if (error instanceof GatewayError) {
          throw error
        }

        const failureKind = classifyTransportError(error)
        if (!failureKind) {
          throw new BackendError(null, describeError(error), { cause: error })
        }

        if (attempt < dependencies.retries) {
          const retryDelayMs = calculateBackoffDelayMs(attempt, dependencies.baseDelayMs)
          dependencies.logger.warn(
            {
              target,
              attempt: attempt + 1,
              maxAttempts,
              retryDelayMs,
              failureKind,
              error: describeError(error),
            },
            "Backend request failed; retrying"
          )
          await sleep(retryDelayMs)
          continue
        }

        if (failureKind === "timeout") {
          throw new GatewayTimeoutError(`Backend request ${target} timed out`, { cause: error })
        }

        throw new GatewayConnectionError(`Could not reach backend for ${target}`, {
          cause: error,
        })
      }
    }
  }

  const executeText = async (request: BackendRequest): Promise<string> => {
    return await withRetries(request, async () => {
      const response = await send(request)
      return await response.text()
    })
  }

  return {
    execute: async <T>(request: BackendRequest, schema: PayloadSchema<T>): Promise<T> => {
      const text = await executeText(request)
      const target = describeTarget(request)

      let body: unknown
      try {
        body = text.trim().length === 0 ? {} : JSON.parse(text)
      } catch (error) {
        throw new BackendError(null, `Non-JSON payload from ${target}`, { cause: error })
      }

      const parsed = schema.safeParse(body)
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
          .join("; ")
        throw new BackendError(null, `Unexpected payload from ${target}: ${detail}`)
      }

      dependencies.logger.debug({ target }, "Backend request completed")
      return parsed.data
    },
    executeText,
    open: async (request: BackendRequest): Promise<Response> => {
      return await withRetries(request, async () => await send(request))
    },
  }
}
