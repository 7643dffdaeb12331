export type GatewayErrorKind = "timeout" | "connection" | "backend"

/**
 * Base class for every failure a backend call can surface. Callers branch on `kind`
 * (or `instanceof`) to pick user-facing wording and fallback policy.
 */
export class GatewayError extends Error {
  kind: GatewayErrorKind

  constructor(kind: GatewayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "GatewayError"
    this.kind = kind
  }
}

export class GatewayTimeoutError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("timeout", message, options)
    this.name = "GatewayTimeoutError"
  }
}

export class GatewayConnectionError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection", message, options)
    this.name = "GatewayConnectionError"
  }
}

/**
 * Non-2xx responses, plus 2xx responses without usable content. `status` is null for the
 * latter (empty or malformed payloads).
 */
export class BackendError extends GatewayError {
  status: number | null
  detail: string

  constructor(status: number | null, detail: string, options?: { cause?: unknown }) {
    super(
      "backend",
      status == null ? `Backend error: ${detail}` : `Backend returned HTTP ${status}: ${detail}`,
      options
    )
    this.name = "BackendError"
    this.status = status
    this.detail = detail
  }
}

export const isGatewayError = (error: unknown): error is GatewayError => {
  return error instanceof GatewayError
}
