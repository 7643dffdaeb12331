import pino, { type Logger } from "pino"

import { buildLoggerOptions, resolveRuntimeEnv, type RuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
  /** CLI output owns stdout, so command runs log to stderr. */
  toStderr?: boolean
}

/**
 * Narrow logger surface accepted by gateway components, so tests can hand in spies
 * instead of a full pino instance.
 */
export type GatewayLogger = Pick<Logger, "debug" | "info" | "warn" | "error">

/**
 * Creates a pino logger from the shared option policy.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const prettyLogs = input.prettyLogs ?? process.env.GATEWAY_PRETTY_LOGS === "1"
  const options = buildLoggerOptions({
    env,
    logLevel: input.logLevel,
    serviceName: input.serviceName,
    prettyLogs,
    toStderr: input.toStderr,
  })

  if (input.toStderr && !options.transport) {
    return pino(options, pino.destination(2))
  }

  return pino(options)
}

export const logger = createLogger({ logLevel: process.env.LOG_LEVEL?.trim() || undefined })

/**
 * Scopes a logger to one gateway component so every line carries a `component` field.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base runtime fields.
 * @returns Component-scoped logger.
 */
export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component })
}
