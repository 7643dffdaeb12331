import pino, { type LoggerOptions, type TransportSingleOptions } from "pino"

export type RuntimeEnv = "development" | "test" | "production"

type BuildLoggerOptionsInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
  toStderr?: boolean
}

const DEFAULT_SERVICE_NAME = "ollama-gateway"

const buildPrettyTransport = (destination: 1 | 2): TransportSingleOptions => ({
  target: "pino-pretty",
  options: {
    colorize: true,
    singleLine: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
    destination,
  },
})

/**
 * Normalizes NODE_ENV into the three environments the logger policy distinguishes.
 *
 * @param value Optional environment value, defaulting to NODE_ENV.
 * @returns Runtime environment category used by logger policy.
 */
export const resolveRuntimeEnv = (value = process.env.NODE_ENV): RuntimeEnv => {
  if (value === "production") {
    return "production"
  }

  if (value === "test") {
    return "test"
  }

  return "development"
}

/**
 * Builds pino options for every gateway process: debug level and optional pretty output
 * in development, structured JSON at info level everywhere else.
 *
 * @param input Optional logger overrides for env, level, and service naming.
 * @returns Pino logger options.
 */
export const buildLoggerOptions = ({
  env = resolveRuntimeEnv(),
  logLevel,
  serviceName = DEFAULT_SERVICE_NAME,
  prettyLogs = false,
  toStderr = false,
}: BuildLoggerOptionsInput = {}): LoggerOptions => {
  const level = logLevel ?? (env === "development" ? "debug" : "info")
  const shouldUsePrettyTransport = env === "development" && prettyLogs

  return {
    name: serviceName,
    level,
    base: {
      service: serviceName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: shouldUsePrettyTransport ? buildPrettyTransport(toStderr ? 2 : 1) : undefined,
  }
}
