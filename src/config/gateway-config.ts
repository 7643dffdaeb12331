import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import path from "node:path"

import { z } from "zod"

const DEFAULT_ENV_FILE_NAME = ".env"
const DEFAULT_DATA_DIRECTORY_NAME = ".ollama-gateway"

const BOOLEAN_FLAGS: Record<string, boolean> = {
  "1": true,
  true: true,
  yes: true,
  on: true,
  "0": false,
  false: false,
  no: false,
  off: false,
}

const httpUrlSchema = z
  .string()
  .trim()
  .regex(/^https?:\/\/\S+$/iu, "must be an http:// or https:// URL")
  .transform((value) => value.replace(/\/+$/u, ""))

const booleanFlagSchema = z.string().transform((value, context) => {
  const flag = BOOLEAN_FLAGS[value.trim().toLowerCase()]
  if (flag === undefined) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be one of 1, 0, true, false, yes, no, on, off",
    })
    return z.NEVER
  }

  return flag
})

const integerSchema = (minimum: number) => z.coerce.number().int().min(minimum)

const environmentSchema = z.object({
  OLLAMA_BASE_URL: httpUrlSchema,
  OLLAMA_CLOUD_BASE_URL: httpUrlSchema.default("https://ollama.com"),
  OLLAMA_API_KEY: z.string().trim().optional(),
  OLLAMA_AUTH_SCHEME: z.string().trim().min(1).default("Bearer"),
  OLLAMA_DEFAULT_MODEL: z.string().trim().min(1),
  OLLAMA_USE_CHAT_API: booleanFlagSchema.default("true"),
  OLLAMA_KEEP_ALIVE: z.string().trim().min(1).default("5m"),
  REQUEST_TIMEOUT_SECONDS: integerSchema(5).default(60),
  REQUEST_RETRIES: integerSchema(0).default(2),
  RETRY_BASE_DELAY_MS: integerSchema(0).default(500),
  MODEL_INVENTORY_TTL_SECONDS: integerSchema(1).default(60),
  CATALOG_URL: httpUrlSchema.default("https://ollama.com/library"),
  CATALOG_CACHE_TTL_SECONDS: integerSchema(1).default(300),
  GATEWAY_DATA_DIR: z.string().trim().min(1).optional(),
  PULL_PROGRESS_INTERVAL_MS: integerSchema(0).default(2000),
  HEURISTICS_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.string().trim().min(1).optional(),
})

const ENVIRONMENT_KEYS = environmentSchema.keyof().options

type EnvironmentKey = (typeof ENVIRONMENT_KEYS)[number]

type EnvironmentValues = Partial<Record<EnvironmentKey, string>>

export type GatewayConfig = {
  localBaseUrl: string
  remoteBaseUrl: string
  apiKey: string | null
  authScheme: string
  defaultModel: string
  useChatApi: boolean
  keepAlive: string
  requestTimeoutMs: number
  retries: number
  retryBaseDelayMs: number
  inventoryTtlMs: number
  catalogUrl: string
  catalogCacheTtlMs: number
  dataDirectory: string
  pullProgressIntervalMs: number
  heuristicsPath: string | null
  logLevel: string | null
}

type ResolveGatewayConfigInput = {
  environment?: NodeJS.ProcessEnv
  homeDirectory?: string
  cwd?: string
  readEnvironmentFile?: (envPath: string) => Promise<string>
}

const isEnvironmentKey = (key: string): key is EnvironmentKey => {
  return ENVIRONMENT_KEYS.some((candidate) => candidate === key)
}

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export const parseEnvironmentFile = (source: string): EnvironmentValues => {
  const values: EnvironmentValues = {}

  for (const line of source.split(/\r?\n/u)) {
    const trimmed = line.trim()
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      continue
    }

    const separator = trimmed.indexOf("=")
    if (separator < 1) {
      continue
    }

    const key = trimmed
      .slice(0, separator)
      .replace(/^export\s+/u, "")
      .trim()
    const value = trimmed.slice(separator + 1).trim()
    if (!isEnvironmentKey(key)) {
      continue
    }

    const normalized =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
        ? value.slice(1, -1).trim()
        : value

    values[key] = normalized
  }

  return values
}

const readEnvironmentValuesFromDotEnv = async (
  currentWorkingDirectory: string,
  readEnvironmentFile: (envPath: string) => Promise<string>
): Promise<EnvironmentValues> => {
  const envPath = path.join(currentWorkingDirectory, DEFAULT_ENV_FILE_NAME)

  try {
    return parseEnvironmentFile(await readEnvironmentFile(envPath))
  } catch (error) {
    if (isMissingFileError(error)) {
      return {}
    }

    throw error
  }
}

const firstNonEmpty = (...values: Array<string | undefined>): string | undefined => {
  for (const value of values) {
    if (typeof value !== "string") {
      continue
    }

    const trimmed = value.trim()
    if (trimmed.length > 0) {
      return trimmed
    }
  }

  return undefined
}

const expandHomeDirectory = (value: string, homeDirectory: string): string => {
  if (value === "~") {
    return homeDirectory
  }

  return value.startsWith("~/") ? path.join(homeDirectory, value.slice(2)) : value
}

const formatIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "environment"}: ${issue.message}`)
    .join("; ")
}

/**
 * Resolves gateway configuration from the process environment, filling gaps from a `.env`
 * file in the working directory. Process environment values always win.
 *
 * @param input Optional environment, home directory, cwd and file reader overrides for tests.
 * @returns Validated configuration with durations in milliseconds.
 */
export const resolveGatewayConfig = async (
  input: ResolveGatewayConfigInput = {}
): Promise<GatewayConfig> => {
  const environment = input.environment ?? process.env
  const homeDirectory = input.homeDirectory ?? homedir()
  const currentWorkingDirectory = input.cwd ?? process.cwd()
  const readEnvironmentFile =
    input.readEnvironmentFile ?? ((envPath: string) => readFile(envPath, "utf8"))

  const dotEnvValues = await readEnvironmentValuesFromDotEnv(
    currentWorkingDirectory,
    readEnvironmentFile
  )

  const merged: EnvironmentValues = {}
  for (const key of ENVIRONMENT_KEYS) {
    merged[key] = firstNonEmpty(environment[key], dotEnvValues[key])
  }

  const parsed = environmentSchema.safeParse(merged)
  if (!parsed.success) {
    throw new Error(`Invalid gateway configuration: ${formatIssues(parsed.error)}`)
  }

  const values = parsed.data
  return {
    localBaseUrl: values.OLLAMA_BASE_URL,
    remoteBaseUrl: values.OLLAMA_CLOUD_BASE_URL,
    apiKey: values.OLLAMA_API_KEY ?? null,
    authScheme: values.OLLAMA_AUTH_SCHEME,
    defaultModel: values.OLLAMA_DEFAULT_MODEL,
    useChatApi: values.OLLAMA_USE_CHAT_API,
    keepAlive: values.OLLAMA_KEEP_ALIVE,
    requestTimeoutMs: values.REQUEST_TIMEOUT_SECONDS * 1000,
    retries: values.REQUEST_RETRIES,
    retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
    inventoryTtlMs: values.MODEL_INVENTORY_TTL_SECONDS * 1000,
    catalogUrl: values.CATALOG_URL,
    catalogCacheTtlMs: values.CATALOG_CACHE_TTL_SECONDS * 1000,
    dataDirectory: expandHomeDirectory(
      values.GATEWAY_DATA_DIR ?? path.join(homeDirectory, DEFAULT_DATA_DIRECTORY_NAME),
      homeDirectory
    ),
    pullProgressIntervalMs: values.PULL_PROGRESS_INTERVAL_MS,
    heuristicsPath: values.HEURISTICS_PATH
      ? expandHomeDirectory(values.HEURISTICS_PATH, homeDirectory)
      : null,
    logLevel: values.LOG_LEVEL ?? null,
  }
}
