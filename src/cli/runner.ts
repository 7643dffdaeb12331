import { readFile } from "node:fs/promises"

import type { Logger } from "pino"

import { BackendError, GatewayConnectionError, GatewayTimeoutError } from "../backend/errors.js"
import type { FetchLike } from "../backend/request-executor.js"
import { filterCatalogEntries } from "../catalog/catalog-scraper.js"
import { resolveGatewayConfig } from "../config/gateway-config.js"
import { formatPullProgress } from "../downloads/download-coordinator.js"
import { createGateway, type Gateway } from "../gateway.js"
import { createLogger } from "../logging/logger.js"
import { resolveVisionSupport } from "../model-management/capability-cache.js"
import { summarizeModelInfo } from "../model-management/model-info.js"
import { parseCommand, usage, type GatewayCommand } from "./command.js"

export const EXIT_CANCELLED = 130

const BYTES_PER_MEGABYTE = 1024 * 1024

export type CliStreams = {
  stdout: Pick<Console, "log">
  stderr: Pick<Console, "error">
}

export type CliRuntimeOptions = {
  fetchImpl?: FetchLike
  logger?: Logger
  cwd?: string
  homeDirectory?: string
  readImage?: (imagePath: string) => Promise<Buffer>
  /** Registers a Ctrl+C listener and returns its disposer. */
  onInterrupt?: (listener: () => void) => () => void
}

type CommandContext = {
  gateway: Gateway
  streams: CliStreams
  readImage: (imagePath: string) => Promise<Buffer>
  onInterrupt: (listener: () => void) => () => void
}

const onProcessInterrupt = (listener: () => void): (() => void) => {
  process.once("SIGINT", listener)
  return () => {
    process.off("SIGINT", listener)
  }
}

/**
 * One-line wording for a failed command. Timeouts, unreachable backends and backend
 * rejections each get their own prefix.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof GatewayTimeoutError) {
    return `Backend timed out: ${error.message}`
  }

  if (error instanceof GatewayConnectionError) {
    return `Backend unreachable: ${error.message}`
  }

  if (error instanceof BackendError) {
    return error.status === null
      ? `Backend returned an unusable response: ${error.detail}`
      : `Backend rejected the request (HTTP ${error.status}): ${error.detail}`
  }

  return error instanceof Error ? error.message : String(error)
}

const printOrDash = (value: string | null): string => {
  return value ?? "-"
}

const runModels = async ({ gateway, streams }: CommandContext): Promise<number> => {
  for (const model of await gateway.client.listModels()) {
    streams.stdout.log(model)
  }

  return 0
}

const runCatalog = async (
  { gateway, streams }: CommandContext,
  command: Extract<GatewayCommand, { name: "catalog" }>
): Promise<number> => {
  const entries = await gateway.catalog.getEntries({ forceRefresh: command.refresh })
  for (const entry of filterCatalogEntries(entries, command.query)) {
    streams.stdout.log(
      [entry.name, entry.capabilities.join(","), entry.sizes.join(","), entry.pulls].join("\t")
    )
  }

  return 0
}

const runInfo = async (
  { gateway, streams }: CommandContext,
  command: Extract<GatewayCommand, { name: "info" }>
): Promise<number> => {
  const show = await gateway.client.showModel(command.model)
  const summary = summarizeModelInfo(show)
  const vision = resolveVisionSupport(show)

  streams.stdout.log(`model\t${command.model}`)
  streams.stdout.log(`family\t${printOrDash(summary.family)}`)
  streams.stdout.log(`parameters\t${printOrDash(summary.parameterSize)}`)
  streams.stdout.log(`quantization\t${printOrDash(summary.quantization)}`)
  streams.stdout.log(`architecture\t${printOrDash(summary.architecture)}`)
  streams.stdout.log(
    `size\t${
      summary.sizeBytes === null
        ? "-"
        : `${(summary.sizeBytes / BYTES_PER_MEGABYTE).toFixed(1)} MB`
    }`
  )
  streams.stdout.log(`vision\t${vision === null ? "unknown" : vision ? "yes" : "no"}`)
  streams.stdout.log(`system\t${printOrDash(summary.systemPrompt)}`)
  return 0
}

const runPull = async (
  { gateway, streams, onInterrupt }: CommandContext,
  command: Extract<GatewayCommand, { name: "pull" }>
): Promise<number> => {
  const job = gateway.downloads.startPull(command.model, {
    onProgress: (progress) => {
      streams.stdout.log(`${command.model}\t${formatPullProgress(progress)}`)
    },
  })

  const dispose = onInterrupt(() => {
    job.cancel()
  })

  try {
    const outcome = await job.done
    if (outcome.state === "completed") {
      streams.stdout.log(`${job.model}\tcompleted`)
      return 0
    }

    if (outcome.state === "cancelled") {
      streams.stderr.error(`Download of ${job.model} cancelled`)
      return EXIT_CANCELLED
    }

    streams.stderr.error(formatCliError(outcome.error))
    return 1
  } finally {
    dispose()
  }
}

const runDelete = async (
  { gateway, streams }: CommandContext,
  command: Extract<GatewayCommand, { name: "delete" }>
): Promise<number> => {
  await gateway.client.deleteModel(command.model)
  streams.stdout.log(`deleted\t${command.model}`)
  return 0
}

const runAsk = async (
  { gateway, streams, readImage }: CommandContext,
  command: Extract<GatewayCommand, { name: "ask" }>
): Promise<number> => {
  if (command.prompt.length === 0) {
    throw new Error("Prompt must not be empty")
  }

  const images = await Promise.all(
    command.images.map(async (imagePath) => (await readImage(imagePath)).toString("base64"))
  )
  const preferredModel = command.model ?? gateway.config.defaultModel
  const decision = await gateway.orchestrator.orchestrate({
    prompt: command.prompt,
    hasAttachments: images.length > 0,
    preferredModel,
  })

  if (decision.task === "vision" && !decision.suitableModelFound) {
    streams.stderr.error("No vision-capable model is available for this request")
    return 1
  }

  const result = await gateway.generation.generate({
    model: decision.selectedModel,
    prompt: command.prompt,
    history: [],
    images,
    keepAlive: gateway.config.keepAlive,
  })

  streams.stdout.log(result.text)
  if (decision.changedFromPreferred) {
    const { task, selectedModel } = decision
    streams.stdout.log(`[${task} request answered by ${selectedModel}, not ${preferredModel}]`)
  }

  return 0
}

const runHealth = async ({ gateway, streams }: CommandContext): Promise<number> => {
  const report = await gateway.checkHealth()
  streams.stdout.log(`status\t${report.ok ? "ok" : "unavailable"}`)
  streams.stdout.log(`models\t${report.modelCount}`)
  streams.stdout.log(`latencyMs\t${report.latencyMs}`)
  if (report.error) {
    streams.stdout.log(`error\t${report.error}`)
  }

  return report.ok ? 0 : 1
}

const dispatch = async (
  command: Exclude<GatewayCommand, { name: "help" }>,
  context: CommandContext
): Promise<number> => {
  switch (command.name) {
    case "models":
      return await runModels(context)
    case "catalog":
      return await runCatalog(context, command)
    case "info":
      return await runInfo(context, command)
    case "pull":
      return await runPull(context, command)
    case "delete":
      return await runDelete(context, command)
    case "ask":
      return await runAsk(context, command)
    case "health":
      return await runHealth(context)
  }
}

/**
 * Runs one CLI invocation against a freshly wired gateway and maps the outcome to an exit
 * code. Every failure is printed as one line on stderr.
 *
 * @param args CLI arguments without the node binary and script path.
 * @param streams Output sinks.
 * @param environment Environment used for configuration.
 * @param options Transport, logger, filesystem and signal overrides for tests.
 * @returns Process exit code.
 */
export const runGatewayCli = async (
  args: string[],
  streams: CliStreams = { stdout: console, stderr: console },
  environment: NodeJS.ProcessEnv = process.env,
  options: CliRuntimeOptions = {}
): Promise<number> => {
  try {
    const command = parseCommand(args)
    if (command.name === "help") {
      streams.stdout.log(usage)
      return 0
    }

    const config = await resolveGatewayConfig({
      environment,
      cwd: options.cwd,
      homeDirectory: options.homeDirectory,
    })
    const logger =
      options.logger ?? createLogger({ logLevel: config.logLevel ?? "warn", toStderr: true })
    const gateway = createGateway(config, { logger, fetchImpl: options.fetchImpl })

    return await dispatch(command, {
      gateway,
      streams,
      readImage: options.readImage ?? (async (imagePath) => await readFile(imagePath)),
      onInterrupt: options.onInterrupt ?? onProcessInterrupt,
    })
  } catch (error) {
    streams.stderr.error(formatCliError(error))
    return 1
  }
}
