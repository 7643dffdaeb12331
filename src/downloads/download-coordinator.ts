import type { PullStatus } from "../backend/contracts.js"
import type { PullModelOptions, PullOutcome } from "../backend/ollama-client.js"
import type { GatewayLogger } from "../logging/logger.js"

export const DEFAULT_PROGRESS_INTERVAL_MS = 2_000

const PROGRESS_BAR_CELLS = 10
const BYTES_PER_MEGABYTE = 1024 * 1024

export type PullProgress = {
  phase: string
  bytesDone: number
  bytesTotal: number
  percent: number | null
}

export type DownloadState = "running" | "completed" | "failed" | "cancelled"

export type DownloadOutcome =
  | { state: "completed" }
  | { state: "failed"; error: Error }
  | { state: "cancelled" }

export type ProgressListener = (progress: PullProgress) => void

export type DownloadJob = {
  model: string
  startedAt: number
  /** Settles with the terminal outcome; never rejects. */
  done: Promise<DownloadOutcome>
  cancel: () => void
  isCancelRequested: () => boolean
  getState: () => DownloadState
  getLastProgress: () => PullProgress | null
  subscribe: (listener: ProgressListener) => () => void
}

export type DownloadCoordinatorErrorCode = "already_in_progress" | "invalid_model"

export class DownloadCoordinatorError extends Error {
  code: DownloadCoordinatorErrorCode

  constructor(code: DownloadCoordinatorErrorCode, message: string) {
    super(message)
    this.name = "DownloadCoordinatorError"
    this.code = code
  }
}

type DownloadCoordinatorDependencies = {
  logger: Pick<GatewayLogger, "info" | "warn" | "error">
  pullModel: (model: string, options: PullModelOptions) => Promise<PullOutcome>
  progressIntervalMs?: number
  now?: () => number
}

export type DownloadCoordinator = {
  startPull: (model: string, options?: { onProgress?: ProgressListener }) => DownloadJob
  cancel: (model: string) => boolean
  getJob: (model: string) => DownloadJob | null
  listActive: () => string[]
}

export const toPullProgress = (status: PullStatus): PullProgress => {
  const bytesTotal = status.total ?? 0
  const bytesDone = status.completed ?? 0

  return {
    phase: status.status ?? "",
    bytesDone,
    bytesTotal,
    percent:
      bytesTotal > 0 && bytesDone > 0 ? Math.min(100, (bytesDone / bytesTotal) * 100) : null,
  }
}

/**
 * Renders progress as a ten-cell bar with percentage and megabytes, or the bare phase name
 * while the backend reports no byte counts.
 */
export const formatPullProgress = (progress: PullProgress): string => {
  if (progress.percent === null) {
    return progress.phase.length > 0 ? progress.phase : "…"
  }

  const ratio = progress.percent / 100
  const filled = Math.min(PROGRESS_BAR_CELLS, Math.floor(ratio * PROGRESS_BAR_CELLS))
  const bar = "█".repeat(filled) + "░".repeat(PROGRESS_BAR_CELLS - filled)
  const doneMb = (progress.bytesDone / BYTES_PER_MEGABYTE).toFixed(1)
  const totalMb = (progress.bytesTotal / BYTES_PER_MEGABYTE).toFixed(1)

  return `${bar} ${progress.percent.toFixed(0)}%  (${doneMb}/${totalMb} MB)`
}

const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Runs model pulls in the background with at most one active job per model. Progress is
 * rate-limited per job; a cancelled job stops reporting and always ends as cancelled.
 *
 * @param dependencies Pull call, logger and clock/interval overrides.
 * @returns Coordinator owning the active job registry.
 */
export const createDownloadCoordinator = (
  dependencies: DownloadCoordinatorDependencies
): DownloadCoordinator => {
  const now = dependencies.now ?? Date.now
  const intervalMs = dependencies.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS
  const active = new Map<string, DownloadJob>()

  const startPull = (
    requestedModel: string,
    options: { onProgress?: ProgressListener } = {}
  ): DownloadJob => {
    const model = requestedModel.trim()
    if (model.length === 0) {
      throw new DownloadCoordinatorError("invalid_model", "Model name must not be empty")
    }

    if (active.has(model)) {
      throw new DownloadCoordinatorError(
        "already_in_progress",
        `A download of ${model} is already in progress`
      )
    }

    const startedAt = now()
    const listeners = new Set<ProgressListener>()
    if (options.onProgress) {
      listeners.add(options.onProgress)
    }

    let state: DownloadState = "running"
    let cancelRequested = false
    let lastProgress: PullProgress | null = null
    let lastEmittedAt = startedAt

    const emit = (progress: PullProgress): void => {
      for (const listener of listeners) {
        try {
          listener(progress)
        } catch (error) {
          dependencies.logger.warn(
            { model, error: toError(error).message },
            "Download progress listener failed"
          )
        }
      }
    }

    const onStatus = (status: PullStatus): void => {
      if (cancelRequested) {
        return
      }

      lastProgress = toPullProgress(status)
      const current = now()
      if (current - lastEmittedAt < intervalMs) {
        return
      }

      lastEmittedAt = current
      emit(lastProgress)
    }

    const run = async (): Promise<DownloadOutcome> => {
      dependencies.logger.info({ model }, "Model download started")
      try {
        const outcome = await dependencies.pullModel(model, {
          onStatus,
          isCancelled: () => cancelRequested,
        })

        if (cancelRequested || outcome === "cancelled") {
          return { state: "cancelled" }
        }

        return { state: "completed" }
      } catch (error) {
        if (cancelRequested) {
          return { state: "cancelled" }
        }

        return { state: "failed", error: toError(error) }
      }
    }

    const done = run().then((outcome) => {
      state = outcome.state
      active.delete(model)
      listeners.clear()

      if (outcome.state === "failed") {
        dependencies.logger.error(
          { model, error: outcome.error.message, durationMs: now() - startedAt },
          "Model download failed"
        )
      } else {
        dependencies.logger.info(
          { model, state: outcome.state, durationMs: now() - startedAt },
          "Model download finished"
        )
      }

      return outcome
    })

    const job: DownloadJob = {
      model,
      startedAt,
      done,
      cancel: () => {
        if (state !== "running" || cancelRequested) {
          return
        }

        cancelRequested = true
        dependencies.logger.info({ model }, "Model download cancellation requested")
      },
      isCancelRequested: () => cancelRequested,
      getState: () => state,
      getLastProgress: () => lastProgress,
      subscribe: (listener) => {
        listeners.add(listener)
        return () => {
          listeners.delete(listener)
        }
      },
    }

    active.set(model, job)
    return job
  }

  return {
    startPull,
    cancel: (model) => {
      const job = active.get(model.trim())
      if (!job) {
        return false
      }

      job.cancel()
      return true
    },
    getJob: (model) => active.get(model.trim()) ?? null,
    listActive: () => [...active.keys()].sort((left, right) => left.localeCompare(right)),
  }
}
