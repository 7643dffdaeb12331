import { describe, expect, it, vi } from "vitest"

import type { PullModelOptions, PullOutcome } from "../../src/backend/ollama-client.js"
import {
  createDownloadCoordinator,
  DownloadCoordinatorError,
  formatPullProgress,
  toPullProgress,
  type PullProgress,
} from "../../src/downloads/download-coordinator.js"

type PendingPull = {
  model: string
  options: PullModelOptions
  resolve: (outcome: PullOutcome) => void
  reject: (error: Error) => void
}

const createHarness = (progressIntervalMs = 2_000) => {
  let clock = 0
  const pending: PendingPull[] = []
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  const pullModel = vi.fn(
    (model: string, options: PullModelOptions): Promise<PullOutcome> =>
      new Promise<PullOutcome>((resolve, reject) => {
        pending.push({ model, options, resolve, reject })
      })
  )
  const coordinator = createDownloadCoordinator({
    logger,
    pullModel,
    progressIntervalMs,
    now: () => clock,
  })

  const pullAt = (index: number): PendingPull => {
    const pull = pending[index]
    if (!pull) {
      throw new Error(`No pull started at index ${index}`)
    }
    return pull
  }

  const sendStatus = (index: number, at: number, completed: number, total: number): void => {
    clock = at
    pullAt(index).options.onStatus?.({ status: "pulling layer", completed, total })
  }

  return {
    coordinator,
    logger,
    pullModel,
    pullAt,
    sendStatus,
    setClock: (value: number) => {
      clock = value
    },
  }
}

describe("createDownloadCoordinator", () => {
  it("emits progress at most once per interval", async () => {
    // Arrange
    const { coordinator, pullAt, sendStatus } = createHarness()
    const updates: PullProgress[] = []
    const job = coordinator.startPull("llama3", {
      onProgress: (progress) => updates.push(progress),
    })

    // Act
    sendStatus(0, 500, 100, 1_000)
    sendStatus(0, 2_500, 400, 1_000)
    sendStatus(0, 3_000, 500, 1_000)
    sendStatus(0, 4_600, 900, 1_000)
    pullAt(0).resolve("completed")
    const outcome = await job.done

    // Assert
    expect(updates.map((update) => update.percent)).toEqual([40, 90])
    expect(outcome).toEqual({ state: "completed" })
    expect(job.getState()).toBe("completed")
    expect(job.getLastProgress()).toEqual({
      phase: "pulling layer",
      bytesDone: 900,
      bytesTotal: 1_000,
      percent: 90,
    })
  })

  it("rejects a second pull of the same model until the first finishes", async () => {
    // Arrange
    const { coordinator, pullAt, pullModel } = createHarness()
    const first = coordinator.startPull(" llama3 ")

    // Act
    const duplicate = () => coordinator.startPull("llama3")

    // Assert
    expect(duplicate).toThrow(DownloadCoordinatorError)
    expect(duplicate).toThrow("A download of llama3 is already in progress")
    expect(coordinator.listActive()).toEqual(["llama3"])

    pullAt(0).resolve("completed")
    await first.done
    expect(coordinator.listActive()).toEqual([])
    coordinator.startPull("llama3")
    expect(pullModel).toHaveBeenCalledTimes(2)
  })

  it("rejects blank model names", () => {
    // Arrange
    const { coordinator } = createHarness()

    // Act / Assert
    try {
      coordinator.startPull("   ")
      expect.unreachable("blank model names must be rejected")
    } catch (error) {
      expect(error).toBeInstanceOf(DownloadCoordinatorError)
      expect(error).toMatchObject({ code: "invalid_model" })
    }
  })

  it("stops reporting after cancellation and ends as cancelled", async () => {
    // Arrange
    const { coordinator, logger, pullAt, sendStatus } = createHarness(0)
    const updates: PullProgress[] = []
    const job = coordinator.startPull("mistral", {
      onProgress: (progress) => updates.push(progress),
    })
    sendStatus(0, 10, 1, 4)

    // Act
    expect(coordinator.cancel("mistral")).toBe(true)
    sendStatus(0, 20, 2, 4)
    expect(pullAt(0).options.isCancelled?.()).toBe(true)
    pullAt(0).resolve("completed")
    const outcome = await job.done

    // Assert
    expect(updates).toHaveLength(1)
    expect(outcome).toEqual({ state: "cancelled" })
    expect(job.isCancelRequested()).toBe(true)
    expect(logger.info).toHaveBeenCalledWith(
      { model: "mistral" },
      "Model download cancellation requested"
    )
    expect(coordinator.cancel("mistral")).toBe(false)
  })

  it("treats a failure after cancellation as cancelled", async () => {
    // Arrange
    const { coordinator, logger, pullAt } = createHarness()
    const job = coordinator.startPull("phi3")

    // Act
    job.cancel()
    pullAt(0).reject(new Error("stream aborted"))
    const outcome = await job.done

    // Assert
    expect(outcome).toEqual({ state: "cancelled" })
    expect(logger.error).not.toHaveBeenCalled()
  })

  it("reports failures without rejecting the job", async () => {
    // Arrange
    const { coordinator, logger, pullAt, setClock } = createHarness()
    const job = coordinator.startPull("gemma3")
    const failure = new Error("pull model manifest: file does not exist")

    // Act
    setClock(1_500)
    pullAt(0).reject(failure)
    const outcome = await job.done

    // Assert
    expect(outcome).toEqual({ state: "failed", error: failure })
    expect(job.getState()).toBe("failed")
    expect(logger.error).toHaveBeenCalledWith(
      { model: "gemma3", error: failure.message, durationMs: 1_500 },
      "Model download failed"
    )
  })

  it("keeps reporting when a listener throws", async () => {
    // Arrange
    const { coordinator, logger, pullAt, sendStatus } = createHarness(0)
    const job = coordinator.startPull("llama3", {
      onProgress: () => {
        throw new Error("listener broke")
      },
    })
    const updates: PullProgress[] = []
    const unsubscribe = job.subscribe((progress) => updates.push(progress))

    // Act
    sendStatus(0, 1, 1, 2)
    unsubscribe()
    sendStatus(0, 2, 2, 2)
    pullAt(0).resolve("completed")
    await job.done

    // Assert
    expect(updates.map((update) => update.percent)).toEqual([50])
    expect(logger.warn).toHaveBeenCalledWith(
      { model: "llama3", error: "listener broke" },
      "Download progress listener failed"
    )
  })

  it("lists active downloads by name", () => {
    // Arrange
    const { coordinator } = createHarness()

    // Act
    coordinator.startPull("qwen2.5")
    coordinator.startPull("llava")

    // Assert
    expect(coordinator.listActive()).toEqual(["llava", "qwen2.5"])
    expect(coordinator.getJob("llava")?.model).toBe("llava")
    expect(coordinator.getJob("missing")).toBeNull()
  })
})

describe("toPullProgress", () => {
  it("computes a capped percentage only when byte counts are known", () => {
    expect(toPullProgress({ status: "pulling", completed: 50, total: 200 }).percent).toBe(25)
    expect(toPullProgress({ status: "pulling", completed: 300, total: 200 }).percent).toBe(100)
    expect(toPullProgress({ status: "verifying sha256 digest" })).toEqual({
      phase: "verifying sha256 digest",
      bytesDone: 0,
      bytesTotal: 0,
      percent: null,
    })
  })
})

describe("formatPullProgress", () => {
  it("renders a bar with megabytes", () => {
    // Arrange
    const progress = toPullProgress({
      status: "pulling",
      completed: 5 * 1024 * 1024,
      total: 10 * 1024 * 1024,
    })

    // Act / Assert
    expect(formatPullProgress(progress)).toBe("█████░░░░░ 50%  (5.0/10.0 MB)")
  })

  it("falls back to the phase name without byte counts", () => {
    expect(formatPullProgress(toPullProgress({ status: "writing manifest" }))).toBe(
      "writing manifest"
    )
    expect(formatPullProgress(toPullProgress({}))).toBe("…")
  })
})
