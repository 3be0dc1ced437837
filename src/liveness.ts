import { setTimeout as delay } from "node:timers/promises"
import type { Task } from "./taskTypes.js"
import type { WorkerHandle, WorkerLauncher, WorkerResult } from "./workers/workerHandle.js"

export type StaleCause = "abrupt stop" | "stale timeout"

export type LivenessVerdict =
    | { state: "running"; handle: WorkerHandle }
    | { state: "finished"; handle: WorkerHandle; result: WorkerResult }
    | { state: "stale"; handle: WorkerHandle | null; cause: StaleCause; detail: string }

export interface LivenessCheckerOptions {
    staleAfterMs: number
    /** Pause between the graceful and the forceful signal. */
    graceMs: number
    sleep?: (ms: number) => Promise<void>
}

export function staleReason(verdict: { cause: StaleCause; detail: string }) {
    return `${verdict.cause}: ${verdict.detail}`
}

export class LivenessChecker {
    private readonly staleAfterMs: number
    private readonly graceMs: number
    private readonly sleep: (ms: number) => Promise<void>

    constructor(options: LivenessCheckerOptions) {
        this.staleAfterMs = options.staleAfterMs
        this.graceMs = options.graceMs
        this.sleep = options.sleep ?? ((ms) => delay(ms))
    }

    /**
     * Classifies the worker recorded on an IN_PROGRESS task. A worker that
     * left finished output is never stale, whatever its age.
     */
    async inspect(task: Task, launcher: WorkerLauncher, now: Date): Promise<LivenessVerdict> {
        if (!task.workerHandle) {
            return { state: "stale", handle: null, cause: "abrupt stop", detail: "no worker handle recorded" }
        }
        const handle = launcher.attach(task.workerHandle)
        if (!handle) {
            return {
                state: "stale",
                handle: null,
                cause: "abrupt stop",
                detail: `unrecognised worker handle ${task.workerHandle}`,
            }
        }

        const result = await handle.collect()
        if (result) return { state: "finished", handle, result }

        if (!handle.isAlive()) {
            return { state: "stale", handle, cause: "abrupt stop", detail: "worker exited without a final response" }
        }

        const startedAt = Date.parse(task.startedAt ?? task.updatedAt)
        const elapsedMs = Number.isNaN(startedAt) ? 0 : now.getTime() - startedAt
        if (elapsedMs > this.staleAfterMs) {
            const stopped = await this.terminate(handle)
            const elapsed = Math.round(elapsedMs / 1000)
            const limit = Math.round(this.staleAfterMs / 1000)
            return {
                state: "stale",
                handle,
                cause: "stale timeout",
                detail: `running for ${elapsed}s (limit ${limit}s)${stopped ? "" : ", worker did not stop"}`,
            }
        }

        return { state: "running", handle }
    }

    /** SIGTERM-style stop, grace window, then a forceful one. Resolves true once the worker is gone. */
    async terminate(handle: WorkerHandle): Promise<boolean> {
        if (!handle.isAlive()) return true
        handle.terminate("graceful")
        await this.sleep(this.graceMs)
        if (!handle.isAlive()) return true
        handle.terminate("forceful")
        await this.sleep(Math.min(this.graceMs, 250))
        return !handle.isAlive()
    }
}
