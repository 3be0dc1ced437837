import type { WorkerRole } from "../taskTypes.js"

export type TerminationMode = "graceful" | "forceful"

export interface WorkerLaunchRequest {
    role: WorkerRole
    /** Agent name handed to the worker command. */
    agent: string
    taskIds: number[]
    /** Task whose id appears in the markers (the phase primary for validation). */
    primaryTaskId: number
    payload: string
    timeoutSeconds: number
}

export interface WorkerResult {
    exitCode: number | null
    output: string
}

/**
 * Capability over one running worker. The dispatcher only ever sees this
 * interface, so a worker may be a local process, a container or a remote job.
 */
export interface WorkerHandle {
    /** Serialized form stored in the task row; `WorkerLauncher.attach` reverses it. */
    readonly id: string
    isAlive(): boolean
    terminate(mode: TerminationMode): void
    /** Final output once the worker has finished; null while running or if it died without finishing. */
    collect(): Promise<WorkerResult | null>
}

export interface WorkerLauncher {
    /**
     * Rejects with `WorkerRequestError` when this request can never start,
     * and with `WorkerLaunchError` when launching is broken for every task.
     */
    launch(request: WorkerLaunchRequest): Promise<WorkerHandle>
    /** Rebuild a handle from a stored id; null when the id is not recognised. */
    attach(handleId: string): WorkerHandle | null
}
