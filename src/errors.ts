export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export class ConfigError extends Error {
    readonly problems: string[]

    constructor(problems: string[]) {
        super(`Invalid dispatcher configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`)
        this.name = "ConfigError"
        this.problems = problems
    }
}

/**
 * Any failure talking to the task store. The dispatcher treats it as transient
 * infrastructure trouble: the pass is abandoned and the next invocation retries.
 */
export class StoreError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "StoreError"
    }
}

/** A guarded update matched fewer rows than expected (status drifted under us). */
export class TransitionConflictError extends StoreError {
    constructor(
        readonly taskIds: number[],
        readonly expected: readonly string[],
    ) {
        super(`Tasks ${taskIds.join(", ")} are no longer in ${expected.join("/")}`)
        this.name = "TransitionConflictError"
    }
}

export class WorkerLaunchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "WorkerLaunchError"
    }
}

/**
 * The launch request itself cannot be started (e.g. a payload too large for
 * one argument). Retrying the same task fails the same way, so the task is
 * blocked instead of aborting the pass.
 */
export class WorkerRequestError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "WorkerRequestError"
    }
}

export class DispatchAbortedError extends Error {
    constructor(readonly step: string, cause: unknown) {
        super(`Dispatch pass aborted during ${step}: ${describeError(cause)}`, { cause })
        this.name = "DispatchAbortedError"
    }
}

export function isInfrastructureError(error: unknown): error is StoreError | WorkerLaunchError {
    return error instanceof StoreError || error instanceof WorkerLaunchError
}

export type OperatorErrorCode = "invalid" | "not_found" | "conflict"

/** A rejected operator request; the API maps the code onto an HTTP status. */
export class OperatorError extends Error {
    constructor(
        readonly code: OperatorErrorCode,
        message: string,
    ) {
        super(message)
        this.name = "OperatorError"
    }
}
