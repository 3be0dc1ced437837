export interface PublishConfirmation {
    ref: string
    shortId: string
}

export type WorkerOutcome =
    | { kind: "complete"; published: PublishConfirmation | null }
    | { kind: "blocked"; reason: string }
    | { kind: "silent" }

export const NO_MARKER_REASON = "No completion marker found in agent response"

export function completeMarker(taskId: number) {
    return `TASK_COMPLETE:${taskId}`
}

export function blockedMarker(taskId: number, reason = "<reason>") {
    return `TASK_BLOCKED:${taskId}:${reason}`
}

export function publishMarker(taskId: number, ref = "<ref>", shortId = "<short_id>") {
    return `GIT_PUSHED:${taskId}:${ref}:${shortId}`
}

/**
 * Reads the plain-text markers a worker echoes for `taskId`. A completion
 * marker wins over a block marker; the last block or publish line counts.
 */
export function parseWorkerOutcome(output: string, taskId: number): WorkerOutcome {
    const complete = new RegExp(`TASK_COMPLETE:${taskId}(?![0-9])`)
    if (complete.test(output)) {
        return { kind: "complete", published: lastPublish(output, taskId) }
    }

    const blocked = [...output.matchAll(new RegExp(`TASK_BLOCKED:${taskId}:(.*)$`, "gm"))]
    const last = blocked.at(-1)
    if (last) {
        const reason = (last[1] ?? "").trim()
        return { kind: "blocked", reason: reason || "no reason given" }
    }

    return { kind: "silent" }
}

function lastPublish(output: string, taskId: number): PublishConfirmation | null {
    // angle brackets only appear in the payload's template line, never in a real ref
    const matches = [...output.matchAll(new RegExp(`GIT_PUSHED:${taskId}:([^\\s:<>]+):([^\\s:<>]+)`, "g"))]
    const last = matches.at(-1)
    if (!last) return null
    const [, ref, shortId] = last
    if (!ref || !shortId) return null
    return { ref, shortId }
}
