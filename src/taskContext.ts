import type { BlockedReasonEntry, Task } from "./taskTypes.js"

const EXCERPT_LIMIT = 500

/** Plan, notes and operator guidance, as shown to the operator with a failure. */
export function describeTaskContext(task: Task): string {
    const parts: string[] = []
    if (task.project || task.phase) parts.push(`Phase: ${task.project ?? "-"} / ${task.phase ?? "-"}`)
    if (task.implementationPlan?.trim()) parts.push(`Plan: ${task.implementationPlan.trim()}`)
    if (task.notes?.trim()) parts.push(`Notes: ${task.notes.trim()}`)
    if (task.solution?.trim()) parts.push(`Solution: ${task.solution.trim()}`)
    return parts.join("\n")
}

export function summarizeIncidents(entries: BlockedReasonEntry[]): string {
    if (entries.length === 0) return "No earlier incidents recorded."
    const lines = entries.map((entry, idx) => `${idx + 1}. [${entry.createdAt}] ${entry.reason}`)
    return `Previous incidents (${entries.length}):\n${lines.join("\n")}`
}

export function blockedDigest(blocked: Task[], total: number): string {
    const entries = blocked.map((task) => `#${task.id} ${task.name}\n${task.blockedReason ?? ""}`.trimEnd())
    return `Blocked tasks: ${total}\n\n${entries.join("\n\n")}`
}

export function tail(text: string | null | undefined, limit = EXCERPT_LIMIT): string {
    const trimmed = text?.trim() ?? ""
    return trimmed.length <= limit ? trimmed : trimmed.slice(trimmed.length - limit)
}
