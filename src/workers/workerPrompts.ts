import type { Task } from "../taskTypes.js"
import { blockedMarker, completeMarker, publishMarker } from "./workerOutcome.js"

function section(title: string, body: string | null) {
    const text = body?.trim()
    return text ? [`${title}:`, text, ""] : []
}

export function describeTaskLine(task: Task) {
    return `- #${task.id} ${task.name} (priority ${task.priority})`
}

export function buildPayload(task: Task): string {
    return [
        `Task ID: ${task.id}`,
        `Task Name: ${task.name}`,
        `Project: ${task.project ?? "<none>"}`,
        `Phase: ${task.phase ?? "<none>"}`,
        "",
        ...section("Plan", task.implementationPlan),
        ...section("Notes", task.notes),
        ...section("Operator guidance", task.solution),
        "Update task notes with:",
        "- Files changed",
        "- Tests run (command + result)",
        "",
        "Return one of these markers in your final response:",
        `- ${completeMarker(task.id)}`,
        `- ${blockedMarker(task.id)}`,
    ].join("\n")
}

export function validationPayload(primary: Task, siblings: Task[]): string {
    const guidance = siblings
        .filter((task) => task.solution?.trim())
        .map((task) => `#${task.id}: ${task.solution?.trim()}`)
        .join("\n")

    return [
        `Primary Task ID: ${primary.id}`,
        `Project: ${primary.project ?? "<none>"}`,
        `Phase: ${primary.phase ?? "<none>"}`,
        "Tasks in phase:",
        ...siblings.map(describeTaskLine),
        "",
        ...section("Operator guidance", guidance),
        "Run E2E + data validation for this phase.",
        "If failures occur, create build tasks with repro steps and logs.",
        "Publish the validated changes and confirm the push.",
        "",
        "Return these markers in your final response:",
        `- ${completeMarker(primary.id)}`,
        `- ${publishMarker(primary.id)}`,
        "or, when validation fails:",
        `- ${blockedMarker(primary.id)}`,
    ].join("\n")
}
