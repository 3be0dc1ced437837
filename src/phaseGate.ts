import { compareDispatchOrder, UNFINISHED_BUILD_STATUSES, type Task } from "./taskTypes.js"

export interface PhaseSummary {
    project: string | null
    phase: string | null
    /** Every task of the group, in dispatch order. */
    tasks: Task[]
    unfinishedBuilds: number
    /** READY_FOR_TESTING members, in dispatch order; the first one is the primary. */
    ready: Task[]
}

export interface EligiblePhase extends PhaseSummary {
    primary: Task
}

export function phaseLabel(summary: Pick<PhaseSummary, "project" | "phase">) {
    return `${summary.project ?? "<no project>"} / ${summary.phase ?? "<no phase>"}`
}

/** Groups tasks by (project, phase); a missing phase is its own group within the project. */
export function summarizePhases(tasks: Task[]): PhaseSummary[] {
    const groups = new Map<string, PhaseSummary>()
    for (const task of [...tasks].sort(compareDispatchOrder)) {
        const key = JSON.stringify([task.project, task.phase])
        let group = groups.get(key)
        if (!group) {
            group = { project: task.project, phase: task.phase, tasks: [], unfinishedBuilds: 0, ready: [] }
            groups.set(key, group)
        }
        group.tasks.push(task)
        if (UNFINISHED_BUILD_STATUSES.includes(task.status)) group.unfinishedBuilds += 1
        if (task.status === "READY_FOR_TESTING") group.ready.push(task)
    }
    return [...groups.values()]
}

/**
 * Phases that may be handed to validation, best primary first. Validation
 * never sees a group that still has a task in TODO, IN_PROGRESS or BLOCKED.
 */
export function eligiblePhases(tasks: Task[]): EligiblePhase[] {
    const eligible: EligiblePhase[] = []
    for (const summary of summarizePhases(tasks)) {
        const primary = summary.ready[0]
        if (summary.unfinishedBuilds === 0 && primary) eligible.push({ ...summary, primary })
    }
    return eligible.sort((a, b) => compareDispatchOrder(a.primary, b.primary))
}
