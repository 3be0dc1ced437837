import { WORKER_ROLES, type Task, type WorkerRole } from "./taskTypes.js"

export function availableSlots(cap: number, liveWorkers: number): number {
    return Math.max(0, cap - liveWorkers)
}

/**
 * Live workers per role, counting each distinct handle once: a validation
 * worker attached to every task of a phase occupies one slot.
 */
export function countLiveWorkers(tasks: Task[], isLive: (task: Task) => boolean): Record<WorkerRole, number> {
    const handles: Record<WorkerRole, Set<string>> = { build: new Set(), validate: new Set() }
    for (const task of tasks) {
        if (task.status !== "IN_PROGRESS" || !task.workerHandle) continue
        if (!isLive(task)) continue
        handles[task.assignedRole ?? "build"].add(task.workerHandle)
    }
    return { build: handles.build.size, validate: handles.validate.size }
}

export function allocateSlots(
    caps: Record<WorkerRole, number>,
    live: Record<WorkerRole, number>,
): Record<WorkerRole, number> {
    const slots: Record<WorkerRole, number> = { build: 0, validate: 0 }
    for (const role of WORKER_ROLES) {
        slots[role] = availableSlots(caps[role], live[role])
    }
    return slots
}
