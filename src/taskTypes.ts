export const TASK_STATUSES = [
    "TODO",
    "IN_PROGRESS",
    "READY_FOR_TESTING",
    "COMPLETE",
    "BLOCKED",
] as const
export type TaskStatus = (typeof TASK_STATUSES)[number]

/** States in which a task still counts as "not built yet" for phase gating. */
export const UNFINISHED_BUILD_STATUSES: readonly TaskStatus[] = ["TODO", "IN_PROGRESS", "BLOCKED"]

export const WORKER_ROLES = ["build", "validate"] as const
export type WorkerRole = (typeof WORKER_ROLES)[number]

export type QuestionStatus = "pending" | "answered" | "expired"

export interface Task {
    id: number
    name: string
    project: string | null
    phase: string | null
    priority: number
    implementationPlan: string | null
    notes: string | null
    /** Operator-supplied unblock guidance, appended on every unblock. */
    solution: string | null
    status: TaskStatus
    assignedRole: WorkerRole | null
    /** Serialized worker handle; set only while the task is IN_PROGRESS. */
    workerHandle: string | null
    attemptCount: number
    blockedReason: string | null
    errorLog: string | null
    createdAt: string
    startedAt: string | null
    completedAt: string | null
    updatedAt: string
}

export interface NewTask {
    name: string
    project?: string | null
    phase?: string | null
    priority?: number
    implementationPlan?: string | null
    notes?: string | null
}

export interface TaskHistoryEntry {
    id: number
    taskId: number
    project: string | null
    status: string
    notes: string | null
    errorLog: string | null
    changedAt: string
}

export interface BlockedReasonEntry {
    id: number
    taskId: number
    reason: string
    createdAt: string
}

export interface PendingQuestion {
    id: number
    agent: string
    taskId: number | null
    question: string
    answer: string | null
    status: QuestionStatus
    createdAt: string
    answeredAt: string | null
}

export type StatusCounts = Record<TaskStatus, number>

export interface HeartbeatSummary {
    lastRun: string
    counts: StatusCounts
}

export const DEFAULT_PRIORITY = 3

export function emptyStatusCounts(): StatusCounts {
    return { TODO: 0, IN_PROGRESS: 0, READY_FOR_TESTING: 0, COMPLETE: 0, BLOCKED: 0 }
}

const STATUS_ALIASES: Record<string, TaskStatus> = {
    todo: "TODO",
    in_progress: "IN_PROGRESS",
    inprogress: "IN_PROGRESS",
    ready_for_testing: "READY_FOR_TESTING",
    complete: "COMPLETE",
    blocked: "BLOCKED",
}

/** Legacy spellings accepted at the store boundary, keyed by their folded form. */
export const LEGACY_STATUS_KEYS = Object.keys(STATUS_ALIASES)

function foldStatus(raw: string): string {
    return raw.trim().toLowerCase().replace(/-/g, "_")
}

export function normalizeStatus(raw: string): TaskStatus | null {
    return STATUS_ALIASES[foldStatus(raw)] ?? null
}

const ROLE_ALIASES: Record<string, WorkerRole> = {
    build: "build",
    builder: "build",
    coder: "build",
    validate: "validate",
    validator: "validate",
    tester: "validate",
}

export const LEGACY_ROLE_KEYS = Object.keys(ROLE_ALIASES)

export function normalizeRole(raw: string | null): WorkerRole | null {
    if (raw === null) return null
    return ROLE_ALIASES[raw.trim().toLowerCase()] ?? null
}

export function isTaskStatus(value: string): value is TaskStatus {
    return TASK_STATUSES.some((status) => status === value)
}

/** Dispatch order: higher priority first, then older (lower id) first. */
export function compareDispatchOrder(a: Task, b: Task): number {
    if (a.priority !== b.priority) return b.priority - a.priority
    return a.id - b.id
}
