import type {
    BlockedReasonEntry,
    NewTask,
    PendingQuestion,
    QuestionStatus,
    StatusCounts,
    Task,
    TaskHistoryEntry,
    TaskStatus,
    WorkerRole,
} from "../taskTypes.js"

/**
 * One atomic change applied to a set of tasks that move together (a single
 * build task, or every sibling of a phase under validation).
 *
 * Optional fields left `undefined` keep their current column value.
 */
export interface TaskTransition {
    taskIds: number[]
    /** Guard: every task must currently be in one of these states. */
    from: readonly TaskStatus[]
    to: TaskStatus
    workerHandle: string | null
    role?: WorkerRole | null
    attempts?: { taskId: number; change: "increment" | "reset" }
    blockedReason?: string | null
    errorLog?: string | null
    startedAt?: string | null
    completedAt?: string | null
    /** Append a BlockedReason row for this task in the same transaction. */
    incident?: { taskId: number; reason: string }
}

export interface TaskFilter {
    status?: TaskStatus
    ids?: number[]
}

export type UnblockTarget = "TODO" | "READY_FOR_TESTING"

export interface UnblockRequest {
    taskIds: number[] | "all"
    to: UnblockTarget
    /** Appended to the task's existing solution text. */
    solution: string | null
    resetAttempts: boolean
}

export interface NewQuestion {
    agent: string
    taskId: number | null
    question: string
}

export interface TaskStore {
    insertTask(input: NewTask, now: string): Task
    getTask(id: number): Task | null
    /** Ordered by priority (desc) then id (asc). */
    listTasks(filter?: TaskFilter): Task[]
    /** Rewrite legacy status/role spellings to the canonical values. */
    normalizeStatuses(now: string): number
    applyTransition(transition: TaskTransition, now: string): Task[]
    /** Requeue BLOCKED tasks that have no worker attached. */
    unblockTasks(request: UnblockRequest, now: string): Task[]
    listBlockedReasons(taskId: number): BlockedReasonEntry[]
    listHistory(taskId: number): TaskHistoryEntry[]
    countByStatus(): StatusCounts
    /** Delete COMPLETE tasks finished before `before`, with their history and reasons. */
    purgeCompleted(before: string): number
    readState(key: string): string | null
    writeState(key: string, value: string, now: string): void
    insertQuestion(input: NewQuestion, now: string): PendingQuestion
    answerQuestion(id: number, answer: string, now: string): PendingQuestion | null
    listQuestions(status?: QuestionStatus): PendingQuestion[]
    expireQuestions(before: string): number
    close(): void
}
