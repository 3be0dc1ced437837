import { z } from "zod"
import type { UnblockAttemptsPolicy } from "./config.js"
import type { DispatchLogger } from "./dispatchLogger.js"
import type { TaskStore, UnblockTarget } from "./db/taskStore.js"
import { OperatorError } from "./errors.js"
import { loadHeartbeat } from "./heartbeat.js"
import { deliverSafely, type Notifier } from "./notifier.js"
import { DEFAULT_PRIORITY } from "./taskTypes.js"
import type {
    BlockedReasonEntry,
    HeartbeatSummary,
    PendingQuestion,
    StatusCounts,
    Task,
    TaskHistoryEntry,
    TaskStatus,
} from "./taskTypes.js"

export const QUESTION_TTL_MS = 60 * 60 * 1000

const optionalText = z
    .string()
    .trim()
    .nullish()
    .transform((value) => value || null)

const AddTasksSchema = z.object({
    project: optionalText,
    tasks: z
        .array(
            z.object({
                name: z.string().trim().min(1, "name is required"),
                phase: optionalText,
                priority: z.coerce.number().int().default(DEFAULT_PRIORITY),
                plan: optionalText,
                notes: optionalText,
            }),
        )
        .min(1, "at least one task is required"),
})

export type AddTasksInput = z.input<typeof AddTasksSchema>

const QuestionSchema = z.object({
    agent: z.string().trim().min(1, "agent is required"),
    taskId: z.coerce.number().int().positive().nullish().transform((value) => value ?? null),
    question: z.string().trim().min(1, "question is required"),
})

export type QuestionInput = z.input<typeof QuestionSchema>

export interface UnblockOptions {
    status?: UnblockTarget
    solution?: string | null
}

export interface TaskDetail {
    task: Task
    history: TaskHistoryEntry[]
    blockedReasons: BlockedReasonEntry[]
}

export interface StatusReport {
    counts: StatusCounts
    heartbeat: HeartbeatSummary | null
    blocked: Task[]
    pendingQuestions: number
}

const UNBLOCK_ALIASES: Record<string, UnblockTarget> = {
    todo: "TODO",
    ready: "READY_FOR_TESTING",
    ready_for_testing: "READY_FOR_TESTING",
    "ready-for-testing": "READY_FOR_TESTING",
}

const RUNNING_ALIASES = new Set(["in_progress", "in-progress", "inprogress"])

export function parseUnblockTarget(raw: string): UnblockTarget | null {
    return UNBLOCK_ALIASES[raw.trim().toLowerCase()] ?? null
}

/**
 * `[status] [solution words…]`, where status may also be spelled
 * "ready for testing". Anything else starts the solution text.
 */
export function parseUnblockArgs(tokens: string[]): { status: UnblockTarget; solution: string } {
    const words = tokens.filter(Boolean)
    if (words.slice(0, 3).join(" ").toLowerCase() === "ready for testing") {
        return { status: "READY_FOR_TESTING", solution: words.slice(3).join(" ").trim() }
    }
    const [first, ...rest] = words
    if (first === undefined) return { status: "TODO", solution: "" }
    if (RUNNING_ALIASES.has(first.toLowerCase())) {
        throw new OperatorError("invalid", "A task cannot be unblocked straight into IN_PROGRESS")
    }
    const status = parseUnblockTarget(first)
    if (status) return { status, solution: rest.join(" ").trim() }
    return { status: "TODO", solution: words.join(" ").trim() }
}

function describeIssues(error: z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ")
}

export interface OperatorServiceOptions {
    store: TaskStore
    notifier: Notifier
    logger: DispatchLogger
    unblockAttempts: UnblockAttemptsPolicy
    clock?: () => Date
}

/** Operator-side actions: the only writers to the store besides the dispatcher. */
export class OperatorService {
    private readonly store: TaskStore
    private readonly notifier: Notifier
    private readonly logger: DispatchLogger
    private readonly unblockAttempts: UnblockAttemptsPolicy
    private readonly clock: () => Date

    constructor(options: OperatorServiceOptions) {
        this.store = options.store
        this.notifier = options.notifier
        this.logger = options.logger
        this.unblockAttempts = options.unblockAttempts
        this.clock = options.clock ?? (() => new Date())
    }

    addTasks(input: unknown): Task[] {
        const parsed = AddTasksSchema.safeParse(input)
        if (!parsed.success) throw new OperatorError("invalid", describeIssues(parsed.error))

        const now = this.clock().toISOString()
        const { project, tasks } = parsed.data
        const created = tasks.map((task) =>
            this.store.insertTask(
                {
                    name: task.name,
                    project,
                    phase: task.phase,
                    priority: task.priority,
                    implementationPlan: task.plan,
                    notes: task.notes,
                },
                now,
            ),
        )
        this.logger.info(`Added ${created.length} task(s)${project ? ` to ${project}` : ""}`)
        return created
    }

    listTasks(status?: TaskStatus): Task[] {
        return this.store.listTasks(status ? { status } : {})
    }

    getTaskDetail(id: number): TaskDetail {
        const task = this.store.getTask(id)
        if (!task) throw new OperatorError("not_found", `Task #${id} not found`)
        return { task, history: this.store.listHistory(id), blockedReasons: this.store.listBlockedReasons(id) }
    }

    async unblockTask(id: number, options: UnblockOptions = {}): Promise<Task> {
        const task = this.store.getTask(id)
        if (!task) throw new OperatorError("not_found", `Task #${id} not found`)
        if (task.status !== "BLOCKED") {
            throw new OperatorError("conflict", `Task #${id} is ${task.status}, not BLOCKED`)
        }
        if (task.workerHandle) {
            throw new OperatorError("conflict", `Task #${id} is still attached to worker ${task.workerHandle}`)
        }

        const [updated] = await this.unblock([id], options)
        if (!updated) throw new OperatorError("conflict", `Task #${id} changed while unblocking`)
        return updated
    }

    async unblockAll(options: UnblockOptions = {}): Promise<Task[]> {
        return this.unblock("all", options)
    }

    async raiseQuestion(input: QuestionInput): Promise<PendingQuestion> {
        const parsed = QuestionSchema.safeParse(input)
        if (!parsed.success) throw new OperatorError("invalid", describeIssues(parsed.error))

        const { agent, taskId, question } = parsed.data
        if (taskId !== null && !this.store.getTask(taskId)) {
            throw new OperatorError("not_found", `Task #${taskId} not found`)
        }
        const created = this.store.insertQuestion({ agent, taskId, question }, this.clock().toISOString())
        await deliverSafely(
            this.notifier,
            { kind: "question", taskId, taskName: agent, details: `${question}\n\nQuestion #${created.id}` },
            this.logger,
        )
        return created
    }

    answerQuestion(id: number, answer: string): PendingQuestion {
        const text = answer.trim()
        if (!text) throw new OperatorError("invalid", "answer is required")
        this.expireQuestions()
        const answered = this.store.answerQuestion(id, text, this.clock().toISOString())
        if (answered) return answered
        const exists = this.store.listQuestions().some((question) => question.id === id)
        throw exists
            ? new OperatorError("conflict", `Question #${id} is no longer pending`)
            : new OperatorError("not_found", `Question #${id} not found`)
    }

    /** Pending questions, after expiring those left unanswered past the time box. */
    listPendingQuestions(): PendingQuestion[] {
        this.expireQuestions()
        return this.store.listQuestions("pending")
    }

    status(): StatusReport {
        return {
            counts: this.store.countByStatus(),
            heartbeat: loadHeartbeat(this.store),
            blocked: this.store.listTasks({ status: "BLOCKED" }),
            pendingQuestions: this.listPendingQuestions().length,
        }
    }

    private expireQuestions() {
        const cutoff = new Date(this.clock().getTime() - QUESTION_TTL_MS).toISOString()
        const expired = this.store.expireQuestions(cutoff)
        if (expired > 0) this.logger.info(`Expired ${expired} unanswered question(s)`)
    }

    private async unblock(taskIds: number[] | "all", options: UnblockOptions): Promise<Task[]> {
        const to = options.status ?? "TODO"
        const solution = options.solution?.trim() || null
        const updated = this.store.unblockTasks(
            { taskIds, to, solution, resetAttempts: this.unblockAttempts === "reset" },
            this.clock().toISOString(),
        )
        for (const task of updated) {
            this.logger.info(`Task #${task.id} unblocked -> ${to}${solution ? ` with solution: ${solution}` : ""}`)
            await deliverSafely(
                this.notifier,
                {
                    kind: "reset",
                    taskId: task.id,
                    taskName: task.name,
                    details: `Unblocked by operator, now ${to}.${solution ? `\nSolution: ${solution}` : ""}`,
                },
                this.logger,
            )
        }
        return updated
    }
}
