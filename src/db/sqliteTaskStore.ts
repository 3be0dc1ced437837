import path from "node:path"
import { mkdirSync } from "node:fs"
import Database from "better-sqlite3"
import { z } from "zod"
import { describeError, StoreError, TransitionConflictError } from "../errors.js"
import {
    DEFAULT_PRIORITY,
    emptyStatusCounts,
    LEGACY_ROLE_KEYS,
    LEGACY_STATUS_KEYS,
    normalizeRole,
    normalizeStatus,
    type BlockedReasonEntry,
    type NewTask,
    type PendingQuestion,
    type QuestionStatus,
    type StatusCounts,
    type Task,
    type TaskHistoryEntry,
} from "../taskTypes.js"
import type {
    NewQuestion,
    TaskFilter,
    TaskStore,
    TaskTransition,
    UnblockRequest,
} from "./taskStore.js"

type SqlParams = Record<string, string | number | null>

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      project TEXT,
      phase TEXT,
      priority INTEGER NOT NULL DEFAULT ${DEFAULT_PRIORITY},
      implementation_plan TEXT,
      notes TEXT,
      solution TEXT,
      status TEXT NOT NULL DEFAULT 'TODO',
      assigned_role TEXT,
      worker_handle TEXT,
      attempt_count INTEGER NOT NULL DEFAULT 0,
      blocked_reason TEXT,
      error_log TEXT,
      created_at TEXT NOT NULL,
      started_at TEXT,
      completed_at TEXT,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority DESC);
    CREATE INDEX IF NOT EXISTS idx_tasks_role ON tasks(assigned_role);
    CREATE INDEX IF NOT EXISTS idx_tasks_worker ON tasks(worker_handle) WHERE worker_handle IS NOT NULL;
    CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project);

    CREATE TABLE IF NOT EXISTS task_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
      project TEXT,
      status TEXT NOT NULL,
      notes TEXT,
      error_log TEXT,
      changed_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_task_history_task ON task_history(task_id, changed_at);

    CREATE TRIGGER IF NOT EXISTS tasks_history_insert AFTER INSERT ON tasks
    BEGIN
      INSERT INTO task_history (task_id, project, status, notes, error_log, changed_at)
      VALUES (NEW.id, NEW.project, NEW.status, NEW.notes, NEW.error_log, NEW.updated_at);
    END;

    CREATE TRIGGER IF NOT EXISTS tasks_history_update AFTER UPDATE ON tasks
    FOR EACH ROW
    WHEN OLD.status IS NOT NEW.status OR OLD.notes IS NOT NEW.notes OR OLD.error_log IS NOT NEW.error_log
    BEGIN
      INSERT INTO task_history (task_id, project, status, notes, error_log, changed_at)
      VALUES (NEW.id, NEW.project, NEW.status, NEW.notes, NEW.error_log, NEW.updated_at);
    END;

    CREATE TABLE IF NOT EXISTS blocked_reasons (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
      reason TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_blocked_reasons_task ON blocked_reasons(task_id, created_at);

    CREATE TABLE IF NOT EXISTS pending_questions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      agent TEXT NOT NULL,
      task_id INTEGER REFERENCES tasks(id) ON DELETE SET NULL,
      question TEXT NOT NULL,
      answer TEXT,
      status TEXT NOT NULL DEFAULT 'pending',
      created_at TEXT NOT NULL,
      answered_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_pending_questions_status ON pending_questions(status);

    CREATE TABLE IF NOT EXISTS dispatcher_state (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
`

const TaskRowSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    project: z.string().nullable(),
    phase: z.string().nullable(),
    priority: z.number().int(),
    implementation_plan: z.string().nullable(),
    notes: z.string().nullable(),
    solution: z.string().nullable(),
    status: z.string(),
    assigned_role: z.string().nullable(),
    worker_handle: z.string().nullable(),
    attempt_count: z.number().int(),
    blocked_reason: z.string().nullable(),
    error_log: z.string().nullable(),
    created_at: z.string(),
    started_at: z.string().nullable(),
    completed_at: z.string().nullable(),
    updated_at: z.string(),
})

const HistoryRowSchema = z.object({
    id: z.number().int(),
    task_id: z.number().int(),
    project: z.string().nullable(),
    status: z.string(),
    notes: z.string().nullable(),
    error_log: z.string().nullable(),
    changed_at: z.string(),
})

const ReasonRowSchema = z.object({
    id: z.number().int(),
    task_id: z.number().int(),
    reason: z.string(),
    created_at: z.string(),
})

const QuestionRowSchema = z.object({
    id: z.number().int(),
    agent: z.string(),
    task_id: z.number().int().nullable(),
    question: z.string(),
    answer: z.string().nullable(),
    status: z.enum(["pending", "answered", "expired"]),
    created_at: z.string(),
    answered_at: z.string().nullable(),
})

const CountRowSchema = z.object({ status: z.string(), count: z.number().int() })
const IdRowSchema = z.object({ id: z.number().int() })
const StateRowSchema = z.object({ value: z.string() })

const CANONICAL_STATUS_SQL = "('TODO','IN_PROGRESS','READY_FOR_TESTING','COMPLETE','BLOCKED')"
const FOLDED_STATUS_SQL = "LOWER(REPLACE(TRIM(status), '-', '_'))"

function sqlList(values: readonly string[]): string {
    return `(${values.map((v) => `'${v.replace(/'/g, "''")}'`).join(",")})`
}

function bindList(prefix: string, values: readonly (string | number)[], params: SqlParams): string {
    values.forEach((value, idx) => {
        params[`${prefix}${idx}`] = value
    })
    return `(${values.map((_, idx) => `@${prefix}${idx}`).join(", ")})`
}

export interface SqliteTaskStoreOptions {
    /** Called for rows that cannot be mapped onto the task model. */
    onWarning?: (message: string) => void
}

export class SqliteTaskStore implements TaskStore {
    private readonly warn: (message: string) => void

    static open(dbPath: string, options: SqliteTaskStoreOptions = {}): SqliteTaskStore {
        let db: Database.Database
        try {
            if (dbPath !== ":memory:") mkdirSync(path.dirname(dbPath), { recursive: true })
            db = new Database(dbPath)
        } catch (error) {
            throw new StoreError(`cannot open task store at ${dbPath}: ${describeError(error)}`, {
                cause: error,
            })
        }
        return new SqliteTaskStore(db, options)
    }

    constructor(
        private readonly db: Database.Database,
        options: SqliteTaskStoreOptions = {},
    ) {
        this.warn = options.onWarning ?? ((message) => console.warn(`[store] ${message}`))
        this.run("migrate", () => {
            db.pragma("journal_mode = WAL")
            db.pragma("foreign_keys = ON")
            db.pragma("busy_timeout = 5000")
            db.exec(SCHEMA)
        })
    }

    insertTask(input: NewTask, now: string): Task {
        return this.run("insertTask", () => {
            const info = this.db
                .prepare(
                    `INSERT INTO tasks (name, project, phase, priority, implementation_plan, notes, status, created_at, updated_at)
                     VALUES (@name, @project, @phase, @priority, @plan, @notes, 'TODO', @now, @now)`,
                )
                .run({
                    name: input.name,
                    project: input.project ?? null,
                    phase: input.phase ?? null,
                    priority: input.priority ?? DEFAULT_PRIORITY,
                    plan: input.implementationPlan ?? null,
                    notes: input.notes ?? null,
                    now,
                })
            const task = this.getTask(Number(info.lastInsertRowid))
            if (!task) throw new StoreError(`inserted task ${String(info.lastInsertRowid)} not readable`)
            return task
        })
    }

    getTask(id: number): Task | null {
        return this.listTasks({ ids: [id] })[0] ?? null
    }

    listTasks(filter: TaskFilter = {}): Task[] {
        return this.run("listTasks", () => {
            const clauses: string[] = []
            const params: SqlParams = {}
            if (filter.status) {
                clauses.push("status = @status")
                params.status = filter.status
            }
            if (filter.ids) {
                if (filter.ids.length === 0) return []
                clauses.push(`id IN ${bindList("id", filter.ids, params)}`)
            }
            const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : ""
            const rows = this.all(`SELECT * FROM tasks ${where} ORDER BY priority DESC, id ASC`, params)
            const tasks: Task[] = []
            for (const row of rows) {
                const task = this.toTask(TaskRowSchema.parse(row))
                if (task) tasks.push(task)
            }
            return tasks
        })
    }

    normalizeStatuses(now: string): number {
        return this.run("normalizeStatuses", () => {
            const apply = this.db.transaction(() => {
                const statuses = this.db
                    .prepare(
                        `UPDATE tasks
                         SET status = CASE ${FOLDED_STATUS_SQL}
                               WHEN 'todo' THEN 'TODO'
                               WHEN 'in_progress' THEN 'IN_PROGRESS'
                               WHEN 'inprogress' THEN 'IN_PROGRESS'
                               WHEN 'ready_for_testing' THEN 'READY_FOR_TESTING'
                               WHEN 'complete' THEN 'COMPLETE'
                               WHEN 'blocked' THEN 'BLOCKED'
                               ELSE status
                             END,
                             updated_at = @now
                         WHERE status NOT IN ${CANONICAL_STATUS_SQL}
                           AND ${FOLDED_STATUS_SQL} IN ${sqlList(LEGACY_STATUS_KEYS)}`,
                    )
                    .run({ now })
                const roles = this.db
                    .prepare(
                        `UPDATE tasks
                         SET assigned_role = CASE LOWER(TRIM(assigned_role))
                               WHEN 'coder' THEN 'build'
                               WHEN 'builder' THEN 'build'
                               WHEN 'build' THEN 'build'
                               ELSE 'validate'
                             END
                         WHERE assigned_role IS NOT NULL
                           AND assigned_role NOT IN ('build','validate')
                           AND LOWER(TRIM(assigned_role)) IN ${sqlList(LEGACY_ROLE_KEYS)}`,
                    )
                    .run()
                return statuses.changes + roles.changes
            })
            return apply()
        })
    }

    applyTransition(transition: TaskTransition, now: string): Task[] {
        return this.run("applyTransition", () => {
            const taskIds = [...new Set(transition.taskIds)]
            if (taskIds.length === 0) return []

            const params: SqlParams = { to: transition.to, workerHandle: transition.workerHandle, now }
            const sets = ["status = @to", "worker_handle = @workerHandle", "updated_at = @now"]
            const optional: Array<[string, string | null | undefined]> = [
                ["assigned_role", transition.role],
                ["blocked_reason", transition.blockedReason],
                ["error_log", transition.errorLog],
                ["started_at", transition.startedAt],
                ["completed_at", transition.completedAt],
            ]
            for (const [column, value] of optional) {
                if (value === undefined) continue
                sets.push(`${column} = @${column}`)
                params[column] = value
            }
            if (transition.attempts) {
                const next = transition.attempts.change === "increment" ? "attempt_count + 1" : "0"
                sets.push(`attempt_count = CASE WHEN id = @attemptTaskId THEN ${next} ELSE attempt_count END`)
                params.attemptTaskId = transition.attempts.taskId
            }
            const fromSql = bindList("from", transition.from, params)

            const statement = this.db.prepare(
                `UPDATE tasks SET ${sets.join(", ")} WHERE id = @id AND status IN ${fromSql}`,
            )
            const apply = this.db.transaction(() => {
                let changed = 0
                for (const id of taskIds) {
                    changed += statement.run({ ...params, id }).changes
                }
                if (changed !== taskIds.length) {
                    throw new TransitionConflictError(taskIds, transition.from)
                }
                if (transition.incident) {
                    this.insertIncident(transition.incident.taskId, transition.incident.reason, now)
                }
            })
            apply()
            return this.listTasks({ ids: taskIds })
        })
    }

    unblockTasks(request: UnblockRequest, now: string): Task[] {
        return this.run("unblockTasks", () => {
            const candidates =
                request.taskIds === "all"
                    ? this.all(
                          "SELECT id FROM tasks WHERE status = 'BLOCKED' AND worker_handle IS NULL ORDER BY priority DESC, id ASC",
                      ).map((row) => IdRowSchema.parse(row).id)
                    : [...new Set(request.taskIds)]

            const statement = this.db.prepare(
                `UPDATE tasks
                 SET status = @to,
                     blocked_reason = NULL,
                     error_log = NULL,
                     assigned_role = NULL,
                     worker_handle = NULL,
                     started_at = NULL,
                     attempt_count = CASE WHEN @reset = 1 THEN 0 ELSE attempt_count END,
                     solution = CASE
                       WHEN @solution IS NULL THEN solution
                       WHEN solution IS NULL OR solution = '' THEN @solution
                       ELSE solution || char(10) || @solution
                     END,
                     updated_at = @now
                 WHERE id = @id AND status = 'BLOCKED' AND worker_handle IS NULL`,
            )
            const apply = this.db.transaction(() =>
                candidates.filter(
                    (id) =>
                        statement.run({
                            id,
                            to: request.to,
                            reset: request.resetAttempts ? 1 : 0,
                            solution: request.solution,
                            now,
                        }).changes === 1,
                ),
            )
            return this.listTasks({ ids: apply() })
        })
    }

    listBlockedReasons(taskId: number): BlockedReasonEntry[] {
        return this.run("listBlockedReasons", () =>
            this.all(
                "SELECT * FROM blocked_reasons WHERE task_id = @taskId ORDER BY created_at ASC, id ASC",
                { taskId },
            ).map((raw) => {
                const row = ReasonRowSchema.parse(raw)
                return { id: row.id, taskId: row.task_id, reason: row.reason, createdAt: row.created_at }
            }),
        )
    }

    listHistory(taskId: number): TaskHistoryEntry[] {
        return this.run("listHistory", () =>
            this.all("SELECT * FROM task_history WHERE task_id = @taskId ORDER BY id ASC", {
                taskId,
            }).map((raw) => {
                const row = HistoryRowSchema.parse(raw)
                return {
                    id: row.id,
                    taskId: row.task_id,
                    project: row.project,
                    status: row.status,
                    notes: row.notes,
                    errorLog: row.error_log,
                    changedAt: row.changed_at,
                }
            }),
        )
    }

    countByStatus(): StatusCounts {
        return this.run("countByStatus", () => {
            const counts = emptyStatusCounts()
            for (const raw of this.all("SELECT status, COUNT(*) AS count FROM tasks GROUP BY status")) {
                const row = CountRowSchema.parse(raw)
                const status = normalizeStatus(row.status)
                if (status) counts[status] += row.count
            }
            return counts
        })
    }

    purgeCompleted(before: string): number {
        return this.run("purgeCompleted", () =>
            this.db
                .prepare(
                    "DELETE FROM tasks WHERE status = 'COMPLETE' AND completed_at IS NOT NULL AND completed_at < @before",
                )
                .run({ before }).changes,
        )
    }

    readState(key: string): string | null {
        return this.run("readState", () => {
            const row = this.db.prepare("SELECT value FROM dispatcher_state WHERE key = @key").get({ key })
            return row === undefined ? null : StateRowSchema.parse(row).value
        })
    }

    writeState(key: string, value: string, now: string) {
        this.run("writeState", () => {
            this.db
                .prepare(
                    `INSERT INTO dispatcher_state (key, value, updated_at) VALUES (@key, @value, @now)
                     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
                )
                .run({ key, value, now })
        })
    }

    insertQuestion(input: NewQuestion, now: string): PendingQuestion {
        return this.run("insertQuestion", () => {
            const info = this.db
                .prepare(
                    `INSERT INTO pending_questions (agent, task_id, question, status, created_at)
                     VALUES (@agent, @taskId, @question, 'pending', @now)`,
                )
                .run({ agent: input.agent, taskId: input.taskId, question: input.question, now })
            const question = this.getQuestion(Number(info.lastInsertRowid))
            if (!question) throw new StoreError(`inserted question ${String(info.lastInsertRowid)} not readable`)
            return question
        })
    }

    answerQuestion(id: number, answer: string, now: string): PendingQuestion | null {
        return this.run("answerQuestion", () => {
            const info = this.db
                .prepare(
                    `UPDATE pending_questions SET answer = @answer, status = 'answered', answered_at = @now
                     WHERE id = @id AND status = 'pending'`,
                )
                .run({ id, answer, now })
            return info.changes === 1 ? this.getQuestion(id) : null
        })
    }

    listQuestions(status?: QuestionStatus): PendingQuestion[] {
        return this.run("listQuestions", () => {
            const rows = status
                ? this.all("SELECT * FROM pending_questions WHERE status = @status ORDER BY created_at ASC, id ASC", {
                      status,
                  })
                : this.all("SELECT * FROM pending_questions ORDER BY created_at ASC, id ASC")
            return rows.map((raw) => toQuestion(QuestionRowSchema.parse(raw)))
        })
    }

    expireQuestions(before: string): number {
        return this.run("expireQuestions", () =>
            this.db
                .prepare(
                    "UPDATE pending_questions SET status = 'expired' WHERE status = 'pending' AND created_at < @before",
                )
                .run({ before }).changes,
        )
    }

    close() {
        this.run("close", () => {
            this.db.close()
        })
    }

    private getQuestion(id: number): PendingQuestion | null {
        const row = this.db.prepare("SELECT * FROM pending_questions WHERE id = @id").get({ id })
        return row === undefined ? null : toQuestion(QuestionRowSchema.parse(row))
    }

    private insertIncident(taskId: number, reason: string, now: string) {
        this.db
            .prepare("INSERT INTO blocked_reasons (task_id, reason, created_at) VALUES (@taskId, @reason, @now)")
            .run({ taskId, reason, now })
    }

    private all(sql: string, params: SqlParams = {}): unknown[] {
        const statement = this.db.prepare(sql)
        return Object.keys(params).length > 0 ? statement.all(params) : statement.all()
    }

    private toTask(row: z.infer<typeof TaskRowSchema>): Task | null {
        const status = normalizeStatus(row.status)
        if (!status) {
            this.warn(`task ${row.id} has unknown status "${row.status}"; skipped`)
            return null
        }
        return {
            id: row.id,
            name: row.name,
            project: row.project,
            phase: row.phase,
            priority: row.priority,
            implementationPlan: row.implementation_plan,
            notes: row.notes,
            solution: row.solution,
            status,
            assignedRole: normalizeRole(row.assigned_role),
            workerHandle: row.worker_handle,
            attemptCount: row.attempt_count,
            blockedReason: row.blocked_reason,
            errorLog: row.error_log,
            createdAt: row.created_at,
            startedAt: row.started_at,
            completedAt: row.completed_at,
            updatedAt: row.updated_at,
        }
    }

    private run<T>(operation: string, fn: () => T): T {
        try {
            return fn()
        } catch (error) {
            if (error instanceof StoreError) throw error
            throw new StoreError(`${operation} failed: ${describeError(error)}`, { cause: error })
        }
    }
}

function toQuestion(row: z.infer<typeof QuestionRowSchema>): PendingQuestion {
    return {
        id: row.id,
        agent: row.agent,
        taskId: row.task_id,
        question: row.question,
        answer: row.answer,
        status: row.status,
        createdAt: row.created_at,
        answeredAt: row.answered_at,
    }
}
