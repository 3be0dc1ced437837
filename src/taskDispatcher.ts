import { setTimeout as delay } from "node:timers/promises"
import type { DispatcherConfig } from "./config.js"
import type { DispatchLogger } from "./dispatchLogger.js"
import type { TaskStore, TaskTransition } from "./db/taskStore.js"
import { describeError, DispatchAbortedError, isInfrastructureError, WorkerRequestError } from "./errors.js"
import { BLOCKED_DIGEST_STATE_KEY, saveHeartbeat, writeHeartbeatFile } from "./heartbeat.js"
import { LivenessChecker, staleReason, type LivenessVerdict } from "./liveness.js"
import { deliverSafely, type NotificationEvent, type Notifier } from "./notifier.js"
import { eligiblePhases, phaseLabel, type EligiblePhase } from "./phaseGate.js"
import { allocateSlots, countLiveWorkers } from "./slotAllocator.js"
import { blockedDigest, describeTaskContext, summarizeIncidents, tail } from "./taskContext.js"
import {
    compareDispatchOrder,
    type StatusCounts,
    type Task,
    type TaskStatus,
    type WorkerRole,
} from "./taskTypes.js"
import type { WorkerHandle, WorkerLauncher, WorkerLaunchRequest, WorkerResult } from "./workers/workerHandle.js"
import { NO_MARKER_REASON, parseWorkerOutcome, type WorkerOutcome } from "./workers/workerOutcome.js"
import { buildPayload, validationPayload } from "./workers/workerPrompts.js"

export const ATTEMPT_LIMIT_REASON = "attempt limit reached"
const BLOCKED_DIGEST_LIMIT = 10
const COMPLETION_POLL_MS = 250

export type DispatchSettings = Pick<
    DispatcherConfig,
    | "caps"
    | "maxAttempts"
    | "timeoutSeconds"
    | "agents"
    | "staleAfterSeconds"
    | "terminateGraceMs"
    | "completionWaitMs"
    | "retentionDays"
    | "blockedDigestIntervalSeconds"
    | "heartbeatFile"
>

export interface DispatcherOptions {
    settings: DispatchSettings
    store: TaskStore
    launcher: WorkerLauncher
    notifier: Notifier
    logger: DispatchLogger
    clock?: () => Date
    sleep?: (ms: number) => Promise<void>
}

export interface TransitionRecord {
    taskIds: number[]
    to: TaskStatus
    reason: string
}

export interface LaunchRecord {
    role: WorkerRole
    taskIds: number[]
    handle: string
}

export interface DispatchReport {
    startedAt: string
    normalized: number
    transitions: TransitionRecord[]
    launched: LaunchRecord[]
    purged: number
    notificationsSent: number
    counts: StatusCounts
}

export interface WatchOptions {
    intervalMs: number
    signal?: AbortSignal
    onPass?: (report: DispatchReport) => void
}

interface WorkerGroup {
    role: WorkerRole
    /** Carries attempts and incidents for the group; first in dispatch order. */
    primary: Task
    tasks: Task[]
    handleId: string | null
}

interface PassContext {
    now: Date
    iso: string
    report: DispatchReport
    notifications: NotificationEvent[]
    /** Handles verified live during reconciliation. */
    liveHandles: Set<string>
}

interface LaunchedWorker {
    role: WorkerRole
    handle: WorkerHandle
    taskIds: number[]
}

function groupByWorker(tasks: Task[]): WorkerGroup[] {
    const groups = new Map<string, WorkerGroup>()
    for (const task of [...tasks].sort(compareDispatchOrder)) {
        const key = task.workerHandle === null ? `task:${task.id}` : `handle:${task.workerHandle}`
        const group = groups.get(key)
        if (group) {
            group.tasks.push(task)
            continue
        }
        groups.set(key, { role: "build", primary: task, tasks: [task], handleId: task.workerHandle })
    }
    for (const group of groups.values()) {
        group.role = group.primary.assignedRole ?? (group.tasks.length > 1 ? "validate" : "build")
    }
    return [...groups.values()]
}

function ids(tasks: Task[]) {
    return tasks.map((task) => task.id)
}

function phaseOf(group: Pick<WorkerGroup, "primary">) {
    return phaseLabel({ project: group.primary.project, phase: group.primary.phase })
}

/**
 * Runs dispatch passes against the task store. A pass is synchronous in
 * effect: it reconciles every recorded worker before launching new ones, and
 * keeps no state between passes beyond what it writes to the store.
 */
export class Dispatcher {
    private readonly settings: DispatchSettings
    private readonly store: TaskStore
    private readonly launcher: WorkerLauncher
    private readonly notifier: Notifier
    private readonly logger: DispatchLogger
    private readonly clock: () => Date
    private readonly sleep: (ms: number) => Promise<void>
    private readonly liveness: LivenessChecker

    constructor(options: DispatcherOptions) {
        this.settings = options.settings
        this.store = options.store
        this.launcher = options.launcher
        this.notifier = options.notifier
        this.logger = options.logger
        this.clock = options.clock ?? (() => new Date())
        this.sleep = options.sleep ?? ((ms) => delay(ms))
        this.liveness = new LivenessChecker({
            staleAfterMs: this.settings.staleAfterSeconds * 1000,
            graceMs: this.settings.terminateGraceMs,
            sleep: this.sleep,
        })
    }

    async runPass(): Promise<DispatchReport> {
        const now = this.clock()
        const ctx: PassContext = {
            now,
            iso: now.toISOString(),
            report: {
                startedAt: now.toISOString(),
                normalized: 0,
                transitions: [],
                launched: [],
                purged: 0,
                notificationsSent: 0,
                counts: { TODO: 0, IN_PROGRESS: 0, READY_FOR_TESTING: 0, COMPLETE: 0, BLOCKED: 0 },
            },
            notifications: [],
            liveHandles: new Set(),
        }

        let step = "normalize"
        try {
            ctx.report.normalized = this.store.normalizeStatuses(ctx.iso)
            if (ctx.report.normalized > 0) {
                this.logger.info(`Normalized ${ctx.report.normalized} legacy status value(s)`)
            }

            step = "reconcile"
            await this.reconcile(ctx)

            step = "escalate"
            this.escalateExhausted(ctx)

            step = "launch build"
            const launched = await this.launchBuilds(ctx)

            step = "launch validation"
            launched.push(...(await this.launchValidations(ctx)))

            step = "collect"
            await this.collectLaunched(ctx, launched)
        } catch (error) {
            await this.flushNotifications(ctx)
            if (isInfrastructureError(error)) throw new DispatchAbortedError(step, error)
            throw error
        }

        await this.flushNotifications(ctx)

        try {
            await this.sweep(ctx)
        } catch (error) {
            if (isInfrastructureError(error)) throw new DispatchAbortedError("sweep", error)
            throw error
        }

        const { counts } = ctx.report
        this.logger.info(
            `Pass done: ${ctx.report.transitions.length} transition(s), ${ctx.report.launched.length} launch(es); ` +
                `todo=${counts.TODO} in_progress=${counts.IN_PROGRESS} ready=${counts.READY_FOR_TESTING} ` +
                `blocked=${counts.BLOCKED} complete=${counts.COMPLETE}`,
        )
        return ctx.report
    }

    /** Repeats passes until the signal fires; an aborted pass is logged and retried next interval. */
    async watch(options: WatchOptions): Promise<number> {
        let passes = 0
        while (!options.signal?.aborted) {
            try {
                options.onPass?.(await this.runPass())
            } catch (error) {
                if (!(error instanceof DispatchAbortedError)) throw error
                this.logger.error("Pass aborted, retrying next interval", error)
            }
            passes += 1
            if (options.signal?.aborted) break
            try {
                await delay(options.intervalMs, undefined, { signal: options.signal })
            } catch (error) {
                if (options.signal?.aborted) break
                throw error
            }
        }
        return passes
    }

    // step 2
    private async reconcile(ctx: PassContext) {
        const groups = groupByWorker(this.store.listTasks({ status: "IN_PROGRESS" }))
        for (const group of groups) {
            try {
                const verdict = await this.liveness.inspect(group.primary, this.launcher, ctx.now)
                this.settleVerdict(ctx, group, verdict)
            } catch (error) {
                if (isInfrastructureError(error)) throw error
                // the worker keeps its slot until a later pass can classify it
                if (group.handleId) ctx.liveHandles.add(group.handleId)
                this.logger.error(`Could not reconcile worker for task #${group.primary.id}`, error)
            }
        }
    }

    private settleVerdict(ctx: PassContext, group: WorkerGroup, verdict: LivenessVerdict) {
        switch (verdict.state) {
            case "running":
                ctx.liveHandles.add(verdict.handle.id)
                return
            case "finished":
                this.settleFinished(ctx, group, verdict.result)
                return
            case "stale":
                this.recoverStale(ctx, group, staleReason(verdict))
                return
        }
    }

    private settleFinished(ctx: PassContext, group: WorkerGroup, result: WorkerResult) {
        const outcome = parseWorkerOutcome(result.output, group.primary.id)
        if (group.role === "build") this.settleBuild(ctx, group, outcome, result)
        else this.settleValidation(ctx, group, outcome, result)
    }

    private settleBuild(ctx: PassContext, group: WorkerGroup, outcome: WorkerOutcome, result: WorkerResult) {
        const { primary } = group
        if (outcome.kind === "complete") {
            this.apply(
                ctx,
                {
                    taskIds: ids(group.tasks),
                    from: ["IN_PROGRESS"],
                    to: "READY_FOR_TESTING",
                    workerHandle: null,
                    role: null,
                    attempts: { taskId: primary.id, change: "reset" },
                    blockedReason: null,
                    errorLog: null,
                },
                "build finished",
            )
            this.queue(ctx, { kind: "ready", taskId: primary.id, taskName: primary.name, details: "Build finished" })
            return
        }

        const reason = outcome.kind === "blocked" ? `Task blocked: ${outcome.reason}` : NO_MARKER_REASON
        this.blockFailed(ctx, group, reason, result)
    }

    private settleValidation(ctx: PassContext, group: WorkerGroup, outcome: WorkerOutcome, result: WorkerResult) {
        const { primary } = group
        const label = phaseOf(group)

        if (outcome.kind === "complete" && outcome.published) {
            const { ref, shortId } = outcome.published
            this.apply(
                ctx,
                {
                    taskIds: ids(group.tasks),
                    from: ["IN_PROGRESS"],
                    to: "COMPLETE",
                    workerHandle: null,
                    role: null,
                    blockedReason: null,
                    errorLog: null,
                    completedAt: ctx.iso,
                },
                `phase ${label} validated, published ${ref} (${shortId})`,
            )
            for (const task of group.tasks) {
                this.queue(ctx, {
                    kind: "complete",
                    taskId: task.id,
                    taskName: task.name,
                    details: `Phase ${label} published ${ref} (${shortId})`,
                })
            }
            return
        }

        if (outcome.kind === "complete") {
            const warning = `Validation of phase ${label} reported success without a publish confirmation`
            this.logger.warn(`${warning}; phase returned to READY_FOR_TESTING`)
            this.apply(
                ctx,
                {
                    taskIds: ids(group.tasks),
                    from: ["IN_PROGRESS"],
                    to: "READY_FOR_TESTING",
                    workerHandle: null,
                    role: null,
                    incident: { taskId: primary.id, reason: warning },
                },
                "validation unpublished",
            )
            this.queue(ctx, {
                kind: "ready",
                taskId: primary.id,
                taskName: primary.name,
                details: `Warning: ${warning}. The phase stays ready for testing.`,
            })
            return
        }

        const reason = outcome.kind === "blocked" ? `Validation blocked: ${outcome.reason}` : NO_MARKER_REASON
        this.blockFailed(ctx, group, reason, result)
    }

    private blockFailed(ctx: PassContext, group: WorkerGroup, reason: string, result: WorkerResult) {
        const { primary } = group
        const exit = result.exitCode === null ? "" : ` (exit code ${result.exitCode})`
        const excerpt = tail(result.output)
        this.apply(
            ctx,
            {
                taskIds: ids(group.tasks),
                from: ["IN_PROGRESS"],
                to: "BLOCKED",
                workerHandle: null,
                blockedReason: reason,
                errorLog: excerpt || `worker produced no output${exit}`,
                incident: { taskId: primary.id, reason },
            },
            reason,
        )
        const scope = group.role === "validate" ? `Phase ${phaseOf(group)}: ` : ""
        this.queue(ctx, {
            kind: "blocker",
            taskId: primary.id,
            taskName: primary.name,
            details: [`${scope}${reason}${exit}`, describeTaskContext(primary)].filter(Boolean).join("\n\n"),
            excerpt,
        })
    }

    private recoverStale(ctx: PassContext, group: WorkerGroup, reason: string) {
        const { primary, role } = group
        const attempts = primary.attemptCount + 1
        const cap = this.settings.maxAttempts[role]
        const exhausted = attempts >= cap
        const retryStatus: TaskStatus = role === "build" ? "TODO" : "READY_FOR_TESTING"

        const updated = this.apply(
            ctx,
            {
                taskIds: ids(group.tasks),
                from: ["IN_PROGRESS"],
                to: exhausted ? "BLOCKED" : retryStatus,
                workerHandle: null,
                role: exhausted ? role : null,
                attempts: { taskId: primary.id, change: "increment" },
                blockedReason: exhausted ? ATTEMPT_LIMIT_REASON : null,
                errorLog: reason,
                startedAt: exhausted ? undefined : null,
                incident: { taskId: primary.id, reason },
            },
            exhausted ? `${reason}; ${ATTEMPT_LIMIT_REASON}` : `${reason}; retry`,
        )

        if (exhausted) {
            this.queueEscalation(ctx, updated.find((task) => task.id === primary.id) ?? primary, role)
            return
        }
        this.queue(ctx, {
            kind: "reset",
            taskId: primary.id,
            taskName: primary.name,
            details: `${reason}\nReturned to ${retryStatus} (attempt ${attempts}/${cap}).`,
        })
    }

    // step 3
    private escalateExhausted(ctx: PassContext) {
        const buildCap = this.settings.maxAttempts.build
        for (const task of this.store.listTasks({ status: "TODO" })) {
            if (task.attemptCount < buildCap) continue
            const [updated] = this.apply(
                ctx,
                {
                    taskIds: [task.id],
                    from: ["TODO"],
                    to: "BLOCKED",
                    workerHandle: null,
                    role: "build",
                    blockedReason: ATTEMPT_LIMIT_REASON,
                },
                ATTEMPT_LIMIT_REASON,
            )
            this.queueEscalation(ctx, updated ?? task, "build")
        }

        const validateCap = this.settings.maxAttempts.validate
        for (const phase of eligiblePhases(this.store.listTasks())) {
            if (phase.primary.attemptCount < validateCap) continue
            this.apply(
                ctx,
                {
                    taskIds: ids(phase.ready),
                    from: ["READY_FOR_TESTING"],
                    to: "BLOCKED",
                    workerHandle: null,
                    role: "validate",
                    blockedReason: ATTEMPT_LIMIT_REASON,
                },
                `phase ${phaseLabel(phase)}: ${ATTEMPT_LIMIT_REASON}`,
            )
            this.queueEscalation(ctx, phase.primary, "validate")
        }
    }

    private queueEscalation(ctx: PassContext, task: Task, role: WorkerRole) {
        const cap = this.settings.maxAttempts[role]
        const incidents = summarizeIncidents(this.store.listBlockedReasons(task.id))
        this.queue(ctx, {
            kind: "blocker",
            taskId: task.id,
            taskName: task.name,
            details: [
                `${ATTEMPT_LIMIT_REASON} (${task.attemptCount}/${cap} ${role} attempts). Operator action required.`,
                incidents,
                describeTaskContext(task),
            ]
                .filter(Boolean)
                .join("\n\n"),
            excerpt: task.errorLog ?? undefined,
        })
    }

    // step 4
    private async launchBuilds(ctx: PassContext): Promise<LaunchedWorker[]> {
        const slots = this.freeSlots(ctx)
        const launched: LaunchedWorker[] = []
        for (const task of this.store.listTasks({ status: "TODO" })) {
            if (launched.length >= slots.build) break
            const attempt = task.attemptCount + 1
            const group: WorkerGroup = { role: "build", primary: task, tasks: [task], handleId: null }
            const handle = await this.tryLaunch(ctx, group, {
                role: "build",
                agent: this.settings.agents.build,
                taskIds: [task.id],
                primaryTaskId: task.id,
                payload: buildPayload(task),
                timeoutSeconds: this.settings.timeoutSeconds.build,
            })
            if (!handle) continue
            this.recordLaunch(ctx, handle, {
                taskIds: [task.id],
                from: ["TODO"],
                to: "IN_PROGRESS",
                workerHandle: handle.id,
                role: "build",
                attempts: { taskId: task.id, change: "increment" },
                startedAt: ctx.iso,
            })
            launched.push({ role: "build", handle, taskIds: [task.id] })
            this.queue(ctx, {
                kind: "started",
                taskId: task.id,
                taskName: task.name,
                details: `Agent ${this.settings.agents.build}, attempt ${attempt}/${this.settings.maxAttempts.build}`,
            })
        }
        return launched
    }

    // step 5
    private async launchValidations(ctx: PassContext): Promise<LaunchedWorker[]> {
        const slots = this.freeSlots(ctx)
        const launched: LaunchedWorker[] = []
        const phases: EligiblePhase[] = eligiblePhases(this.store.listTasks())

        for (const phase of phases) {
            if (launched.length >= slots.validate) break
            const { primary } = phase
            const taskIds = ids(phase.ready)
            const group: WorkerGroup = { role: "validate", primary, tasks: phase.ready, handleId: null }
            const handle = await this.tryLaunch(ctx, group, {
                role: "validate",
                agent: this.settings.agents.validate,
                taskIds,
                primaryTaskId: primary.id,
                payload: validationPayload(primary, phase.ready),
                timeoutSeconds: this.settings.timeoutSeconds.validate,
            })
            if (!handle) continue
            this.recordLaunch(ctx, handle, {
                taskIds,
                from: ["READY_FOR_TESTING"],
                to: "IN_PROGRESS",
                workerHandle: handle.id,
                role: "validate",
                attempts: { taskId: primary.id, change: "increment" },
                startedAt: ctx.iso,
            })
            launched.push({ role: "validate", handle, taskIds })
            this.queue(ctx, {
                kind: "started",
                taskId: primary.id,
                taskName: primary.name,
                details: `Validating phase ${phaseLabel(phase)} (${taskIds.length} task(s)), attempt ${
                    primary.attemptCount + 1
                }/${this.settings.maxAttempts.validate}`,
            })
        }
        return launched
    }

    /** Null when the request was rejected for this group alone; the group is blocked and dispatch goes on. */
    private async tryLaunch(
        ctx: PassContext,
        group: WorkerGroup,
        request: WorkerLaunchRequest,
    ): Promise<WorkerHandle | null> {
        try {
            return await this.launcher.launch(request)
        } catch (error) {
            if (!(error instanceof WorkerRequestError)) throw error
            this.rejectLaunch(ctx, group, error)
            return null
        }
    }

    private rejectLaunch(ctx: PassContext, group: WorkerGroup, error: WorkerRequestError) {
        const { primary, role } = group
        const reason = `Worker launch rejected: ${error.message}`
        this.logger.warn(`${role} launch for task #${primary.id} rejected: ${error.message}`)
        this.apply(
            ctx,
            {
                taskIds: ids(group.tasks),
                from: [role === "build" ? "TODO" : "READY_FOR_TESTING"],
                to: "BLOCKED",
                workerHandle: null,
                role,
                blockedReason: reason,
                incident: { taskId: primary.id, reason },
            },
            reason,
        )
        const scope = role === "validate" ? `Phase ${phaseOf(group)}: ` : ""
        this.queue(ctx, {
            kind: "blocker",
            taskId: primary.id,
            taskName: primary.name,
            details: `${scope}${reason}`,
        })
    }

    /** The worker is already running: if the store refuses it, stop it again before failing the pass. */
    private recordLaunch(ctx: PassContext, handle: WorkerHandle, transition: TaskTransition) {
        try {
            this.apply(ctx, transition, `${transition.role ?? "build"} worker started`)
        } catch (error) {
            try {
                handle.terminate("forceful")
            } catch (killError) {
                this.logger.error(`Could not stop orphaned worker ${handle.id}`, killError)
            }
            throw error
        }
        ctx.liveHandles.add(handle.id)
        ctx.report.launched.push({ role: transition.role ?? "build", taskIds: transition.taskIds, handle: handle.id })
    }

    private freeSlots(ctx: PassContext) {
        const live = countLiveWorkers(this.store.listTasks({ status: "IN_PROGRESS" }), (task) =>
            task.workerHandle === null ? false : ctx.liveHandles.has(task.workerHandle),
        )
        return allocateSlots(this.settings.caps, live)
    }

    // step 6
    private async collectLaunched(ctx: PassContext, launched: LaunchedWorker[]) {
        const wait = this.settings.completionWaitMs
        if (wait <= 0 || launched.length === 0) return

        let pending = launched
        let waited = 0
        while (pending.length > 0) {
            const still: LaunchedWorker[] = []
            for (const worker of pending) {
                try {
                    const result = await worker.handle.collect()
                    if (!result) {
                        still.push(worker)
                        continue
                    }
                    const tasks = this.store
                        .listTasks({ ids: worker.taskIds })
                        .filter((task) => task.status === "IN_PROGRESS" && task.workerHandle === worker.handle.id)
                    const [group] = groupByWorker(tasks)
                    if (group) this.settleFinished(ctx, { ...group, role: worker.role }, result)
                } catch (error) {
                    if (isInfrastructureError(error)) throw error
                    this.logger.error(`Could not collect worker ${worker.handle.id}`, error)
                }
            }
            pending = still
            if (pending.length === 0 || waited >= wait) break
            const step = Math.min(COMPLETION_POLL_MS, wait - waited)
            await this.sleep(step)
            waited += step
        }
    }

    // step 7
    private queue(ctx: PassContext, event: NotificationEvent) {
        ctx.notifications.push(event)
    }

    private async flushNotifications(ctx: PassContext) {
        const events = ctx.notifications.splice(0)
        for (const event of events) {
            if (await deliverSafely(this.notifier, event, this.logger)) ctx.report.notificationsSent += 1
        }
    }

    // step 8
    private async sweep(ctx: PassContext) {
        const cutoff = new Date(ctx.now.getTime() - this.settings.retentionDays * 86_400_000).toISOString()
        ctx.report.purged = this.store.purgeCompleted(cutoff)
        if (ctx.report.purged > 0) {
            this.logger.info(`Purged ${ctx.report.purged} completed task(s) finished before ${cutoff}`)
        }

        const counts = this.store.countByStatus()
        ctx.report.counts = counts
        const summary = { lastRun: ctx.iso, counts }
        saveHeartbeat(this.store, summary)
        if (this.settings.heartbeatFile) {
            try {
                await writeHeartbeatFile(this.settings.heartbeatFile, summary)
            } catch (error) {
                this.logger.warn(`Failed to write heartbeat file: ${describeError(error)}`)
            }
        }

        if (counts.BLOCKED > 0) {
            this.logger.warn(`${counts.BLOCKED} task(s) are blocked and need attention`)
            await this.sendBlockedDigest(ctx, counts.BLOCKED)
        }
    }

    private async sendBlockedDigest(ctx: PassContext, total: number) {
        const last = this.store.readState(BLOCKED_DIGEST_STATE_KEY)
        const lastAt = last === null ? Number.NaN : Date.parse(last)
        const intervalMs = this.settings.blockedDigestIntervalSeconds * 1000
        if (!Number.isNaN(lastAt) && ctx.now.getTime() - lastAt < intervalMs) return

        const blocked = this.store.listTasks({ status: "BLOCKED" }).slice(0, BLOCKED_DIGEST_LIMIT)
        const delivered = await deliverSafely(
            this.notifier,
            { kind: "blocked-summary", taskId: null, taskName: "Blocked Tasks", details: blockedDigest(blocked, total) },
            this.logger,
        )
        if (!delivered) return
        ctx.report.notificationsSent += 1
        this.store.writeState(BLOCKED_DIGEST_STATE_KEY, ctx.iso, ctx.iso)
    }

    private apply(ctx: PassContext, transition: TaskTransition, reason: string): Task[] {
        const updated = this.store.applyTransition(transition, ctx.iso)
        ctx.report.transitions.push({ taskIds: transition.taskIds, to: transition.to, reason })
        const subject = transition.taskIds.map((id) => `#${id}`).join(", ")
        this.logger.info(`Task ${subject} -> ${transition.to} (${reason})`)
        return updated
    }
}
