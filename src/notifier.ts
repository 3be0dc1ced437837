import { describeError } from "./errors.js"
import type { DispatchLogger } from "./dispatchLogger.js"

export const NOTIFICATION_KINDS = [
    "started",
    "ready",
    "complete",
    "blocker",
    "blocked-summary",
    "reset",
    "question",
] as const
export type NotificationKind = (typeof NOTIFICATION_KINDS)[number]

export interface NotificationEvent {
    kind: NotificationKind
    /** Null for digests that are not about a single task. */
    taskId: number | null
    taskName: string
    details: string
    /** Tail of the worker output or error log, shown with blockers. */
    excerpt?: string
}

export interface Notifier {
    notify(event: NotificationEvent): Promise<void>
}

export class LogNotifier implements Notifier {
    constructor(private readonly logger: DispatchLogger) {}

    async notify(event: NotificationEvent) {
        const subject = event.taskId === null ? event.taskName : `#${event.taskId} ${event.taskName}`
        const details = event.details ? `: ${event.details.replace(/\n/g, " | ")}` : ""
        this.logger.info(`notify ${event.kind} ${subject}${details}`)
    }
}

/** Fans out to every notifier; fails (after trying all of them) if any one failed. */
export class MultiNotifier implements Notifier {
    constructor(private readonly notifiers: Notifier[]) {}

    async notify(event: NotificationEvent) {
        const results = await Promise.allSettled(this.notifiers.map((n) => n.notify(event)))
        const failures = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []))
        if (failures.length > 0) {
            throw new AggregateError(failures, `${failures.length} notifier(s) failed: ${failures.map(describeError).join("; ")}`)
        }
    }
}

/** Delivery never fails the caller; the failure is logged instead. */
export async function deliverSafely(
    notifier: Notifier,
    event: NotificationEvent,
    logger: DispatchLogger,
): Promise<boolean> {
    try {
        await notifier.notify(event)
        return true
    } catch (error) {
        logger.warn(`Notification ${event.kind} for ${event.taskId ?? event.taskName} not delivered: ${describeError(error)}`)
        return false
    }
}
