import path from "node:path"
import { mkdir, writeFile } from "node:fs/promises"
import { z } from "zod"
import type { TaskStore } from "./db/taskStore.js"
import type { HeartbeatSummary } from "./taskTypes.js"

export const HEARTBEAT_STATE_KEY = "heartbeat"
export const BLOCKED_DIGEST_STATE_KEY = "blocked_digest_at"

const HeartbeatSchema = z.object({
    lastRun: z.string(),
    counts: z.object({
        TODO: z.number().int(),
        IN_PROGRESS: z.number().int(),
        READY_FOR_TESTING: z.number().int(),
        COMPLETE: z.number().int(),
        BLOCKED: z.number().int(),
    }),
})

export function saveHeartbeat(store: TaskStore, summary: HeartbeatSummary) {
    store.writeState(HEARTBEAT_STATE_KEY, JSON.stringify(summary), summary.lastRun)
}

export function loadHeartbeat(store: TaskStore): HeartbeatSummary | null {
    const raw = store.readState(HEARTBEAT_STATE_KEY)
    if (raw === null) return null
    try {
        const parsed = HeartbeatSchema.safeParse(JSON.parse(raw))
        return parsed.success ? parsed.data : null
    } catch {
        return null
    }
}

export function renderHeartbeat(summary: HeartbeatSummary): string {
    const lastRun = `${summary.lastRun.slice(0, 19).replace("T", " ")} UTC`
    return [
        "# Task Dispatcher Heartbeat",
        "",
        `Last run: ${lastRun}`,
        "Status: Running",
        `Tasks in progress: ${summary.counts.IN_PROGRESS}`,
        `Tasks todo: ${summary.counts.TODO}`,
        `Tasks ready for testing: ${summary.counts.READY_FOR_TESTING}`,
        `Tasks complete: ${summary.counts.COMPLETE}`,
        `Tasks blocked: ${summary.counts.BLOCKED}`,
        "",
    ].join("\n")
}

export async function writeHeartbeatFile(filePath: string, summary: HeartbeatSummary) {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(filePath, renderHeartbeat(summary), "utf8")
}
