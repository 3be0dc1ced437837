import path from "node:path"
import { z } from "zod"
import { ConfigError } from "./errors.js"
import type { WorkerRole } from "./taskTypes.js"

export type UnblockAttemptsPolicy = "reset" | "preserve"

export interface TelegramSettings {
    token: string
    chatId: string
}

export interface DispatcherConfig {
    dbPath: string
    /** Directory receiving one output file per worker launch. */
    logDir: string
    logFile: string
    heartbeatFile: string | null
    caps: Record<WorkerRole, number>
    maxAttempts: Record<WorkerRole, number>
    timeoutSeconds: Record<WorkerRole, number>
    agents: Record<WorkerRole, string>
    staleAfterSeconds: number
    terminateGraceMs: number
    completionWaitMs: number
    retentionDays: number
    blockedDigestIntervalSeconds: number
    unblockAttempts: UnblockAttemptsPolicy
    /** Program and leading arguments used to start an execution agent. */
    workerCommand: string[]
    telegram: TelegramSettings | null
    port: number
    dispatchIntervalSeconds: number
}

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback)
const positive = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const EnvSchema = z
    .object({
        DISPATCHER_DB_PATH: z.string().default("tasks.db"),
        DISPATCHER_LOG_DIR: z.string().default("logs"),
        DISPATCHER_LOG_FILE: z.string().optional(),
        DISPATCHER_HEARTBEAT_FILE: z.string().optional(),
        MAX_PARALLEL_BUILD: count(3),
        MAX_PARALLEL_VALIDATE: count(1),
        MAX_BUILD_ATTEMPTS: positive(3),
        MAX_VALIDATE_ATTEMPTS: positive(2),
        BUILD_TIMEOUT_SEC: positive(3600),
        VALIDATE_TIMEOUT_SEC: positive(3600),
        STALE_SECONDS: positive(7200),
        TERMINATE_GRACE_MS: count(1000),
        COMPLETION_WAIT_MS: count(0),
        RETENTION_DAYS: positive(14),
        BLOCKED_DIGEST_INTERVAL_SEC: positive(21600),
        UNBLOCK_ATTEMPTS: z.enum(["reset", "preserve"]).default("reset"),
        WORKER_COMMAND: z.string().default("openclaw agent"),
        BUILD_AGENT: z.string().default("coder"),
        VALIDATE_AGENT: z.string().default("tester"),
        TELEGRAM_BOT_TOKEN: z.string().optional(),
        TELEGRAM_CHAT_ID: z.string().optional(),
        DISPATCHER_PORT: z.coerce.number().int().min(0).max(65535).default(4179),
        DISPATCH_INTERVAL_SEC: positive(60),
    })
    .superRefine((env, ctx) => {
        // a worker's own timeout has to fire before reconciliation calls it stale
        for (const key of ["BUILD_TIMEOUT_SEC", "VALIDATE_TIMEOUT_SEC"] as const) {
            if (env[key] > env.STALE_SECONDS) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [key],
                    message: `must be <= STALE_SECONDS (${env.STALE_SECONDS})`,
                })
            }
        }
        if (Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [env.TELEGRAM_BOT_TOKEN ? "TELEGRAM_CHAT_ID" : "TELEGRAM_BOT_TOKEN"],
                message: "TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together",
            })
        }
        if (splitCommand(env.WORKER_COMMAND).length === 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["WORKER_COMMAND"],
                message: "must name a program",
            })
        }
    })

const SCAFFOLD_PLACEHOLDERS = new Set(["your-telegram-bot-token-here", "your-chat-id-here"])

/** Blank values and scaffold placeholders count as unset. */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
    const values: Record<string, string> = {}
    for (const [key, value] of Object.entries(env)) {
        const trimmed = value?.trim()
        if (!trimmed || SCAFFOLD_PLACEHOLDERS.has(trimmed)) continue
        values[key] = trimmed
    }
    return values
}

export function splitCommand(command: string): string[] {
    return command.split(/\s+/).filter(Boolean)
}

export function resolveConfig(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd(),
): DispatcherConfig {
    const parsed = EnvSchema.safeParse(presentValues(env))
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
        )
    }

    const e = parsed.data
    const logDir = path.resolve(cwd, e.DISPATCHER_LOG_DIR)

    return {
        dbPath: e.DISPATCHER_DB_PATH === ":memory:" ? ":memory:" : path.resolve(cwd, e.DISPATCHER_DB_PATH),
        logDir,
        logFile: e.DISPATCHER_LOG_FILE
            ? path.resolve(cwd, e.DISPATCHER_LOG_FILE)
            : path.join(logDir, "dispatcher.log"),
        heartbeatFile: e.DISPATCHER_HEARTBEAT_FILE
            ? path.resolve(cwd, e.DISPATCHER_HEARTBEAT_FILE)
            : null,
        caps: { build: e.MAX_PARALLEL_BUILD, validate: e.MAX_PARALLEL_VALIDATE },
        maxAttempts: { build: e.MAX_BUILD_ATTEMPTS, validate: e.MAX_VALIDATE_ATTEMPTS },
        timeoutSeconds: { build: e.BUILD_TIMEOUT_SEC, validate: e.VALIDATE_TIMEOUT_SEC },
        agents: { build: e.BUILD_AGENT, validate: e.VALIDATE_AGENT },
        staleAfterSeconds: e.STALE_SECONDS,
        terminateGraceMs: e.TERMINATE_GRACE_MS,
        completionWaitMs: e.COMPLETION_WAIT_MS,
        retentionDays: e.RETENTION_DAYS,
        blockedDigestIntervalSeconds: e.BLOCKED_DIGEST_INTERVAL_SEC,
        unblockAttempts: e.UNBLOCK_ATTEMPTS,
        workerCommand: splitCommand(e.WORKER_COMMAND),
        telegram:
            e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
                ? { token: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID }
                : null,
        port: e.DISPATCHER_PORT,
        dispatchIntervalSeconds: e.DISPATCH_INTERVAL_SEC,
    }
}
