import path from "node:path"
import { appendFile, mkdir } from "node:fs/promises"
import { describeError } from "./errors.js"

const RECENT_LIMIT = 200

export type LogLevel = "info" | "warn" | "error"

export interface DispatchLoggerOptions {
    /** Append every line here as well; null keeps logging console-only. */
    filePath?: string | null
    /** Echo to the console (default true). */
    console?: boolean
    clock?: () => Date
}

export class DispatchLogger {
    private readonly filePath: string | null
    private readonly echo: boolean
    private readonly clock: () => Date
    private dirReady = false
    private fileFailureReported = false
    private pending: Promise<void> = Promise.resolve()
    /** Most recent lines, newest last. */
    readonly recent: string[] = []

    constructor(options: DispatchLoggerOptions = {}) {
        this.filePath = options.filePath ? path.resolve(options.filePath) : null
        this.echo = options.console ?? true
        this.clock = options.clock ?? (() => new Date())
    }

    info(message: string) {
        this.write("info", message)
    }

    warn(message: string) {
        this.write("warn", message)
    }

    error(message: string, error?: unknown) {
        this.write("error", error === undefined ? message : `${message}: ${describeError(error)}`)
    }

    /** Resolves once every queued file append has settled. */
    flush(): Promise<void> {
        return this.pending
    }

    private write(level: LogLevel, message: string) {
        const line = `[${this.clock().toISOString()}] [dispatcher] ${level === "info" ? "" : `${level.toUpperCase()} `}${message}`
        this.recent.push(line)
        if (this.recent.length > RECENT_LIMIT) this.recent.shift()

        if (this.echo) {
            if (level === "error") console.error(line)
            else if (level === "warn") console.warn(line)
            else console.log(line)
        }

        const filePath = this.filePath
        if (!filePath) return
        this.pending = this.pending
            .then(() => this.append(filePath, line))
            .catch((error: unknown) => this.reportFileFailure(filePath, error))
    }

    private async append(filePath: string, line: string) {
        if (!this.dirReady) {
            await mkdir(path.dirname(filePath), { recursive: true })
            this.dirReady = true
        }
        await appendFile(filePath, `${line}\n`)
    }

    private reportFileFailure(filePath: string, error: unknown) {
        if (this.fileFailureReported) return
        this.fileFailureReported = true
        console.warn(`[dispatcher] Failed to write ${filePath}: ${describeError(error)}`)
    }
}
