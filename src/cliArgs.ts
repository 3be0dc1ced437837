import type { UnblockTarget } from "./db/taskStore.js"
import { parseUnblockArgs } from "./operator.js"

export interface GlobalOptions {
    envFile?: string
    dbPath?: string
}

export type CliCommand =
    | { command: "dispatch" }
    | { command: "watch"; intervalSeconds?: number }
    | { command: "add"; file?: string }
    | { command: "unblock"; target: number | "all"; status: UnblockTarget; solution: string }
    | { command: "status"; json: boolean }
    | { command: "serve"; port?: number }
    | { command: "help" }

export type ParsedCli = CliCommand & { globals: GlobalOptions }

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "CliUsageError"
    }
}

export const USAGE = [
    "Usage:",
    "  task-dispatcher [--env <file>] [--db <path>] <command> [options]",
    "",
    "Commands:",
    "  dispatch                          Run one dispatch pass",
    "  watch [--interval <seconds>]      Run a pass every interval until interrupted",
    "  add [--file <path>]               Insert tasks from JSON ({ project, tasks: [...] }) on stdin or a file",
    "  unblock <id|all> [status] [solution...]",
    "                                    Requeue blocked tasks; status is todo (default) or ready",
    "  status [--json]                   Print task counts and blocked tasks",
    "  serve [--port <port>]             Start the operator HTTP API",
    "",
    "Example:",
    '  task-dispatcher unblock 12 "use cached endpoint"',
].join("\n")

function positiveInt(raw: string, label: string, allowZero = false): number {
    const value = Number(raw)
    if (!Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
        throw new CliUsageError(`${label} must be ${allowZero ? "a non-negative" : "a positive"} integer`)
    }
    return value
}

export function parseCliArgs(argv: string[]): ParsedCli {
    const globals: GlobalOptions = {}
    const rest: string[] = []
    const flags = new Map<string, string | true>()

    const takeValue = (arr: string[], idx: number, label: string): [string, number] => {
        const next = arr[idx + 1]
        if (next === undefined || next.startsWith("--")) {
            throw new CliUsageError(`Missing value for ${label}`)
        }
        return [next, idx + 1]
    }

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i]
        if (arg === undefined) continue

        if (arg === "--") {
            rest.push(...argv.slice(i + 1))
            break
        }

        const [name, inline] = arg.startsWith("--") ? arg.split(/=(.*)/s, 2) : [arg, undefined]
        if (name === "--env" || name === "--db" || name === "--file" || name === "--interval" || name === "--port") {
            let value = inline
            if (value === undefined) {
                const [next, nextIndex] = takeValue(argv, i, name)
                value = next
                i = nextIndex
            }
            if (name === "--env") globals.envFile = value
            else if (name === "--db") globals.dbPath = value
            else flags.set(name, value)
            continue
        }
        if (name === "--json") {
            flags.set(name, true)
            continue
        }
        if (name === "--help" || name === "-h") {
            return { command: "help", globals }
        }
        if (arg.startsWith("--")) {
            throw new CliUsageError(`Unknown option ${arg}`)
        }
        rest.push(arg)
    }

    const textFlag = (flag: string) => {
        const value = flags.get(flag)
        return typeof value === "string" ? value : undefined
    }

    const [command, ...args] = rest
    switch (command) {
        case undefined:
        case "help":
            return { command: "help", globals }
        case "dispatch":
            return { command: "dispatch", globals }
        case "watch": {
            const interval = textFlag("--interval")
            return {
                command: "watch",
                intervalSeconds: interval === undefined ? undefined : positiveInt(interval, "--interval"),
                globals,
            }
        }
        case "add":
            return { command: "add", file: textFlag("--file"), globals }
        case "unblock": {
            const [rawTarget, ...tokens] = args
            if (rawTarget === undefined) throw new CliUsageError("unblock needs a task id or 'all'")
            const target = rawTarget.toLowerCase() === "all" ? "all" : positiveInt(rawTarget, "task id")
            const { status, solution } = parseUnblockArgs(tokens)
            return { command: "unblock", target, status, solution, globals }
        }
        case "status":
            return { command: "status", json: flags.get("--json") === true, globals }
        case "serve": {
            const port = textFlag("--port")
            return { command: "serve", port: port === undefined ? undefined : positiveInt(port, "--port", true), globals }
        }
        default:
            throw new CliUsageError(`Unknown command ${command}`)
    }
}
