#!/usr/bin/env node
import { readFile } from "node:fs/promises"
import { CliUsageError, parseCliArgs, USAGE, type ParsedCli } from "./cliArgs.js"
import { resolveConfig } from "./config.js"
import { ConfigError, describeError, DispatchAbortedError, OperatorError } from "./errors.js"
import { loadEnv } from "./loadEnv.js"
import { startOperatorServer } from "./operatorServer.js"
import { createRuntime, type Runtime } from "./runtime.js"
import type { Task } from "./taskTypes.js"

function usage(error?: string) {
    console.error([error ? `Error: ${error}` : null, USAGE].filter(Boolean).join("\n"))
}

async function readInput(file?: string): Promise<string> {
    if (file) return readFile(file, "utf8")
    const chunks: Buffer[] = []
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    }
    return Buffer.concat(chunks).toString("utf8")
}

function formatTask(task: Task) {
    const group = task.project || task.phase ? ` (${task.project ?? "-"} / ${task.phase ?? "-"})` : ""
    const reason = task.blockedReason ? `\n    ${task.blockedReason}` : ""
    return `#${task.id} [${task.status}] ${task.name}${group}, attempts ${task.attemptCount}${reason}`
}

function untilSignal(): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController()
    const stop = () => controller.abort()
    process.once("SIGINT", stop)
    process.once("SIGTERM", stop)
    return {
        signal: controller.signal,
        dispose: () => {
            process.off("SIGINT", stop)
            process.off("SIGTERM", stop)
        },
    }
}

async function runCommand(cli: ParsedCli, runtime: Runtime): Promise<number> {
    const { dispatcher, operator, config } = runtime

    switch (cli.command) {
        case "help":
            console.log(USAGE)
            return 0

        case "dispatch":
            await dispatcher.runPass()
            return 0

        case "watch": {
            const { signal, dispose } = untilSignal()
            const intervalSeconds = cli.intervalSeconds ?? config.dispatchIntervalSeconds
            runtime.logger.info(`Watching every ${intervalSeconds}s`)
            try {
                await dispatcher.watch({ intervalMs: intervalSeconds * 1000, signal })
            } finally {
                dispose()
            }
            return 0
        }

        case "add": {
            const raw = await readInput(cli.file)
            let input: unknown
            try {
                input = JSON.parse(raw)
            } catch (error) {
                throw new OperatorError("invalid", `Input is not valid JSON: ${describeError(error)}`)
            }
            for (const task of operator.addTasks(input)) console.log(formatTask(task))
            return 0
        }

        case "unblock": {
            const options = { status: cli.status, solution: cli.solution }
            const tasks =
                cli.target === "all"
                    ? await operator.unblockAll(options)
                    : [await operator.unblockTask(cli.target, options)]
            if (tasks.length === 0) console.log("No blocked tasks to unblock.")
            for (const task of tasks) console.log(formatTask(task))
            return 0
        }

        case "status": {
            const report = operator.status()
            if (cli.json) {
                console.log(JSON.stringify(report, null, 2))
                return 0
            }
            const { counts, heartbeat } = report
            console.log(`Last run: ${heartbeat?.lastRun ?? "never"}`)
            console.log(
                `todo=${counts.TODO} in_progress=${counts.IN_PROGRESS} ready=${counts.READY_FOR_TESTING} ` +
                    `blocked=${counts.BLOCKED} complete=${counts.COMPLETE}`,
            )
            console.log(`Pending questions: ${report.pendingQuestions}`)
            for (const task of report.blocked) console.log(formatTask(task))
            return 0
        }

        case "serve": {
            const server = await startOperatorServer({
                operator,
                logger: runtime.logger,
                port: cli.port ?? config.port,
            })
            const { signal, dispose } = untilSignal()
            await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }))
            dispose()
            await server.close()
            return 0
        }
    }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    let cli: ParsedCli
    try {
        cli = parseCliArgs(argv)
    } catch (error) {
        if (error instanceof CliUsageError || error instanceof OperatorError) {
            usage(error.message)
            return 2
        }
        throw error
    }
    if (cli.command === "help") {
        console.log(USAGE)
        return 0
    }

    loadEnv({ envFilePath: cli.globals.envFile })
    const env = cli.globals.dbPath ? { ...process.env, DISPATCHER_DB_PATH: cli.globals.dbPath } : process.env

    let runtime: Runtime
    try {
        runtime = createRuntime(resolveConfig(env))
    } catch (error) {
        console.error(`[dispatcher] ${describeError(error)}`)
        return error instanceof ConfigError ? 2 : 1
    }

    try {
        return await runCommand(cli, runtime)
    } catch (error) {
        if (error instanceof OperatorError) {
            console.error(`[dispatcher] ${error.message}`)
            return 1
        }
        if (error instanceof DispatchAbortedError) {
            runtime.logger.error("Pass aborted; the next invocation will retry", error.cause)
            return 1
        }
        throw error
    } finally {
        await runtime.close()
    }
}

main()
    .then((code) => {
        process.exitCode = code
    })
    .catch((error: unknown) => {
        console.error("[dispatcher] Failed:", error)
        process.exit(1)
    })
