import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express"
import type { Server } from "node:http"
import { WebSocketServer } from "ws"
import { z } from "zod"
import type { DispatchLogger } from "./dispatchLogger.js"
import { describeError, OperatorError, StoreError } from "./errors.js"
import { parseUnblockTarget, type OperatorService, type UnblockOptions } from "./operator.js"
import { normalizeStatus } from "./taskTypes.js"

const UnblockBodySchema = z.object({
    status: z.string().optional(),
    solution: z.string().optional(),
})

const AnswerBodySchema = z.object({ answer: z.string() })

const HTTP_STATUS: Record<OperatorError["code"], number> = {
    invalid: 400,
    not_found: 404,
    conflict: 409,
}

function parseId(raw: string | undefined): number {
    const id = Number(raw)
    if (!Number.isInteger(id) || id <= 0) throw new OperatorError("invalid", `Invalid id: ${raw ?? ""}`)
    return id
}

function parseUnblockBody(body: unknown): UnblockOptions {
    const parsed = UnblockBodySchema.safeParse(body ?? {})
    if (!parsed.success) throw new OperatorError("invalid", "Expected { status?, solution? }")
    const { status, solution } = parsed.data
    if (status === undefined) return { solution }
    const target = parseUnblockTarget(status)
    if (!target) throw new OperatorError("invalid", `Cannot unblock into status "${status}"`)
    return { status: target, solution }
}

// express 4 does not forward rejected promises to the error handler
const route =
    (fn: (req: Request, res: Response) => unknown): RequestHandler =>
    (req, res, next) => {
        Promise.resolve()
            .then(() => fn(req, res))
            .catch(next)
    }

export function createOperatorApp(operator: OperatorService, logger: DispatchLogger) {
    const app = express()
    app.use(express.json({ limit: "1mb" }))

    app.get(
        "/api/status",
        route((_req, res) => res.json(operator.status())),
    )

    app.get(
        "/api/tasks",
        route((req, res) => {
            const raw = req.query.status
            if (raw === undefined) {
                res.json({ tasks: operator.listTasks() })
                return
            }
            const status = typeof raw === "string" ? normalizeStatus(raw) : null
            if (!status) throw new OperatorError("invalid", "Unknown status filter")
            res.json({ tasks: operator.listTasks(status) })
        }),
    )

    app.get(
        "/api/tasks/:id",
        route((req, res) => res.json(operator.getTaskDetail(parseId(req.params.id)))),
    )

    app.post(
        "/api/tasks",
        route((req, res) => res.status(201).json({ tasks: operator.addTasks(req.body) })),
    )

    app.post(
        "/api/tasks/:id/unblock",
        route(async (req, res) => {
            const task = await operator.unblockTask(parseId(req.params.id), parseUnblockBody(req.body))
            res.json({ task })
        }),
    )

    app.post(
        "/api/unblock-all",
        route(async (req, res) => res.json({ tasks: await operator.unblockAll(parseUnblockBody(req.body)) })),
    )

    app.get(
        "/api/questions",
        route((_req, res) => res.json({ questions: operator.listPendingQuestions() })),
    )

    app.post(
        "/api/questions",
        route(async (req, res) => res.status(201).json({ question: await operator.raiseQuestion(req.body) })),
    )

    app.post(
        "/api/questions/:id/answer",
        route((req, res) => {
            const parsed = AnswerBodySchema.safeParse(req.body)
            if (!parsed.success) throw new OperatorError("invalid", "Expected { answer }")
            res.json({ question: operator.answerQuestion(parseId(req.params.id), parsed.data.answer) })
        }),
    )

    app.use((_req, res) => {
        res.status(404).json({ error: "Not found" })
    })

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof OperatorError) {
            res.status(HTTP_STATUS[error.code]).json({ error: error.message })
            return
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: "Malformed JSON body" })
            return
        }
        logger.error("Operator API request failed", error)
        res.status(error instanceof StoreError ? 503 : 500).json({ error: describeError(error) })
    })

    return app
}

export interface OperatorServerOptions {
    operator: OperatorService
    logger: DispatchLogger
    port: number
    host?: string
    /** How often the status summary is re-read for /ws subscribers. */
    pollIntervalMs?: number
}

export interface OperatorServer {
    port: number
    close(): Promise<void>
}

export async function startOperatorServer(options: OperatorServerOptions): Promise<OperatorServer> {
    const { operator, logger } = options
    const app = createOperatorApp(operator, logger)

    const server: Server = await new Promise((resolve, reject) => {
        const listening = app.listen(options.port, options.host ?? "127.0.0.1", () => resolve(listening))
        listening.once("error", reject)
    })
    const address = server.address()
    if (address === null || typeof address === "string") {
        server.close()
        throw new Error("Operator server is not bound to a TCP port")
    }
    logger.info(`Operator API listening on http://${address.address}:${address.port}`)

    const wss = new WebSocketServer({ server, path: "/ws" })

    const statusPayload = () => {
        const { counts, heartbeat } = operator.status()
        return JSON.stringify({ type: "status", counts, heartbeat })
    }

    let lastPayload = ""
    const broadcast = (data: string) => {
        wss.clients.forEach((client) => {
            if (client.readyState === client.OPEN) client.send(data)
        })
    }

    wss.on("connection", (socket) => {
        try {
            socket.send(statusPayload())
        } catch (error) {
            logger.warn(`Could not send status to new subscriber: ${describeError(error)}`)
        }
    })

    const timer = setInterval(() => {
        try {
            const payload = statusPayload()
            if (payload !== lastPayload) {
                lastPayload = payload
                broadcast(payload)
            }
        } catch (error) {
            logger.warn(`Status poll failed: ${describeError(error)}`)
        }
    }, options.pollIntervalMs ?? 1000)
    timer.unref()

    return {
        port: address.port,
        close: async () => {
            clearInterval(timer)
            for (const client of wss.clients) client.terminate()
            await new Promise<void>((resolve) => wss.close(() => resolve()))
            await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
        },
    }
}
