import assert from "node:assert/strict"
import { test } from "node:test"
import Database from "better-sqlite3"
import type { UnblockAttemptsPolicy } from "../src/config.js"
import { SqliteTaskStore } from "../src/db/sqliteTaskStore.js"
import { OperatorError, type OperatorErrorCode } from "../src/errors.js"
import { OperatorService, parseUnblockArgs } from "../src/operator.js"
import { quietLogger, RecordingNotifier, TestClock } from "./support/fakeWorkers.js"

const NOW = "2026-03-01T10:00:00.000Z"

function setup(unblockAttempts: UnblockAttemptsPolicy = "reset") {
    const clock = new TestClock(NOW)
    const store = new SqliteTaskStore(new Database(":memory:"))
    const notifier = new RecordingNotifier()
    const logger = quietLogger(clock.now)
    const operator = new OperatorService({ store, notifier, logger, unblockAttempts, clock: clock.now })
    return { clock, store, notifier, logger, operator }
}

function rejectedWith(code: OperatorErrorCode, message: string) {
    return (error: unknown) => {
        assert.ok(error instanceof OperatorError)
        assert.equal(error.code, code)
        assert.equal(error.message, message)
        return true
    }
}

function block(store: SqliteTaskStore, id: number, workerHandle: string | null = null) {
    store.applyTransition(
        {
            taskIds: [id],
            from: ["TODO"],
            to: "BLOCKED",
            workerHandle,
            attempts: { taskId: id, change: "increment" },
            blockedReason: "tests keep failing",
            incident: { taskId: id, reason: "tests keep failing" },
        },
        NOW,
    )
}

test("addTasks trims input and applies the default priority", () => {
    const { operator } = setup()
    const created = operator.addTasks({
        project: " demo ",
        tasks: [
            { name: "write parser", phase: "P1" },
            { name: "wire CLI", priority: "7", plan: "" },
        ],
    })
    assert.deepEqual(
        created.map((task) => [task.id, task.name, task.project, task.phase, task.priority, task.implementationPlan]),
        [
            [1, "write parser", "demo", "P1", 3, null],
            [2, "wire CLI", "demo", null, 7, null],
        ],
    )
    assert.deepEqual(
        operator.listTasks("TODO").map((task) => task.id),
        [2, 1],
    )
})

test("addTasks rejects empty batches and nameless tasks", () => {
    const { operator } = setup()
    assert.throws(() => operator.addTasks({ tasks: [] }), rejectedWith("invalid", "tasks: at least one task is required"))
    assert.throws(
        () => operator.addTasks({ tasks: [{ name: "  " }] }),
        rejectedWith("invalid", "tasks.0.name: name is required"),
    )
})

test("unblock arguments accept a target status and solution text", () => {
    assert.deepEqual(parseUnblockArgs([]), { status: "TODO", solution: "" })
    assert.deepEqual(parseUnblockArgs(["todo"]), { status: "TODO", solution: "" })
    assert.deepEqual(parseUnblockArgs(["ready", "fixed", "upstream"]), {
        status: "READY_FOR_TESTING",
        solution: "fixed upstream",
    })
    assert.deepEqual(parseUnblockArgs(["Ready", "for", "testing", "pinned", "deps"]), {
        status: "READY_FOR_TESTING",
        solution: "pinned deps",
    })
    assert.deepEqual(parseUnblockArgs(["bumped", "the", "version"]), {
        status: "TODO",
        solution: "bumped the version",
    })
    assert.throws(
        () => parseUnblockArgs(["in-progress"]),
        rejectedWith("invalid", "A task cannot be unblocked straight into IN_PROGRESS"),
    )
})

test("unblockTask requeues a blocked task, resets attempts and notifies", async () => {
    const { store, notifier, operator } = setup()
    operator.addTasks({ tasks: [{ name: "flaky build" }] })
    block(store, 1)

    const task = await operator.unblockTask(1, { solution: " pinned deps " })

    assert.equal(task.status, "TODO")
    assert.equal(task.attemptCount, 0)
    assert.equal(task.blockedReason, null)
    assert.equal(task.solution, "pinned deps")
    assert.deepEqual(notifier.kinds(), ["reset:1"])
    assert.equal(notifier.events[0]?.details, "Unblocked by operator, now TODO.\nSolution: pinned deps")
    assert.deepEqual(
        operator.getTaskDetail(1).blockedReasons.map((entry) => entry.reason),
        ["tests keep failing"],
    )
})

test("the preserve policy keeps the attempt count", async () => {
    const { store, operator } = setup("preserve")
    operator.addTasks({ tasks: [{ name: "flaky build" }] })
    block(store, 1)

    const task = await operator.unblockTask(1, { status: "READY_FOR_TESTING" })

    assert.equal(task.status, "READY_FOR_TESTING")
    assert.equal(task.attemptCount, 1)
})

test("unblockTask refuses missing, unblocked and attached tasks", async () => {
    const { store, operator } = setup()
    operator.addTasks({ tasks: [{ name: "a" }, { name: "b" }] })
    block(store, 2, "worker-7")

    await assert.rejects(operator.unblockTask(99), rejectedWith("not_found", "Task #99 not found"))
    await assert.rejects(operator.unblockTask(1), rejectedWith("conflict", "Task #1 is TODO, not BLOCKED"))
    await assert.rejects(
        operator.unblockTask(2),
        rejectedWith("conflict", "Task #2 is still attached to worker worker-7"),
    )
})

test("unblockAll skips tasks with a worker attached", async () => {
    const { store, notifier, operator } = setup()
    operator.addTasks({ tasks: [{ name: "a" }, { name: "b" }, { name: "c" }] })
    block(store, 1)
    block(store, 2, "worker-7")
    block(store, 3)

    const updated = await operator.unblockAll()

    assert.deepEqual(
        updated.map((task) => task.id),
        [1, 3],
    )
    assert.deepEqual(notifier.kinds(), ["reset:1", "reset:3"])
    assert.equal(store.getTask(2)?.status, "BLOCKED")
})

test("an unreachable notifier does not undo the unblock", async () => {
    const { store, notifier, logger, operator } = setup()
    operator.addTasks({ tasks: [{ name: "a" }] })
    block(store, 1)
    notifier.fail = true

    const task = await operator.unblockTask(1)

    assert.equal(task.status, "TODO")
    assert.equal(
        logger.recent.at(-1),
        `[${NOW}] [dispatcher] WARN Notification reset for 1 not delivered: chat unavailable`,
    )
})

test("questions are announced, answered and expire after an hour", async () => {
    const { clock, notifier, operator } = setup()
    operator.addTasks({ tasks: [{ name: "api" }] })

    const first = await operator.raiseQuestion({ agent: "coder", taskId: 1, question: "Which port?" })
    assert.equal(first.status, "pending")
    assert.deepEqual(notifier.kinds(), ["question:1"])
    assert.equal(notifier.events[0]?.details, "Which port?\n\nQuestion #1")
    await assert.rejects(
        operator.raiseQuestion({ agent: "coder", taskId: 42, question: "?" }),
        rejectedWith("not_found", "Task #42 not found"),
    )

    clock.advance(30 * 60 * 1000)
    const second = await operator.raiseQuestion({ agent: "tester", question: "Staging or prod?" })
    assert.equal(second.taskId, null)
    assert.equal(operator.listPendingQuestions().length, 2)

    clock.advance(31 * 60 * 1000)
    assert.deepEqual(
        operator.listPendingQuestions().map((question) => question.id),
        [2],
    )
    assert.throws(() => operator.answerQuestion(1, "8080"), rejectedWith("conflict", "Question #1 is no longer pending"))
    assert.throws(() => operator.answerQuestion(9, "8080"), rejectedWith("not_found", "Question #9 not found"))
    assert.throws(() => operator.answerQuestion(2, "  "), rejectedWith("invalid", "answer is required"))

    const answered = operator.answerQuestion(2, "staging")
    assert.equal(answered.status, "answered")
    assert.equal(answered.answer, "staging")
    assert.equal(answered.answeredAt, clock.iso())
    assert.equal(operator.status().pendingQuestions, 0)
})

test("status reports counts, blocked tasks and no heartbeat before the first pass", () => {
    const { store, operator } = setup()
    operator.addTasks({ tasks: [{ name: "a" }, { name: "b" }] })
    block(store, 2)

    const report = operator.status()

    assert.deepEqual(report.counts, { TODO: 1, IN_PROGRESS: 0, READY_FOR_TESTING: 0, COMPLETE: 0, BLOCKED: 1 })
    assert.equal(report.heartbeat, null)
    assert.deepEqual(
        report.blocked.map((task) => task.id),
        [2],
    )
})
