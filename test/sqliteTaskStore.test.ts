import assert from "node:assert/strict"
import { test } from "node:test"
import Database from "better-sqlite3"
import { SqliteTaskStore } from "../src/db/sqliteTaskStore.js"
import { StoreError, TransitionConflictError } from "../src/errors.js"

const NOW = "2026-03-01T10:00:00.000Z"
const LATER = "2026-03-01T11:00:00.000Z"

function openStore(warnings: string[] = []) {
    const db = new Database(":memory:")
    const store = new SqliteTaskStore(db, { onWarning: (message) => warnings.push(message) })
    return { db, store }
}

test("insertTask applies defaults and lists by priority then id", () => {
    const { store } = openStore()
    store.insertTask({ name: "first" }, NOW)
    store.insertTask({ name: "urgent", priority: 9, project: "demo", phase: "P" }, NOW)
    store.insertTask({ name: "second" }, NOW)

    const tasks = store.listTasks()
    assert.deepEqual(
        tasks.map((task) => [task.id, task.name]),
        [
            [2, "urgent"],
            [1, "first"],
            [3, "second"],
        ],
    )
    const first = store.getTask(1)
    assert.equal(first?.status, "TODO")
    assert.equal(first?.priority, 3)
    assert.equal(first?.attemptCount, 0)
    assert.equal(first?.workerHandle, null)
    assert.equal(first?.createdAt, NOW)
})

test("applyTransition updates status, handle and attempts together and writes history", () => {
    const { store } = openStore()
    store.insertTask({ name: "build me", notes: "start here" }, NOW)

    const [started] = store.applyTransition(
        {
            taskIds: [1],
            from: ["TODO"],
            to: "IN_PROGRESS",
            workerHandle: "worker-1",
            role: "build",
            attempts: { taskId: 1, change: "increment" },
            startedAt: LATER,
        },
        LATER,
    )
    assert.equal(started?.status, "IN_PROGRESS")
    assert.equal(started?.workerHandle, "worker-1")
    assert.equal(started?.assignedRole, "build")
    assert.equal(started?.attemptCount, 1)
    assert.equal(started?.startedAt, LATER)
    assert.equal(started?.notes, "start here")

    assert.deepEqual(
        store.listHistory(1).map((entry) => [entry.status, entry.changedAt]),
        [
            ["TODO", NOW],
            ["IN_PROGRESS", LATER],
        ],
    )
})

test("a transition whose guard no longer holds changes nothing", () => {
    const { store } = openStore()
    store.insertTask({ name: "a" }, NOW)
    store.insertTask({ name: "b" }, NOW)
    store.applyTransition({ taskIds: [2], from: ["TODO"], to: "BLOCKED", workerHandle: null }, NOW)

    assert.throws(
        () =>
            store.applyTransition(
                {
                    taskIds: [1, 2],
                    from: ["TODO"],
                    to: "IN_PROGRESS",
                    workerHandle: "worker-9",
                    incident: { taskId: 1, reason: "should roll back" },
                },
                LATER,
            ),
        TransitionConflictError,
    )
    assert.equal(store.getTask(1)?.status, "TODO")
    assert.equal(store.getTask(1)?.workerHandle, null)
    assert.deepEqual(store.listBlockedReasons(1), [])
})

test("incidents are appended in order inside the transition", () => {
    const { store } = openStore()
    store.insertTask({ name: "flaky" }, NOW)
    store.applyTransition(
        { taskIds: [1], from: ["TODO"], to: "TODO", workerHandle: null, incident: { taskId: 1, reason: "first" } },
        NOW,
    )
    store.applyTransition(
        { taskIds: [1], from: ["TODO"], to: "BLOCKED", workerHandle: null, incident: { taskId: 1, reason: "second" } },
        LATER,
    )
    assert.deepEqual(
        store.listBlockedReasons(1).map((entry) => [entry.reason, entry.createdAt]),
        [
            ["first", NOW],
            ["second", LATER],
        ],
    )
})

test("normalizeStatuses rewrites legacy spellings and unknown statuses are skipped", () => {
    const warnings: string[] = []
    const { db, store } = openStore(warnings)
    for (let i = 0; i < 4; i += 1) store.insertTask({ name: `t${i}` }, NOW)
    db.prepare("UPDATE tasks SET status = 'in-progress', assigned_role = 'coder', worker_handle = 'w' WHERE id = 1").run()
    db.prepare("UPDATE tasks SET status = 'Ready_For_Testing' WHERE id = 2").run()
    db.prepare("UPDATE tasks SET status = 'done?' WHERE id = 3").run()

    assert.equal(store.normalizeStatuses(LATER), 3)
    assert.equal(store.getTask(1)?.status, "IN_PROGRESS")
    assert.equal(store.getTask(1)?.assignedRole, "build")
    assert.equal(store.getTask(2)?.status, "READY_FOR_TESTING")
    assert.equal(store.getTask(3), null)
    assert.deepEqual(warnings, ['task 3 has unknown status "done?"; skipped'])
    assert.deepEqual(store.countByStatus(), {
        TODO: 1,
        IN_PROGRESS: 1,
        READY_FOR_TESTING: 1,
        COMPLETE: 0,
        BLOCKED: 0,
    })
})

test("unblockTasks requeues blocked tasks without a worker and appends the solution", () => {
    const { store } = openStore()
    store.insertTask({ name: "a" }, NOW)
    store.insertTask({ name: "b" }, NOW)
    store.insertTask({ name: "c" }, NOW)
    store.applyTransition(
        {
            taskIds: [1, 2],
            from: ["TODO"],
            to: "BLOCKED",
            workerHandle: null,
            blockedReason: "stuck",
            errorLog: "trace",
            attempts: { taskId: 1, change: "increment" },
        },
        NOW,
    )

    const first = store.unblockTasks({ taskIds: [1], to: "TODO", solution: "try v2", resetAttempts: false }, LATER)
    assert.equal(first[0]?.solution, "try v2")
    assert.equal(first[0]?.attemptCount, 1)
    assert.equal(first[0]?.blockedReason, null)
    assert.equal(first[0]?.errorLog, null)

    store.applyTransition({ taskIds: [1], from: ["TODO"], to: "BLOCKED", workerHandle: null }, LATER)
    const all = store.unblockTasks(
        { taskIds: "all", to: "READY_FOR_TESTING", solution: "pin the version", resetAttempts: true },
        LATER,
    )
    assert.deepEqual(
        all.map((task) => [task.id, task.status, task.attemptCount]),
        [
            [1, "READY_FOR_TESTING", 0],
            [2, "READY_FOR_TESTING", 0],
        ],
    )
    assert.equal(store.getTask(1)?.solution, "try v2\npin the version")
    assert.deepEqual(store.unblockTasks({ taskIds: [3], to: "TODO", solution: null, resetAttempts: true }, LATER), [])
})

test("purgeCompleted removes old completed tasks with their history and reasons", () => {
    const { store } = openStore()
    store.insertTask({ name: "old" }, NOW)
    store.insertTask({ name: "recent" }, NOW)
    store.applyTransition(
        {
            taskIds: [1],
            from: ["TODO"],
            to: "COMPLETE",
            workerHandle: null,
            completedAt: "2026-01-01T00:00:00.000Z",
            incident: { taskId: 1, reason: "old incident" },
        },
        NOW,
    )
    store.applyTransition({ taskIds: [2], from: ["TODO"], to: "COMPLETE", workerHandle: null, completedAt: NOW }, NOW)

    assert.equal(store.purgeCompleted("2026-02-01T00:00:00.000Z"), 1)
    assert.equal(store.getTask(1), null)
    assert.deepEqual(store.listHistory(1), [])
    assert.deepEqual(store.listBlockedReasons(1), [])
    assert.equal(store.getTask(2)?.status, "COMPLETE")
})

test("questions can be answered once and expire when left pending", () => {
    const { store } = openStore()
    store.insertTask({ name: "a" }, NOW)
    const q1 = store.insertQuestion({ agent: "coder", taskId: 1, question: "Which region?" }, NOW)
    const q2 = store.insertQuestion({ agent: "tester", taskId: null, question: "Staging creds?" }, LATER)

    const answered = store.answerQuestion(q1.id, "eu-west-1", LATER)
    assert.equal(answered?.status, "answered")
    assert.equal(answered?.answer, "eu-west-1")
    assert.equal(store.answerQuestion(q1.id, "again", LATER), null)

    assert.equal(store.expireQuestions("2026-03-01T12:00:00.000Z"), 1)
    assert.equal(store.listQuestions("expired")[0]?.id, q2.id)
    assert.deepEqual(store.listQuestions("pending"), [])
})

test("state values are upserted", () => {
    const { store } = openStore()
    assert.equal(store.readState("heartbeat"), null)
    store.writeState("heartbeat", "one", NOW)
    store.writeState("heartbeat", "two", LATER)
    assert.equal(store.readState("heartbeat"), "two")
})

test("driver failures surface as StoreError", () => {
    const { store } = openStore()
    store.close()
    assert.throws(() => store.listTasks(), StoreError)
})
