import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { PipelineError } from "../../core/errors.js"
import { EventBus } from "../../events/EventBus.js"
import type { TrioEvent } from "../../events/types.js"
import { TaskManager } from "../../orchestrator/TaskManager.js"
import { FileStore } from "../../persistence/FileStore.js"
import type { SubtaskResult } from "../../types.js"

function result(index: number): SubtaskResult {
    return {
        index,
        task: `task ${index}`,
        solution: `solution ${index}`,
        review: {
            specialization: "frontend",
            workerName: "UI Dev",
            originalTask: "t",
            evaluation: "ok",
            approved: true,
        },
        approved: true,
    }
}

describe("TaskManager", () => {
    let now: number
    let manager: TaskManager
    let events: TrioEvent[]

    beforeEach(() => {
        now = 1000
        events = []
        const eventBus = new EventBus()
        eventBus.on((event) => events.push(event))
        manager = new TaskManager({ eventBus, clock: () => now })
    })

    it("creates a run in the analyzing state", () => {
        const state = manager.create("build it")

        expect(state.taskId).toMatch(/^[0-9a-f]{8}$/)
        expect(state).toMatchObject({
            description: "build it",
            status: "analyzing",
            analysis: null,
            results: { frontend: [], backend: [] },
            skipped: { frontend: [], backend: [] },
            startTime: 1000,
        })
        expect(manager.get(state.taskId)).toBe(state)
        expect(manager.get("unknown")).toBeUndefined()
    })

    it("follows the allowed transitions and emits each one", () => {
        const { taskId } = manager.create("x")
        manager.setStatus(taskId, "executing")
        manager.setStatus(taskId, "integrating")
        now = 4500
        const done = manager.complete(taskId, "final")

        expect(done).toMatchObject({
            status: "completed",
            finalSolution: "final",
            endTime: 4500,
            duration: 3500,
        })
        expect(
            events.flatMap((event) =>
                event.type === "pipeline:status" ? [`${event.from}>${event.to}`] : []
            )
        ).toEqual([
            "analyzing>executing",
            "executing>integrating",
            "integrating>completed",
        ])
    })

    it("rejects a transition the table does not allow", () => {
        const { taskId } = manager.create("x")
        expect(() => manager.setStatus(taskId, "integrating")).toThrow(PipelineError)
        expect(() => manager.setStatus(taskId, "integrating")).toThrow(
            `Run ${taskId} cannot move from analyzing to integrating`
        )
    })

    it("fails a run from any active state", () => {
        const { taskId } = manager.create("x")
        manager.setStatus(taskId, "executing")
        now = 1200

        const failed = manager.fail(taskId, "boom")
        expect(failed).toMatchObject({ status: "failed", error: "boom", duration: 200 })
        expect(() => manager.fail(taskId, "again")).not.toThrow()
        expect(() => manager.setStatus(taskId, "executing")).toThrow(PipelineError)
    })

    it("keeps results ordered by sub-task index", () => {
        const { taskId } = manager.create("x")
        manager.addResult(taskId, "frontend", result(2))
        manager.addResult(taskId, "frontend", result(0))
        manager.addResult(taskId, "frontend", result(1))

        expect(manager.get(taskId)?.results.frontend.map((r) => r.index)).toEqual([
            0, 1, 2,
        ])
    })

    it("records skipped sub-tasks with their reason", () => {
        const { taskId } = manager.create("x")
        manager.addSkipped(taskId, "backend", 3, "deadline")

        expect(manager.get(taskId)?.skipped.backend).toEqual([3])
        expect(events).toContainEqual({
            type: "subtask:skipped",
            taskId,
            specialization: "backend",
            index: 3,
            reason: "deadline",
        })
    })

    it("throws for an unknown run", () => {
        expect(() => manager.setStatus("nope", "executing")).toThrow("Unknown run nope")
    })

    it("forgets a released run", () => {
        const { taskId } = manager.create("done soon")
        manager.fail(taskId, "stopped")

        manager.release(taskId)

        expect(manager.get(taskId)).toBeUndefined()
        expect(() => manager.setStatus(taskId, "executing")).toThrow(
            `Unknown run ${taskId}`
        )
    })
})

describe("TaskManager archive", () => {
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "trio-runs-"))
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("writes the run state under runs/<taskId>", async () => {
        const manager = new TaskManager({ store: new FileStore(tempDir) })
        const { taskId } = manager.create("archive me")
        manager.fail(taskId, "stopped")

        await manager.archive(taskId)

        const saved: unknown = JSON.parse(
            await readFile(join(tempDir, "runs", `${taskId}.json`), "utf-8")
        )
        expect(saved).toMatchObject({
            taskId,
            description: "archive me",
            status: "failed",
            error: "stopped",
        })
    })

    it("does nothing without a store", async () => {
        const manager = new TaskManager()
        const { taskId } = manager.create("x")
        await expect(manager.archive(taskId)).resolves.toBeUndefined()
    })
})
