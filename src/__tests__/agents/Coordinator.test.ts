import { describe, expect, it } from "vitest"

import { Coordinator } from "../../agents/Coordinator.js"
import {
    NO_BACKEND_SOLUTION,
    NO_FRONTEND_SOLUTION,
} from "../../agents/prompts.js"
import type { TaskAnalysis } from "../../types.js"
import {
    alwaysApprove,
    keywordPolicy,
    type ReviewPolicy,
} from "../../workflow/ReviewPolicy.js"
import {
    createScriptedService,
    decompositionJson,
    type Route,
    type ScriptedService,
} from "../helpers/scriptedCompletion.js"

const TASK = "Build a todo app"

const ANALYSIS: TaskAnalysis = {
    originalTask: TASK,
    analysisText: "analysis",
    subtasks: {
        frontend: ["TodoList: render items", "Filters"],
        backend: ["Todo API"],
    },
    integrationPoints: ["GET /todos", "POST /todos"],
}

function createCoordinator(
    routes: readonly Route[],
    reviewPolicy: ReviewPolicy = alwaysApprove
): { coordinator: Coordinator; client: ScriptedService } {
    const client = createScriptedService(routes)
    const coordinator = new Coordinator({
        identity: { name: "Lead", model: "test-model", systemPrompt: "lead" },
        client,
        maxHistory: 10,
        reviewPolicy,
        workerNames: { frontend: "UI Dev", backend: "API Dev" },
    })
    return { coordinator, client }
}

describe("Coordinator.analyzeTask", () => {
    it("asks for an analysis, then extracts the sub-task lists", async () => {
        const { coordinator, client } = createCoordinator([
            ["As the technical lead", "Here is my analysis"],
            [
                "From your previous analysis",
                `Sure!\n${decompositionJson({
                    frontend: ["List view"],
                    backend: ["CRUD endpoints", "Storage"],
                    integration: ["REST"],
                })}`,
            ],
        ])

        const analysis = await coordinator.analyzeTask(TASK)

        expect(client.calls).toHaveLength(2)
        expect(client.calls[0].prompt).toContain(`TASK: ${TASK}`)
        expect(client.calls[1].prompt).toContain(`analysis of the task "${TASK}"`)
        expect(analysis).toEqual({
            originalTask: TASK,
            analysisText: "Here is my analysis",
            subtasks: { frontend: ["List view"], backend: ["CRUD endpoints", "Storage"] },
            integrationPoints: ["REST"],
        })
        expect(Object.isFrozen(analysis)).toBe(true)
        expect(Object.isFrozen(analysis.subtasks.frontend)).toBe(true)
    })

    it("yields empty lists when the extraction has no JSON", async () => {
        const { coordinator } = createCoordinator([
            ["As the technical lead", "analysis"],
            ["From your previous analysis", "This task is trivial."],
        ])

        const analysis = await coordinator.analyzeTask(TASK)

        expect(analysis.subtasks).toEqual({ frontend: [], backend: [] })
        expect(analysis.integrationPoints).toEqual([])
    })
})

describe("Coordinator.createTaskAssignment", () => {
    it("briefs the worker on one sub-task", () => {
        const { coordinator } = createCoordinator([])

        const result = coordinator.createTaskAssignment(ANALYSIS, "frontend", 0)

        if (result.type !== "assignment") throw new Error("expected an assignment")
        const { assignment } = result
        expect(assignment.specialization).toBe("frontend")
        expect(assignment.subtaskIndex).toBe(0)
        expect(assignment.context.specificTask).toBe("TodoList: render items")
        expect(assignment.context.interfaces).toBe("- GET /todos\n- POST /todos")
        expect(assignment.prompt.startsWith("Task assignment for UI Dev:")).toBe(true)
        expect(assignment.prompt).toContain(`PROJECT CONTEXT: ${TASK}`)
        expect(assignment.prompt).toContain("YOUR TASK: TodoList: render items")
        expect(assignment.prompt).toContain(
            "INTERFACES WITH OTHER COMPONENTS:\n- GET /todos\n- POST /todos"
        )
    })

    it("returns an error result for an index out of range", () => {
        const { coordinator } = createCoordinator([])

        expect(coordinator.createTaskAssignment(ANALYSIS, "backend", 1)).toEqual({
            type: "error",
            code: "invalid_index",
            message: "Invalid sub-task index 1 for backend (length 1)",
        })
        expect(coordinator.createTaskAssignment(ANALYSIS, "frontend", -1).type).toBe(
            "error"
        )
    })

    it("rejects the length index of every specialisation without calling a worker", () => {
        const { coordinator, client } = createCoordinator([])

        for (const specialization of ["frontend", "backend"] as const) {
            const length = ANALYSIS.subtasks[specialization].length
            const result = coordinator.createTaskAssignment(
                ANALYSIS,
                specialization,
                length
            )
            expect(result).toEqual({
                type: "error",
                code: "invalid_index",
                message: `Invalid sub-task index ${length} for ${specialization} (length ${length})`,
            })
        }
        expect(client.calls).toEqual([])
        expect(client.generate).not.toHaveBeenCalled()
    })
})

describe("Coordinator.reviewWork", () => {
    it("approves through the configured policy", async () => {
        const { coordinator, client } = createCoordinator(
            [["Review of the work submitted by", "Needs tests.\nVERDICT: REJECTED"]],
            keywordPolicy()
        )

        const review = await coordinator.reviewWork(ANALYSIS, "backend", "my api")

        expect(review).toEqual({
            specialization: "backend",
            workerName: "API Dev",
            originalTask: TASK,
            evaluation: "Needs tests.\nVERDICT: REJECTED",
            approved: false,
        })
        expect(client.calls[0].prompt).toContain("SUBMITTED SOLUTION:\nmy api")
    })

    it("approves everything under the default policy", async () => {
        const { coordinator } = createCoordinator([
            ["Review of the work submitted by", "VERDICT: REJECTED"],
        ])

        const review = await coordinator.reviewWork(ANALYSIS, "frontend", "ui")
        expect(review.approved).toBe(true)
    })
})

describe("Coordinator.integrateSolutions", () => {
    it("fills a missing side with a placeholder", async () => {
        const { coordinator, client } = createCoordinator([
            ["Integrate the components", "merged"],
        ])

        await expect(
            coordinator.integrateSolutions(ANALYSIS, "", "backend work")
        ).resolves.toBe("merged")
        expect(client.calls[0].prompt).toContain(
            `FRONT-END COMPONENT:\n${NO_FRONTEND_SOLUTION}\n\nBACK-END COMPONENT:\nbackend work`
        )
        expect(client.calls[0].prompt).not.toContain(NO_BACKEND_SOLUTION)
    })

    it("gives the same answer when called twice with the same input", async () => {
        const client = createScriptedService([["Integrate the components", "merged"]])
        const coordinator = new Coordinator({
            identity: { name: "Lead", model: "test-model", systemPrompt: "lead" },
            client,
            maxHistory: 10,
            reviewPolicy: alwaysApprove,
            workerNames: { frontend: "UI Dev", backend: "API Dev" },
            now: () => new Date("2026-01-01T00:00:00.000Z"),
        })

        const first = await coordinator.integrateSolutions(ANALYSIS, "ui work", "api work")
        const second = await coordinator.integrateSolutions(ANALYSIS, "ui work", "api work")

        expect(first).toBe("merged")
        expect(second).toBe(first)
        expect(client.calls).toHaveLength(2)
        expect(client.calls[1].prompt).toBe(client.calls[0].prompt)
    })

    it("asks for a complete solution when both sides are empty", async () => {
        const { coordinator, client } = createCoordinator([
            ["Create a complete solution", "from scratch"],
        ])

        await expect(coordinator.integrateSolutions(ANALYSIS, "", "")).resolves.toBe(
            "from scratch"
        )
        expect(client.calls).toHaveLength(1)
    })
})

describe("Coordinator.solveDirectly", () => {
    it("asks for a direct solution of the whole task", async () => {
        const { coordinator, client } = createCoordinator([
            ["No sub-tasks were identified", "direct"],
        ])

        await expect(coordinator.solveDirectly(TASK)).resolves.toBe("direct")
        expect(client.calls[0].prompt).toContain(`\n\n${TASK}\n\n`)
    })
})
