import { log } from "../core/Logger.js"
import { bulletList, renderTemplate } from "../core/template.js"
import type {
    AssignmentResult,
    Review,
    Specialization,
    TaskAnalysis,
} from "../types.js"
import { parseDecomposition } from "../workflow/parsers.js"
import type { ReviewPolicy } from "../workflow/ReviewPolicy.js"
import { Agent, type RoleAgentOptions } from "./Agent.js"
import {
    ASSIGNMENT_CONSTRAINTS,
    ASSIGNMENT_SUCCESS_CRITERIA,
    COORDINATOR_TEMPLATES,
    NO_BACKEND_SOLUTION,
    NO_FRONTEND_SOLUTION,
} from "./prompts.js"

export interface CoordinatorOptions extends RoleAgentOptions {
    reviewPolicy: ReviewPolicy
    workerNames: Record<Specialization, string>
}

/** Decomposes the task, briefs the workers, reviews and merges their output. */
export class Coordinator extends Agent {
    private readonly reviewPolicy: ReviewPolicy
    private readonly workerNames: Record<Specialization, string>

    constructor(options: CoordinatorOptions) {
        super({ ...options, role: "coordinator" })
        this.reviewPolicy = options.reviewPolicy
        this.workerNames = options.workerNames
    }

    /**
     * Two model calls: a free-form analysis, then a JSON extraction of the
     * sub-task lists. Unreadable JSON yields empty lists; only transport
     * and cancellation errors escape.
     */
    public async analyzeTask(
        task: string,
        signal?: AbortSignal
    ): Promise<TaskAnalysis> {
        log.coordinator("Analysing task: %s", task.slice(0, 50))
        const context = { task }
        const analysisText = await this.process(
            renderTemplate(COORDINATOR_TEMPLATES.taskAnalysis, { task }),
            context,
            signal
        )
        const extraction = await this.process(
            renderTemplate(COORDINATOR_TEMPLATES.decompositionExtraction, {
                task,
            }),
            context,
            signal
        )

        const decomposition = parseDecomposition(extraction)
        log.coordinator(
            "Task split into %d front-end and %d back-end sub-tasks (%s)",
            decomposition.frontend.length,
            decomposition.backend.length,
            decomposition.source
        )

        return Object.freeze({
            originalTask: task,
            analysisText,
            subtasks: Object.freeze({
                frontend: Object.freeze([...decomposition.frontend]),
                backend: Object.freeze([...decomposition.backend]),
            }),
            integrationPoints: Object.freeze([
                ...decomposition.integrationPoints,
            ]),
        })
    }

    public createTaskAssignment(
        analysis: TaskAnalysis,
        specialization: Specialization,
        index: number
    ): AssignmentResult {
        const list = analysis.subtasks[specialization]
        if (!Number.isInteger(index) || index < 0 || index >= list.length) {
            const message = `Invalid sub-task index ${index} for ${specialization} (length ${list.length})`
            log.coordinator(message)
            return { type: "error", code: "invalid_index", message }
        }

        const context = {
            projectContext: analysis.originalTask,
            specificTask: list[index],
            constraints: ASSIGNMENT_CONSTRAINTS,
            interfaces: bulletList(analysis.integrationPoints),
            successCriteria: ASSIGNMENT_SUCCESS_CRITERIA,
        }
        const prompt = renderTemplate(COORDINATOR_TEMPLATES.taskAssignment, {
            developerName: this.workerNames[specialization],
            ...context,
        })

        return {
            type: "assignment",
            assignment: {
                prompt,
                context,
                specialization,
                subtaskIndex: index,
            },
        }
    }

    public async reviewWork(
        analysis: TaskAnalysis,
        specialization: Specialization,
        solution: string,
        signal?: AbortSignal
    ): Promise<Review> {
        const workerName = this.workerNames[specialization]
        const evaluation = await this.process(
            renderTemplate(COORDINATOR_TEMPLATES.reviewWork, {
                developerName: workerName,
                originalTask: analysis.originalTask,
                submittedSolution: solution,
            }),
            { taskData: analysis, developerRole: specialization },
            signal
        )
        const approved = this.reviewPolicy.isApproved(evaluation)
        log.coordinator(
            "Review of %s work: %s (%s policy)",
            specialization,
            approved ? "approved" : "rejected",
            this.reviewPolicy.name
        )

        return {
            specialization,
            workerName,
            originalTask: analysis.originalTask,
            evaluation,
            approved,
        }
    }

    public async integrateSolutions(
        analysis: TaskAnalysis,
        frontendSolution: string,
        backendSolution: string,
        signal?: AbortSignal
    ): Promise<string> {
        const context = { taskData: analysis }
        if (!frontendSolution && !backendSolution) {
            log.coordinator("No worker output; asking for a complete solution")
            return this.process(
                renderTemplate(COORDINATOR_TEMPLATES.completeSolution, {
                    task: analysis.originalTask,
                }),
                context,
                signal
            )
        }

        return this.process(
            renderTemplate(COORDINATOR_TEMPLATES.integration, {
                task: analysis.originalTask,
                frontendSolution: frontendSolution || NO_FRONTEND_SOLUTION,
                backendSolution: backendSolution || NO_BACKEND_SOLUTION,
            }),
            context,
            signal
        )
    }

    /** Used when the decomposition produced no sub-tasks at all. */
    public async solveDirectly(
        description: string,
        signal?: AbortSignal
    ): Promise<string> {
        return this.process(
            renderTemplate(COORDINATOR_TEMPLATES.directSolution, {
                task: description,
            }),
            { task: description },
            signal
        )
    }
}
