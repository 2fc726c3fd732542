import { join } from "node:path"

import { BackendWorker } from "../agents/BackendWorker.js"
import { Coordinator } from "../agents/Coordinator.js"
import { FrontendWorker } from "../agents/FrontendWorker.js"
import { NO_SOLUTION_PRODUCED } from "../agents/prompts.js"
import type { Worker } from "../agents/Worker.js"
import { requireNonNegative } from "../core/Config.js"
import { errorMessage, isAbortError, PipelineError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import { createMessage, type MessageBus } from "../events/MessageBus.js"
import type { SkipReason } from "../events/types.js"
import { FileStore } from "../persistence/FileStore.js"
import { HistoryStore } from "../persistence/HistoryStore.js"
import {
    SPECIALIZATIONS,
    type CompletionService,
    type PipelineState,
    type PipelineStatus,
    type ResolvedConfig,
    type RunResult,
    type SolveOptions,
    type Specialization,
    type SubtaskResult,
    type TaskAnalysis,
} from "../types.js"
import { createReviewPolicy } from "../workflow/ReviewPolicy.js"
import { runPool } from "../workflow/WorkerPool.js"
import { TaskManager } from "./TaskManager.js"

export interface OrchestratorOptions {
    config: ResolvedConfig
    client: CompletionService
    eventBus: EventBus
    messageBus: MessageBus
    /** Milliseconds; drives durations and the start-of-sub-task deadline check. */
    clock?: () => number
}

interface Team {
    coordinator: Coordinator
    workers: Record<Specialization, Worker>
}

interface RunContext {
    state: PipelineState
    analysis: TaskAnalysis
    team: Team
}

/** Longest delay a Node timer accepts; larger budgets never fire. */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

export function formatErrorReport(message: string): string {
    return `ERROR WHILE SOLVING THE TASK\n\nError while solving the task: ${message}\n\nCheck the logs for details.`
}

/** Approved solutions, or every solution when none was approved. */
export function joinSolutions(results: readonly SubtaskResult[]): string {
    const approved = results.filter((result) => result.approved)
    const chosen = approved.length > 0 ? approved : results
    return chosen.map((result) => result.solution).join("\n\n")
}

/** What a run returns when the final model answer came back blank. */
export function fallbackSolution(state: PipelineState): string {
    const joined = [
        joinSolutions(state.results.frontend),
        joinSolutions(state.results.backend),
    ]
        .filter((part) => part.trim() !== "")
        .join("\n\n")
    return joined || NO_SOLUTION_PRODUCED
}

/**
 * Runs one task through analyse, execute, review and integrate. Each call
 * to solveTask builds its own team of agents, so concurrent runs share no
 * conversation state.
 */
export class Orchestrator {
    private readonly config: ResolvedConfig
    private readonly client: CompletionService
    private readonly eventBus: EventBus
    private readonly messageBus: MessageBus
    private readonly clock: () => number
    private readonly taskManager: TaskManager
    private readonly historyStore?: HistoryStore
    private readonly activeRuns: Set<AbortController> = new Set()

    constructor(options: OrchestratorOptions) {
        this.config = options.config
        this.client = options.client
        this.eventBus = options.eventBus
        this.messageBus = options.messageBus
        this.clock = options.clock ?? Date.now

        const { workingDirectory, history, pipeline } = this.config
        this.taskManager = new TaskManager({
            store: pipeline.archiveRuns
                ? new FileStore(join(workingDirectory, ".trio"))
                : undefined,
            eventBus: this.eventBus,
            clock: this.clock,
        })
        if (history.persist) {
            this.historyStore = new HistoryStore(
                new FileStore(join(workingDirectory, history.directory))
            )
        }
    }

    public async solveTask(
        description: string,
        options: SolveOptions = {}
    ): Promise<RunResult> {
        const timeoutSeconds =
            options.timeoutSeconds ?? this.config.pipeline.timeoutSeconds
        requireNonNegative("timeoutSeconds", timeoutSeconds)

        const state = this.taskManager.create(description)
        const { taskId } = state
        const controller = new AbortController()
        this.activeRuns.add(controller)
        const team = this.createTeam()

        this.eventBus.emit({ type: "pipeline:start", taskId, description })
        this.publish(team.coordinator, "task", description, { taskId })

        let result: RunResult
        try {
            const solution = await this.runPipeline(
                state,
                team,
                timeoutSeconds,
                controller
            )
            this.taskManager.complete(taskId, solution)
            this.publish(team.coordinator, "final", solution, { taskId })
            result = {
                taskId,
                status: "completed",
                solution,
                duration: state.duration ?? 0,
                state,
            }
        } catch (error) {
            const message = errorMessage(error)
            log.pipeline(
                "Run %s failed: %s",
                taskId,
                error instanceof Error ? (error.stack ?? message) : message
            )
            this.taskManager.fail(taskId, message)
            result = {
                taskId,
                status: "failed",
                solution: formatErrorReport(message),
                error: message,
                duration: state.duration ?? 0,
                state,
            }
        } finally {
            this.activeRuns.delete(controller)
        }

        await this.settle(team, taskId)
        this.eventBus.emit({
            type: "pipeline:complete",
            taskId,
            status: result.status,
            duration: result.duration,
        })
        return result
    }

    /** Status of a run still in progress; finished runs are released. */
    public getTaskStatus(taskId: string): PipelineStatus | undefined {
        return this.taskManager.get(taskId)?.status
    }

    /** Cancels every run in progress; they finish as failed runs. */
    public abort(): void {
        for (const controller of this.activeRuns) {
            controller.abort()
        }
    }

    private async runPipeline(
        state: PipelineState,
        team: Team,
        timeoutSeconds: number,
        controller: AbortController
    ): Promise<string> {
        const { taskId, description } = state
        const analysis = await team.coordinator.analyzeTask(
            description,
            controller.signal
        )
        this.taskManager.setAnalysis(taskId, analysis)
        this.eventBus.emit({
            type: "analysis:complete",
            taskId,
            frontend: analysis.subtasks.frontend.length,
            backend: analysis.subtasks.backend.length,
            integrationPoints: analysis.integrationPoints.length,
        })

        this.taskManager.setStatus(taskId, "executing")
        await this.executeSubtasks(
            { state, analysis, team },
            timeoutSeconds,
            controller.signal
        )

        this.taskManager.setStatus(taskId, "integrating")
        let solution: string
        if (
            analysis.subtasks.frontend.length === 0 &&
            analysis.subtasks.backend.length === 0
        ) {
            log.pipeline("Run %s has no sub-tasks; solving directly", taskId)
            solution = await team.coordinator.solveDirectly(
                description,
                controller.signal
            )
        } else {
            solution = await team.coordinator.integrateSolutions(
                analysis,
                joinSolutions(state.results.frontend),
                joinSolutions(state.results.backend),
                controller.signal
            )
        }
        if (solution.trim() === "") {
            log.pipeline("Run %s got a blank final answer; using the worker output", taskId)
            return fallbackSolution(state)
        }
        return solution
    }

    /**
     * Runs the sub-tasks of both specialisations under the run's deadline,
     * counted from the start of the run. When it fires, nothing new starts
     * and the calls in flight are cancelled; whatever finished before is
     * kept. Any other error cancels the siblings and is rethrown once the
     * pools have drained.
     */
    private async executeSubtasks(
        run: RunContext,
        timeoutSeconds: number,
        runSignal: AbortSignal
    ): Promise<void> {
        const { taskId } = run.state
        const budgetMs = timeoutSeconds * 1000
        const startedAt = run.state.startTime
        const remainingMs = Math.max(0, budgetMs - (this.clock() - startedAt))
        const execution = new AbortController()
        const failure: { failed: boolean; error?: unknown } = { failed: false }

        const onRunAbort = (): void => execution.abort()
        runSignal.addEventListener("abort", onRunAbort, { once: true })
        const onDeadline = (): void => {
            log.pipeline("Run %s reached its %ds deadline", taskId, timeoutSeconds)
            this.eventBus.emit({
                type: "deadline:reached",
                taskId,
                elapsedMs: this.clock() - startedAt,
            })
            execution.abort()
        }
        const deadline =
            remainingMs <= MAX_TIMER_DELAY_MS
                ? setTimeout(onDeadline, remainingMs)
                : undefined

        const skipReason = (): SkipReason =>
            failure.failed || runSignal.aborted ? "cancelled" : "deadline"

        const runSpecialization = async (
            specialization: Specialization
        ): Promise<void> => {
            const tasks = run.analysis.subtasks[specialization]
            const outcomes = await runPool(
                tasks,
                async (_task, index) => {
                    try {
                        await this.runSubtask(
                            run,
                            specialization,
                            index,
                            execution.signal
                        )
                    } catch (error) {
                        if (!isAbortError(error) && !failure.failed) {
                            failure.failed = true
                            failure.error = error
                            execution.abort()
                        }
                        throw error
                    }
                },
                {
                    concurrency: this.config.pipeline.maxConcurrency,
                    signal: execution.signal,
                    canStart: () => this.clock() - startedAt < budgetMs,
                }
            )

            outcomes.forEach((outcome, index) => {
                if (
                    outcome.status === "skipped" ||
                    (outcome.status === "rejected" &&
                        isAbortError(outcome.reason))
                ) {
                    this.taskManager.addSkipped(
                        taskId,
                        specialization,
                        index,
                        skipReason()
                    )
                }
            })
        }

        try {
            if (this.config.pipeline.parallelSpecializations) {
                await Promise.all(SPECIALIZATIONS.map(runSpecialization))
            } else {
                for (const specialization of SPECIALIZATIONS) {
                    await runSpecialization(specialization)
                }
            }
        } finally {
            clearTimeout(deadline)
            runSignal.removeEventListener("abort", onRunAbort)
        }

        if (failure.failed) {
            throw failure.error
        }
        if (runSignal.aborted) {
            throw new PipelineError(`Run ${taskId} was cancelled`)
        }
    }

    private async runSubtask(
        run: RunContext,
        specialization: Specialization,
        index: number,
        signal: AbortSignal
    ): Promise<void> {
        const { state, analysis, team } = run
        const { taskId } = state
        const tasks = analysis.subtasks[specialization]
        this.eventBus.emit({
            type: "subtask:start",
            taskId,
            specialization,
            index,
            total: tasks.length,
            description: tasks[index] ?? "",
        })

        const created = team.coordinator.createTaskAssignment(
            analysis,
            specialization,
            index
        )
        if (created.type === "error") {
            this.taskManager.addSkipped(
                taskId,
                specialization,
                index,
                "invalid_index"
            )
            return
        }

        const { assignment } = created
        const worker = team.workers[specialization]
        const meta = { taskId, specialization, subtaskIndex: index }
        this.publish(team.coordinator, "task", assignment.prompt, meta, worker)

        const solution = await worker.executeTask(assignment, signal)
        this.publish(worker, "result", solution, meta, team.coordinator)

        const review = await team.coordinator.reviewWork(
            analysis,
            specialization,
            solution,
            signal
        )
        this.publish(
            team.coordinator,
            "review",
            review.evaluation,
            { ...meta, approved: review.approved },
            worker
        )

        this.taskManager.addResult(taskId, specialization, {
            index,
            task: assignment.context.specificTask,
            solution,
            review,
            approved: review.approved,
        })
        this.eventBus.emit({
            type: "subtask:complete",
            taskId,
            specialization,
            index,
            approved: review.approved,
        })
    }

    private createTeam(): Team {
        const { agents, history, params } = this.config
        const shared = {
            client: this.client,
            params,
            maxHistory: history.maxEntries,
            historyStore: this.historyStore,
            eventBus: this.eventBus,
        }
        return {
            coordinator: new Coordinator({
                ...shared,
                identity: agents.coordinator,
                reviewPolicy: createReviewPolicy(this.config.pipeline.reviewPolicy),
                workerNames: {
                    frontend: agents.frontend.name,
                    backend: agents.backend.name,
                },
            }),
            workers: {
                frontend: new FrontendWorker({
                    ...shared,
                    identity: agents.frontend,
                }),
                backend: new BackendWorker({
                    ...shared,
                    identity: agents.backend,
                }),
            },
        }
    }

    private publish(
        sender: Coordinator | Worker,
        messageType: "task" | "result" | "review" | "final",
        content: string,
        metadata: Record<string, unknown>,
        recipient?: Coordinator | Worker
    ): void {
        this.messageBus.send(
            createMessage({
                content,
                senderId: sender.id,
                senderRole: sender.role,
                recipientId: recipient?.id,
                recipientRole: recipient?.role,
                messageType,
                metadata,
            })
        )
    }

    /**
     * History writes and the run archive; failures here never change the
     * result. The run's state is released afterwards.
     */
    private async settle(team: Team, taskId: string): Promise<void> {
        await Promise.all([
            team.coordinator.flush(),
            team.workers.frontend.flush(),
            team.workers.backend.flush(),
        ])
        try {
            await this.taskManager.archive(taskId)
        } catch (error) {
            log.pipeline("Could not archive run %s: %s", taskId, errorMessage(error))
        } finally {
            this.taskManager.release(taskId)
        }
    }
}
