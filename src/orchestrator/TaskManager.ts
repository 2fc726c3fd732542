import { randomBytes } from "node:crypto"

import { PipelineError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { SkipReason } from "../events/types.js"
import type { FileStore } from "../persistence/FileStore.js"
import type {
    PipelineState,
    PipelineStatus,
    Specialization,
    SubtaskResult,
    TaskAnalysis,
} from "../types.js"

const TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
    analyzing: ["executing", "failed"],
    executing: ["integrating", "failed"],
    integrating: ["completed", "failed"],
    completed: [],
    failed: [],
}

export interface TaskManagerOptions {
    /** Finished runs are archived under `runs/<taskId>` when a store is given. */
    store?: FileStore
    eventBus?: EventBus
    clock?: () => number
}

export function createTaskId(): string {
    return randomBytes(4).toString("hex")
}

/** Owns the PipelineState of every run in progress in this process. */
export class TaskManager {
    private readonly store?: FileStore
    private readonly eventBus?: EventBus
    private readonly clock: () => number
    private readonly runs: Map<string, PipelineState> = new Map()

    constructor(options: TaskManagerOptions = {}) {
        this.store = options.store
        this.eventBus = options.eventBus
        this.clock = options.clock ?? Date.now
    }

    public create(description: string): PipelineState {
        const state: PipelineState = {
            taskId: createTaskId(),
            description,
            status: "analyzing",
            analysis: null,
            results: { frontend: [], backend: [] },
            skipped: { frontend: [], backend: [] },
            startTime: this.clock(),
        }
        this.runs.set(state.taskId, state)
        log.pipeline("Run %s created", state.taskId)
        return state
    }

    public get(taskId: string): PipelineState | undefined {
        return this.runs.get(taskId)
    }

    public setAnalysis(taskId: string, analysis: TaskAnalysis): void {
        this.require(taskId).analysis = analysis
    }

    public setStatus(taskId: string, status: PipelineStatus): PipelineState {
        const state = this.require(taskId)
        const from = state.status
        if (!TRANSITIONS[from].includes(status)) {
            throw new PipelineError(
                `Run ${taskId} cannot move from ${from} to ${status}`
            )
        }
        state.status = status
        log.pipeline("Run %s: %s -> %s", taskId, from, status)
        this.eventBus?.emit({ type: "pipeline:status", taskId, from, to: status })
        return state
    }

    /** Results stay ordered by sub-task index whatever order they finish in. */
    public addResult(
        taskId: string,
        specialization: Specialization,
        result: SubtaskResult
    ): void {
        const list = this.require(taskId).results[specialization]
        const at = list.findIndex((existing) => existing.index > result.index)
        if (at === -1) list.push(result)
        else list.splice(at, 0, result)
    }

    public addSkipped(
        taskId: string,
        specialization: Specialization,
        index: number,
        reason: SkipReason
    ): void {
        this.require(taskId).skipped[specialization].push(index)
        log.pipeline(
            "Run %s: %s sub-task %d skipped (%s)",
            taskId,
            specialization,
            index,
            reason
        )
        this.eventBus?.emit({
            type: "subtask:skipped",
            taskId,
            specialization,
            index,
            reason,
        })
    }

    public complete(taskId: string, finalSolution: string): PipelineState {
        const state = this.setStatus(taskId, "completed")
        state.finalSolution = finalSolution
        this.stamp(state)
        return state
    }

    /** Marks the run failed from whatever status it had reached. */
    public fail(taskId: string, error: string): PipelineState {
        const state = this.require(taskId)
        if (state.status !== "failed") {
            this.setStatus(taskId, "failed")
        }
        state.error = error
        this.stamp(state)
        return state
    }

    public async archive(taskId: string): Promise<void> {
        if (!this.store) return
        await this.store.write(`runs/${taskId}`, this.require(taskId))
        log.pipeline("Run %s archived", taskId)
    }

    /** Drops a finished run; its state lives on only in the RunResult and the archive. */
    public release(taskId: string): void {
        this.runs.delete(taskId)
    }

    private stamp(state: PipelineState): void {
        state.endTime = this.clock()
        state.duration = state.endTime - state.startTime
    }

    private require(taskId: string): PipelineState {
        const state = this.runs.get(taskId)
        if (!state) {
            throw new PipelineError(`Unknown run ${taskId}`)
        }
        return state
    }
}
