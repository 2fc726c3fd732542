import { log } from "../core/Logger.js"
import { renderTemplate } from "../core/template.js"
import type {
    Assignment,
    Solution,
    Specialization,
    TaskIntent,
} from "../types.js"
import { classifyIntent, type IntentKeywords } from "../workflow/parsers.js"
import { Agent, type RoleAgentOptions } from "./Agent.js"

export interface WorkerTemplates {
    classification: string
    mixed: string
}

/**
 * A specialised developer. Each assignment is first classified as design,
 * implementation or mixed work, then handled by the matching path.
 */
export abstract class Worker extends Agent {
    public readonly specialization: Specialization
    protected abstract readonly keywords: IntentKeywords
    protected abstract readonly templates: WorkerTemplates

    constructor(specialization: Specialization, options: RoleAgentOptions) {
        super({ ...options, role: specialization })
        this.specialization = specialization
    }

    public async executeTask(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        const intent = await this.classify(assignment, signal)
        log.worker(
            "%s treats sub-task %d as %s",
            this.name,
            assignment.subtaskIndex,
            intent
        )
        this.eventBus?.emit({
            type: "worker:intent",
            agentId: this.id,
            specialization: this.specialization,
            intent,
        })

        const solution = await this.runPath(intent, assignment, signal)
        log.worker(
            "%s finished: %s",
            this.name,
            assignment.context.specificTask.slice(0, 50)
        )
        return solution
    }

    protected abstract executeDesign(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution>

    protected abstract executeImplementation(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution>

    protected executeMixed(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        return this.process(
            renderTemplate(this.templates.mixed, {
                assignment: assignment.prompt,
            }),
            { ...assignment.context },
            signal
        )
    }

    /** Ask the model a question about the assignment, with the assignment as context. */
    protected ask(
        template: string,
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<string> {
        return this.process(
            renderTemplate(template, { assignment: assignment.prompt }),
            { assignment: assignment.prompt },
            signal
        )
    }

    private runPath(
        intent: TaskIntent,
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        switch (intent) {
            case "design":
                return this.executeDesign(assignment, signal)
            case "implementation":
                return this.executeImplementation(assignment, signal)
            case "mixed":
                return this.executeMixed(assignment, signal)
        }
    }

    private async classify(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<TaskIntent> {
        const answer = await this.ask(
            this.templates.classification,
            assignment,
            signal
        )
        return classifyIntent(answer.trim(), this.keywords)
    }
}
