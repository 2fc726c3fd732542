import { resolveConfig } from "./core/Config.js"
import { enableVerboseLogging } from "./core/Logger.js"
import { EventBus } from "./events/EventBus.js"
import { MessageBus } from "./events/MessageBus.js"
import { createCompletionClient } from "./llm/index.js"
import { Orchestrator } from "./orchestrator/Orchestrator.js"
import { createRenderer } from "./renderer/index.js"
import type {
    CompletionService,
    ModelDescriptor,
    PipelineStatus,
    ResolvedConfig,
    RunResult,
    SolveOptions,
    TrioConfig,
} from "./types.js"

/** Public entry point: one coordinator and two workers over a completion service. */
export class Trio {
    public readonly events: EventBus
    public readonly messageBus: MessageBus
    public readonly config: ResolvedConfig
    private readonly client: CompletionService
    private readonly orchestrator: Orchestrator

    constructor(config: TrioConfig = {}, clock?: () => number) {
        this.config = resolveConfig(config)
        if (this.config.verbose) {
            enableVerboseLogging()
        }
        this.events = new EventBus()
        this.messageBus = new MessageBus()
        this.client = createCompletionClient(this.config, config, this.events)
        this.orchestrator = new Orchestrator({
            config: this.config,
            client: this.client,
            eventBus: this.events,
            messageBus: this.messageBus,
            clock,
        })
    }

    public async solveTask(
        description: string,
        options?: SolveOptions
    ): Promise<RunResult> {
        const renderer = createRenderer(this.config.renderer, {
            verbose: this.config.verbose,
            runLogPath: this.config.runLogPath,
        })
        renderer?.attach(this.events)
        try {
            return await this.orchestrator.solveTask(description, options)
        } finally {
            renderer?.detach()
        }
    }

    public listModels(): Promise<ModelDescriptor[]> {
        return this.client.listModels()
    }

    public pullModel(name: string): Promise<boolean> {
        return this.client.pullModel(name)
    }

    /** `undefined` once the run has finished. */
    public getTaskStatus(taskId: string): PipelineStatus | undefined {
        return this.orchestrator.getTaskStatus(taskId)
    }

    public abort(): void {
        this.orchestrator.abort()
    }
}

export { resolveConfig } from "./core/Config.js"
export {
    CompletionAbortedError,
    CompletionConnectionError,
    ConfigError,
    PipelineError,
    TemplateError,
    TrioError,
} from "./core/errors.js"
export { EventBus } from "./events/EventBus.js"
export type { TrioEvent } from "./events/types.js"
export { MessageBus } from "./events/MessageBus.js"
export type { Message, MessageFilter } from "./events/MessageBus.js"
export { OllamaClient } from "./llm/OllamaClient.js"
export type {
    Assignment,
    CompletionService,
    ModelDescriptor,
    PipelineState,
    PipelineStatus,
    Review,
    RunResult,
    SolveOptions,
    Specialization,
    SubtaskResult,
    TaskAnalysis,
    TrioConfig,
} from "./types.js"
