import { randomUUID } from "node:crypto"

import { CompletionAbortedError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { HistoryStore } from "../persistence/HistoryStore.js"
import type {
    AgentIdentity,
    AgentRole,
    ChatMessage,
    CompletionService,
    ConversationEntry,
    GenerationParams,
} from "../types.js"

export type AgentContext = Record<string, unknown>

export interface AgentOptions {
    role: AgentRole
    identity: AgentIdentity
    client: CompletionService
    params?: GenerationParams
    maxHistory: number
    /** Conversation logs are only written when a store is given. */
    historyStore?: HistoryStore
    eventBus?: EventBus
    id?: string
    now?: () => Date
}

export type RoleAgentOptions = Omit<AgentOptions, "role">

const CONTEXT_HEADER = "\n\nCONTEXT:\n"

export class Agent {
    public readonly id: string
    public readonly name: string
    public readonly role: AgentRole
    public readonly model: string
    public readonly systemPrompt: string

    protected readonly client: CompletionService
    protected readonly eventBus?: EventBus
    private readonly params?: GenerationParams
    private readonly maxHistory: number
    private readonly historyStore?: HistoryStore
    private readonly now: () => Date
    private history: ConversationEntry[] = []
    private pendingWrite: Promise<void> = Promise.resolve()

    constructor(options: AgentOptions) {
        this.id = options.id ?? randomUUID().slice(0, 8)
        this.name = options.identity.name
        this.role = options.role
        this.model = options.identity.model
        this.systemPrompt = options.identity.systemPrompt
        this.client = options.client
        this.eventBus = options.eventBus
        this.params = options.params
        this.maxHistory = options.maxHistory
        this.historyStore = options.historyStore
        this.now = options.now ?? (() => new Date())

        log.agent("Agent %s (%s) created with id %s", this.name, this.role, this.id)
    }

    /** Send one prompt, with the agent envelope appended as a CONTEXT block. */
    public async process(
        message: string,
        context?: AgentContext,
        signal?: AbortSignal
    ): Promise<string> {
        this.throwIfAborted(signal)
        const prompt = `${message}${CONTEXT_HEADER}${JSON.stringify(this.buildEnvelope(context), null, 2)}`

        const startedAt = Date.now()
        const response = await this.client.generate(prompt, {
            model: this.model,
            system: this.systemPrompt,
            params: this.params,
            signal,
        })
        this.recordResponse(Date.now() - startedAt, response)

        this.appendHistory(message, response, context)
        return response
    }

    /**
     * Continue a conversation. The caller's messages are copied; the
     * CONTEXT block goes on the first user message only.
     */
    public async chat(
        messages: readonly ChatMessage[],
        context?: AgentContext,
        signal?: AbortSignal
    ): Promise<string> {
        this.throwIfAborted(signal)
        const envelope = JSON.stringify(this.buildEnvelope(context), null, 2)
        const outgoing = messages.map((entry) => ({ ...entry }))
        const firstUser = outgoing.find((entry) => entry.role === "user")
        if (firstUser) {
            firstUser.content = `${firstUser.content}${CONTEXT_HEADER}${envelope}`
        }

        const startedAt = Date.now()
        const response = await this.client.chat(outgoing, {
            model: this.model,
            system: this.systemPrompt,
            params: this.params,
            signal,
        })
        this.recordResponse(Date.now() - startedAt, response)

        const last = outgoing[outgoing.length - 1]
        this.appendHistory(last?.content ?? "", response, context)
        return response
    }

    public getHistory(): readonly ConversationEntry[] {
        return this.history
    }

    /** Resolves once the latest history write has settled. */
    public async flush(): Promise<void> {
        await this.pendingWrite
    }

    protected buildEnvelope(context?: AgentContext): AgentContext {
        return {
            agent: { name: this.name, role: this.role, id: this.id },
            timestamp: this.now().toISOString(),
            ...context,
        }
    }

    private throwIfAborted(signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new CompletionAbortedError(`${this.name} was cancelled`)
        }
    }

    private recordResponse(durationMs: number, response: string): void {
        log.agent(
            "Agent %s answered in %dms (%d chars)",
            this.name,
            durationMs,
            response.length
        )
        this.eventBus?.emit({
            type: "agent:response",
            agentId: this.id,
            role: this.role,
            name: this.name,
            durationMs,
            characters: response.length,
        })
    }

    private appendHistory(
        message: string,
        response: string,
        context?: AgentContext
    ): void {
        this.history.push({
            timestamp: this.now().toISOString(),
            message,
            response,
            context: context ?? null,
        })
        if (this.history.length > this.maxHistory) {
            this.history = this.history.slice(-this.maxHistory)
        }

        if (this.historyStore) {
            this.pendingWrite = this.historyStore.save(
                this.role,
                this.id,
                this.history
            )
        }
    }
}
