import { AGENT_NAMES, SYSTEM_PROMPTS } from "../agents/roles.js"
import type {
    AgentIdentity,
    AgentRole,
    CompletionSettings,
    GenerationParams,
    HistorySettings,
    PipelineSettings,
    ResolvedConfig,
    TrioConfig,
} from "../types.js"
import { ConfigError } from "./errors.js"

export const DEFAULT_MODEL = "deepseek-r1:1.5b"

const DEFAULT_COMPLETION: CompletionSettings = {
    baseUrl: "http://localhost:11434",
    maxRetries: 3,
    requestTimeoutMs: 60_000,
    pullTimeoutMs: 3_600_000,
    backoffBaseMs: 1000,
    maxConcurrentRequests: 2,
}

const DEFAULT_PARAMS: Required<GenerationParams> = {
    temperature: 0.7,
    top_p: 0.9,
    max_tokens: 2000,
}

const DEFAULT_HISTORY: HistorySettings = {
    maxEntries: 50,
    persist: true,
    directory: "conversation_history",
}

const DEFAULT_PIPELINE: PipelineSettings = {
    timeoutSeconds: 300,
    maxConcurrency: 2,
    parallelSpecializations: true,
    reviewPolicy: "always",
    archiveRuns: false,
}

export function getDefaultIdentity(
    role: AgentRole,
    overrideModel?: string
): AgentIdentity {
    return {
        name: AGENT_NAMES[role],
        model: overrideModel ?? DEFAULT_MODEL,
        systemPrompt: SYSTEM_PROMPTS[role],
    }
}

/**
 * Merge a partial configuration over the defaults and check the numeric
 * settings. The result is passed explicitly to every component.
 */
export function resolveConfig(config: TrioConfig = {}): ResolvedConfig {
    const completion = { ...DEFAULT_COMPLETION, ...config.completion }
    const history = { ...DEFAULT_HISTORY, ...config.history }
    const pipeline = { ...DEFAULT_PIPELINE, ...config.pipeline }

    requirePositiveInteger("completion.maxRetries", completion.maxRetries)
    requirePositiveInteger(
        "completion.maxConcurrentRequests",
        completion.maxConcurrentRequests
    )
    requireNonNegative(
        "completion.requestTimeoutMs",
        completion.requestTimeoutMs
    )
    requireNonNegative("completion.backoffBaseMs", completion.backoffBaseMs)
    requirePositiveInteger("history.maxEntries", history.maxEntries)
    requirePositiveInteger("pipeline.maxConcurrency", pipeline.maxConcurrency)
    requireNonNegative("pipeline.timeoutSeconds", pipeline.timeoutSeconds)
    if (!/^https?:\/\//.test(completion.baseUrl)) {
        throw new ConfigError(
            `completion.baseUrl must be an http(s) URL, got "${completion.baseUrl}"`
        )
    }

    const identity = (role: AgentRole): AgentIdentity => ({
        ...getDefaultIdentity(role, config.model),
        ...config.agents?.[role],
    })

    return {
        completion: {
            ...completion,
            baseUrl: completion.baseUrl.replace(/\/+$/, ""),
        },
        params: { ...DEFAULT_PARAMS, ...config.params },
        agents: {
            coordinator: identity("coordinator"),
            frontend: identity("frontend"),
            backend: identity("backend"),
        },
        history,
        pipeline,
        workingDirectory: config.workingDirectory ?? process.cwd(),
        renderer: config.renderer ?? "none",
        verbose: config.verbose ?? false,
        runLogPath: config.runLogPath,
    }
}

function requirePositiveInteger(key: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${key} must be a positive integer, got ${value}`)
    }
}

export function requireNonNegative(key: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(
            `${key} must be a non-negative number, got ${value}`
        )
    }
}
