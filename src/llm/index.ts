import type { EventBus } from "../events/EventBus.js"
import type { CompletionService, ResolvedConfig, TrioConfig } from "../types.js"
import { OllamaClient } from "./OllamaClient.js"

/**
 * The completion service for a run: the injected one when the config
 * carries it, otherwise an HTTP client for the configured Ollama server.
 */
export function createCompletionClient(
    resolved: ResolvedConfig,
    config: Pick<TrioConfig, "completionService" | "fetch">,
    eventBus?: EventBus
): CompletionService {
    if (config.completionService) {
        return config.completionService
    }
    return new OllamaClient({
        settings: resolved.completion,
        defaultParams: resolved.params,
        fetch: config.fetch,
        eventBus,
    })
}

export { OllamaClient } from "./OllamaClient.js"
export type { OllamaClientOptions } from "./OllamaClient.js"
