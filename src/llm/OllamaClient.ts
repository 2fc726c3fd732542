import {
    CompletionAbortedError,
    CompletionConnectionError,
    errorMessage,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { Semaphore } from "../core/Semaphore.js"
import type { EventBus } from "../events/EventBus.js"
import type {
    ChatMessage,
    CompletionOptions,
    CompletionService,
    CompletionSettings,
    FetchFn,
    GenerationParams,
    ModelDescriptor,
} from "../types.js"

export interface OllamaClientOptions {
    settings: CompletionSettings
    defaultParams?: GenerationParams
    fetch?: FetchFn
    eventBus?: EventBus
}

interface RequestSpec {
    method: "GET" | "POST"
    body?: Record<string, unknown>
    signal?: AbortSignal
    timeoutMs?: number
}

type AttemptResult =
    | { ok: true; text: string }
    | { ok: false; error: Error }

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

function readPath(data: unknown, path: string[]): unknown {
    let current = data
    for (const key of path) {
        if (!isRecord(current)) return undefined
        current = current[key]
    }
    return current
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer)
            reject(new CompletionAbortedError("Aborted during retry backoff"))
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort)
            resolve()
        }, ms)
        signal?.addEventListener("abort", onAbort, { once: true })
    })
}

/**
 * HTTP client for an Ollama-compatible completion service.
 *
 * Every request is retried on transport failure (rejected fetch, per-call
 * timeout, non-2xx status) with exponential backoff, up to
 * `settings.maxRetries` attempts in total. Bodies that are not the
 * expected JSON are not retried: the call resolves to empty content.
 */
export class OllamaClient implements CompletionService {
    private readonly settings: CompletionSettings
    private readonly defaultParams: GenerationParams
    private readonly fetchFn: FetchFn
    private readonly slots: Semaphore
    private readonly eventBus?: EventBus

    constructor(options: OllamaClientOptions) {
        this.settings = options.settings
        this.defaultParams = options.defaultParams ?? {}
        this.fetchFn = options.fetch ?? globalThis.fetch
        this.slots = new Semaphore(options.settings.maxConcurrentRequests)
        this.eventBus = options.eventBus
    }

    public async generate(
        prompt: string,
        options: CompletionOptions
    ): Promise<string> {
        log.client(
            "Sending prompt to %s: %s",
            options.model,
            prompt.slice(0, 100)
        )
        const data = await this.request("api/generate", {
            method: "POST",
            body: {
                model: options.model,
                prompt,
                ...this.buildParams(options),
            },
            signal: options.signal,
        })
        return this.readText(data, ["response"], "api/generate")
    }

    public async chat(
        messages: ChatMessage[],
        options: CompletionOptions
    ): Promise<string> {
        log.client(
            "Sending %d messages to %s",
            messages.length,
            options.model
        )
        const data = await this.request("api/chat", {
            method: "POST",
            body: {
                model: options.model,
                messages,
                ...this.buildParams(options),
            },
            signal: options.signal,
        })
        return this.readText(data, ["message", "content"], "api/chat")
    }

    public async listModels(): Promise<ModelDescriptor[]> {
        const data = await this.request("api/tags", { method: "GET" })
        const models = readPath(data, ["models"])
        if (!Array.isArray(models)) {
            log.client("api/tags returned no model list")
            return []
        }
        const descriptors: ModelDescriptor[] = []
        for (const entry of models) {
            if (!isRecord(entry) || typeof entry.name !== "string") continue
            descriptors.push({
                name: entry.name,
                size: typeof entry.size === "number" ? entry.size : undefined,
                digest:
                    typeof entry.digest === "string" ? entry.digest : undefined,
                modifiedAt:
                    typeof entry.modified_at === "string"
                        ? entry.modified_at
                        : undefined,
            })
        }
        return descriptors
    }

    /** Resolves true when the model is (or already was) available locally. */
    public async pullModel(name: string): Promise<boolean> {
        try {
            const models = await this.listModels()
            if (models.some((model) => model.name === name)) {
                log.client("Model %s is already available", name)
                return true
            }

            log.client("Pulling model %s", name)
            const data = await this.request("api/pull", {
                method: "POST",
                body: { name, stream: false },
                timeoutMs: this.settings.pullTimeoutMs,
            })
            const error = readPath(data, ["error"])
            if (typeof error === "string") {
                log.client("Pull of %s failed: %s", name, error)
                return false
            }
            log.client("Model %s pulled", name)
            return true
        } catch (error) {
            log.client("Pull of %s failed: %s", name, errorMessage(error))
            return false
        }
    }

    private buildParams(options: CompletionOptions): Record<string, unknown> {
        const params: Record<string, unknown> = {
            ...this.defaultParams,
            ...options.params,
            stream: false,
        }
        if (options.system) {
            params.system = options.system
        }
        return params
    }

    private readText(data: unknown, path: string[], endpoint: string): string {
        const text = readPath(data, path)
        if (typeof text === "string") {
            log.client("Response received: %s", text.slice(0, 100))
            return text
        }
        log.client("Malformed %s response; using empty content", endpoint)
        return ""
    }

    private async request(
        endpoint: string,
        init: RequestSpec
    ): Promise<unknown> {
        const url = `${this.settings.baseUrl}/${endpoint}`
        const maxRetries = this.settings.maxRetries
        let lastError: Error | undefined

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            if (init.signal?.aborted) {
                throw new CompletionAbortedError(`Request to ${url} cancelled`)
            }

            const result = await this.slots.run(
                () => this.attempt(url, init),
                init.signal
            )

            if (result.ok) {
                return this.parseBody(result.text, endpoint)
            }

            lastError = result.error
            if (attempt === maxRetries) break

            const delay = this.settings.backoffBaseMs * 2 ** attempt
            log.client(
                "Request to %s failed (attempt %d/%d): %s. Retrying in %dms",
                url,
                attempt,
                maxRetries,
                result.error.message,
                delay
            )
            this.eventBus?.emit({
                type: "completion:retry",
                endpoint,
                attempt,
                maxRetries,
                delayMs: delay,
                reason: result.error.message,
            })
            await sleep(delay, init.signal)
        }

        log.client(
            "Giving up on %s after %d attempts: %s",
            url,
            maxRetries,
            lastError?.message ?? "unknown error"
        )
        throw new CompletionConnectionError(
            `Could not reach the completion service at ${url} after ${maxRetries} attempts: ${lastError?.message ?? "unknown error"}`,
            maxRetries,
            lastError
        )
    }

    private async attempt(
        url: string,
        init: RequestSpec
    ): Promise<AttemptResult> {
        const controller = new AbortController()
        const timeoutMs = init.timeoutMs ?? this.settings.requestTimeoutMs
        const timer = setTimeout(() => controller.abort(), timeoutMs)
        const onAbort = (): void => controller.abort()
        init.signal?.addEventListener("abort", onAbort, { once: true })

        try {
            const response = await this.fetchFn(url, {
                method: init.method,
                headers:
                    init.body !== undefined
                        ? { "Content-Type": "application/json" }
                        : undefined,
                body:
                    init.body !== undefined
                        ? JSON.stringify(init.body)
                        : undefined,
                signal: controller.signal,
            })
            const text = await response.text()
            if (!response.ok) {
                return {
                    ok: false,
                    error: new Error(
                        `HTTP ${response.status}: ${text.slice(0, 200)}`
                    ),
                }
            }
            return { ok: true, text }
        } catch (error) {
            if (init.signal?.aborted) {
                throw new CompletionAbortedError(
                    `Request to ${url} cancelled`,
                    toError(error)
                )
            }
            if (controller.signal.aborted) {
                return {
                    ok: false,
                    error: new Error(`Timed out after ${timeoutMs}ms`),
                }
            }
            return { ok: false, error: toError(error) }
        } finally {
            clearTimeout(timer)
            init.signal?.removeEventListener("abort", onAbort)
        }
    }

    private parseBody(text: string, endpoint: string): unknown {
        try {
            const parsed: unknown = JSON.parse(text)
            return parsed
        } catch (error) {
            log.client(
                "Could not parse %s response body: %s",
                endpoint,
                errorMessage(error)
            )
            return undefined
        }
    }
}
