import { readFile } from "node:fs/promises"
import { join } from "node:path"

import type {
    CompletionSettings,
    HistorySettings,
    PipelineSettings,
    RendererType,
    ReviewPolicyType,
    TrioConfig,
} from "../types.js"
import { ConfigError, errorMessage } from "./errors.js"

export const RC_FILE = ".triorc.json"

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/** Parse `KEY=value` lines; `export ` prefixes, comments and quotes are handled. */
export function parseEnvFile(content: string): Record<string, string> {
    const values: Record<string, string> = {}
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^\s*export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex).trim()
        const value = trimmed
            .slice(eqIndex + 1)
            .trim()
            .replace(/^(["'])(.*)\1$/, "$2")
        values[key] = value
    }
    return values
}

/** Variables already present in the environment are left alone. */
export async function loadEnvFile(
    cwd: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch (error) {
        if (isMissingFile(error)) return
        throw error
    }
    for (const [key, value] of Object.entries(parseEnvFile(content))) {
        if (env[key] === undefined) env[key] = value
    }
}

const isString = (value: unknown): value is string => typeof value === "string"
const isNumber = (value: unknown): value is number => typeof value === "number"
const isBoolean = (value: unknown): value is boolean =>
    typeof value === "boolean"
const isRenderer = (value: unknown): value is RendererType =>
    value === "terminal" || value === "log" || value === "none"
const isReviewPolicy = (value: unknown): value is ReviewPolicyType =>
    value === "always" || value === "keyword"

/** Copy `source[key]` into `target` when present, rejecting a value of the wrong type. */
function copyField<T extends object, K extends keyof T & string>(
    target: T,
    source: Fields,
    key: K,
    accept: (value: unknown) => value is NonNullable<T[K]>,
    path = ""
): void {
    const value = source[key]
    if (value === undefined) return
    if (!accept(value)) {
        throw new ConfigError(`${RC_FILE}: "${path}${key}" has the wrong type`)
    }
    target[key] = value
}

function section(source: Fields, key: string): Fields | undefined {
    const value = source[key]
    if (value === undefined) return undefined
    if (!isRecord(value)) {
        throw new ConfigError(`${RC_FILE}: "${key}" must be an object`)
    }
    return value
}

/** Validate the fields of a parsed rc document; unknown keys are ignored. */
export function parseRcConfig(raw: unknown): TrioConfig {
    if (!isRecord(raw)) {
        throw new ConfigError(`${RC_FILE} must contain a JSON object`)
    }
    const config: TrioConfig = {}
    copyField(config, raw, "model", isString)
    copyField(config, raw, "renderer", isRenderer)
    copyField(config, raw, "verbose", isBoolean)
    copyField(config, raw, "runLogPath", isString)

    const completion = section(raw, "completion")
    if (completion) {
        const settings: Partial<CompletionSettings> = {}
        const path = "completion."
        copyField(settings, completion, "baseUrl", isString, path)
        copyField(settings, completion, "maxRetries", isNumber, path)
        copyField(settings, completion, "requestTimeoutMs", isNumber, path)
        copyField(settings, completion, "pullTimeoutMs", isNumber, path)
        copyField(settings, completion, "backoffBaseMs", isNumber, path)
        copyField(settings, completion, "maxConcurrentRequests", isNumber, path)
        config.completion = settings
    }

    const history = section(raw, "history")
    if (history) {
        const settings: Partial<HistorySettings> = {}
        copyField(settings, history, "maxEntries", isNumber, "history.")
        copyField(settings, history, "persist", isBoolean, "history.")
        copyField(settings, history, "directory", isString, "history.")
        config.history = settings
    }

    const pipeline = section(raw, "pipeline")
    if (pipeline) {
        const settings: Partial<PipelineSettings> = {}
        const path = "pipeline."
        copyField(settings, pipeline, "timeoutSeconds", isNumber, path)
        copyField(settings, pipeline, "maxConcurrency", isNumber, path)
        copyField(settings, pipeline, "parallelSpecializations", isBoolean, path)
        copyField(settings, pipeline, "reviewPolicy", isReviewPolicy, path)
        copyField(settings, pipeline, "archiveRuns", isBoolean, path)
        config.pipeline = settings
    }

    return config
}

export async function loadRcConfig(cwd: string): Promise<TrioConfig> {
    const rcPath = join(cwd, RC_FILE)
    let content: string
    try {
        content = await readFile(rcPath, "utf-8")
    } catch (error) {
        if (isMissingFile(error)) return {}
        throw error
    }

    let parsed: unknown
    try {
        parsed = JSON.parse(content)
    } catch (error) {
        throw new ConfigError(`Invalid JSON in ${rcPath}: ${errorMessage(error)}`)
    }
    return parseRcConfig(parsed)
}

/**
 * Layer the sources: rc file, then environment, then flags. Nested
 * sections are merged key by key.
 */
export function mergeConfigs(...layers: TrioConfig[]): TrioConfig {
    return layers.reduce<TrioConfig>(
        (merged, layer) => ({
            ...merged,
            ...layer,
            completion: { ...merged.completion, ...layer.completion },
            history: { ...merged.history, ...layer.history },
            pipeline: { ...merged.pipeline, ...layer.pipeline },
            agents: { ...merged.agents, ...layer.agents },
        }),
        {}
    )
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): TrioConfig {
    const config: TrioConfig = {}
    if (env.TRIO_OLLAMA_URL) config.completion = { baseUrl: env.TRIO_OLLAMA_URL }
    if (env.TRIO_MODEL) config.model = env.TRIO_MODEL
    return config
}
