#!/usr/bin/env node

import { writeFile } from "node:fs/promises"
import { resolve } from "node:path"
import { createInterface } from "node:readline/promises"

import { Command, InvalidArgumentError } from "commander"

import { errorMessage } from "./core/errors.js"
import { log } from "./core/Logger.js"
import {
    configFromEnv,
    loadEnvFile,
    loadRcConfig,
    mergeConfigs,
} from "./core/rcConfig.js"
import { Trio } from "./index.js"
import type { RendererType, RunResult, TrioConfig } from "./types.js"

const EXIT_COMMANDS = new Set(["exit", "quit"])

interface RunOptions {
    output?: string
    verbose?: boolean
    timeout?: number
    model?: string
    url?: string
    renderer?: RendererType
    concurrency?: number
    history: boolean
    interactive?: boolean
    cwd?: string
}

function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError("Expected a positive integer.")
    }
    return parsed
}

function parseSeconds(value: string): number {
    const parsed = Number.parseFloat(value)
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Expected a non-negative number of seconds.")
    }
    return parsed
}

function parseRenderer(value: string): RendererType {
    if (value === "terminal" || value === "log" || value === "none") {
        return value
    }
    throw new InvalidArgumentError("Expected terminal, log or none.")
}

function configFromFlags(options: RunOptions, workingDirectory: string): TrioConfig {
    const config: TrioConfig = { workingDirectory }
    if (options.model) config.model = options.model
    if (options.url) config.completion = { baseUrl: options.url }
    if (options.renderer) config.renderer = options.renderer
    if (options.verbose) config.verbose = true
    if (options.concurrency !== undefined) {
        config.pipeline = { maxConcurrency: options.concurrency }
    }
    if (!options.history) config.history = { persist: false }
    return config
}

async function buildConfig(
    flags: RunOptions | undefined,
    cwd: string
): Promise<TrioConfig> {
    await loadEnvFile(cwd)
    const rcConfig = await loadRcConfig(cwd)
    const layers: TrioConfig[] = [
        { workingDirectory: cwd, renderer: "terminal" },
        rcConfig,
        configFromEnv(),
    ]
    if (flags) layers.push(configFromFlags(flags, cwd))
    return mergeConfigs(...layers)
}

async function report(
    result: RunResult,
    output: string | undefined
): Promise<void> {
    if (output) {
        await writeFile(output, result.solution, "utf-8")
        console.error(`Solution written to ${output}`)
    } else {
        console.log(`\n${result.solution}`)
    }
    console.error(
        `\nStatus: ${result.status}  ·  ${(result.duration / 1000).toFixed(1)}s  ·  run ${result.taskId}`
    )
}

async function interactiveLoop(trio: Trio, options: RunOptions): Promise<number> {
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    let exitCode = 0
    try {
        for (;;) {
            const line = (await rl.question("\nTask (exit to quit)> ")).trim()
            if (EXIT_COMMANDS.has(line.toLowerCase())) break
            if (!line) continue
            const result = await trio.solveTask(line, {
                timeoutSeconds: options.timeout,
            })
            await report(result, options.output)
            exitCode = result.status === "completed" ? 0 : 1
        }
    } finally {
        rl.close()
    }
    return exitCode
}

const program = new Command()

program
    .name("trio")
    .description("A coordinator and two developer agents solving software tasks on a local model")
    .version("0.1.0")

program
    .command("run")
    .description("Decompose, delegate, review and integrate one task")
    .argument("[task]", "Task description")
    .option("-o, --output <file>", "Write the final solution to a file")
    .option("-v, --verbose", "Enable trio:* debug logging and detailed progress")
    .option("-t, --timeout <seconds>", "Time budget for the whole run; no sub-task starts after it", parseSeconds)
    .option("-m, --model <name>", "Model used by every agent")
    .option("--url <baseUrl>", "Completion service base URL")
    .option("--renderer <type>", "Progress output (terminal, log, none)", parseRenderer)
    .option("--concurrency <n>", "Sub-tasks run at once per specialisation", parsePositiveInt)
    .option("--no-history", "Do not write conversation history files")
    .option("-i, --interactive", "Read tasks from the terminal until exit or quit")
    .option("--cwd <path>", "Working directory (defaults to the current directory)")
    .action(async (task: string | undefined, options: RunOptions) => {
        const cwd = options.cwd ? resolve(options.cwd) : process.cwd()
        const config = await buildConfig(options, cwd)
        log.cli("Resolved CLI config: %o", { ...config, completionService: undefined })
        const trio = new Trio(config)

        process.on("SIGINT", () => {
            trio.abort()
        })

        if (options.interactive) {
            process.exitCode = await interactiveLoop(trio, options)
            return
        }

        if (!task?.trim()) {
            console.error("No task given. Pass a task or use --interactive.")
            process.exitCode = 1
            return
        }

        const result = await trio.solveTask(task, { timeoutSeconds: options.timeout })
        await report(result, options.output)
        process.exitCode = result.status === "completed" ? 0 : 1
    })

program
    .command("models")
    .description("List the models available on the completion service")
    .option("--url <baseUrl>", "Completion service base URL")
    .action(async (options: { url?: string }) => {
        const cwd = process.cwd()
        const config = await buildConfig(undefined, cwd)
        const trio = new Trio(
            mergeConfigs(config, options.url ? { completion: { baseUrl: options.url } } : {})
        )
        const models = await trio.listModels()
        if (models.length === 0) {
            console.log("No models found.")
            return
        }
        for (const model of models) {
            const size = model.size !== undefined ? `  ${(model.size / 1e9).toFixed(1)} GB` : ""
            console.log(`${model.name}${size}`)
        }
    })

program
    .command("pull")
    .description("Download a model to the completion service")
    .argument("<model>", "Model name, e.g. deepseek-r1:1.5b")
    .option("--url <baseUrl>", "Completion service base URL")
    .action(async (model: string, options: { url?: string }) => {
        const config = await buildConfig(undefined, process.cwd())
        const trio = new Trio(
            mergeConfigs(config, options.url ? { completion: { baseUrl: options.url } } : {})
        )
        const ok = await trio.pullModel(model)
        console.log(ok ? `Model ${model} is available.` : `Could not pull ${model}.`)
        process.exitCode = ok ? 0 : 1
    })

program.parseAsync().catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error))
    process.exit(1)
})
