import { writeFileSync } from "node:fs"

import chalk from "chalk"
import logUpdate from "log-update"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { TrioEvent } from "../events/types.js"
import { SPECIALIZATIONS, type Specialization } from "../types.js"
import { formatDuration, truncate } from "./LogRenderer.js"
import { ROLE_LABELS } from "./roleLabels.js"
import type {
    CreateRendererOptions,
    FrameSink,
    Renderer,
    RenderNode,
    RenderNodeStatus,
} from "./types.js"

const STATUS_GLYPHS: Record<RenderNodeStatus, string> = {
    pending: chalk.dim("·"),
    running: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    rejected: chalk.magenta("✎"),
    failed: chalk.red("✗"),
    skipped: chalk.yellow("↷"),
}

const MAX_VERBOSE_LINES = 6

const logUpdateSink: FrameSink = {
    update: (frame) => logUpdate(frame),
    done: () => logUpdate.done(),
}

/** Live tree of the run: analysis, then one branch per specialisation. */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly runLogPath: string | undefined
    private readonly frames: FrameSink
    private readonly clock: () => number
    private bus: EventBus | null = null
    private handler: ((event: TrioEvent) => void) | null = null
    private taskDescription = ""
    private runStartedAt = 0
    private tickInterval: ReturnType<typeof setInterval> | null = null
    private analysisNode: RenderNode = emptyNode("analysis", "Analysis")
    private branches: Record<Specialization, RenderNode> = freshBranches()
    private activity: string[] = []
    private retries = 0
    private finished: "completed" | "failed" | null = null
    private lastRenderedOutput = ""

    constructor(
        options: CreateRendererOptions = {},
        frames: FrameSink = logUpdateSink,
        clock: () => number = Date.now
    ) {
        this.verbose = options.verbose ?? false
        this.runLogPath = options.runLogPath
        this.frames = frames
        this.clock = clock
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: TrioEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.stopTick()
        this.frames.done()
        this.bus = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: TrioEvent): void {
        switch (event.type) {
            case "pipeline:start":
                this.reset(event.description)
                this.startTick()
                break
            case "pipeline:status":
                if (event.from === "analyzing") {
                    this.analysisNode.status = event.to === "failed" ? "failed" : "completed"
                    this.analysisNode.completedAt = this.clock()
                }
                break
            case "analysis:complete":
                this.analysisNode.summary = `${event.frontend} front-end, ${event.backend} back-end, ${event.integrationPoints} integration points`
                break
            case "pipeline:complete":
                this.finished = event.status
                this.stopTick()
                this.render()
                this.flushRunLog()
                return
            case "subtask:start":
                this.onSubtaskStart(event)
                break
            case "subtask:complete":
                if (event.approved) {
                    this.onSubtaskDone(event.specialization, event.index, "completed")
                } else {
                    this.onSubtaskDone(event.specialization, event.index, "rejected", "not approved")
                }
                break
            case "subtask:skipped":
                this.onSubtaskDone(event.specialization, event.index, "skipped", event.reason)
                break
            case "deadline:reached":
                this.pushActivity(chalk.yellow(`deadline reached after ${formatDuration(event.elapsedMs)}`))
                break
            case "completion:retry":
                this.retries++
                this.pushActivity(`retry ${event.attempt}/${event.maxRetries} on ${event.endpoint}: ${truncate(event.reason, 60)}`)
                break
            case "agent:response":
                this.pushActivity(`${event.name} answered in ${formatDuration(event.durationMs)} (${event.characters} chars)`)
                break
            case "worker:intent":
                this.pushActivity(`${ROLE_LABELS[event.specialization]} treats its sub-task as ${event.intent}`)
                break
        }
        this.render()
    }

    private reset(description: string): void {
        this.taskDescription = description
        this.runStartedAt = this.clock()
        this.analysisNode = {
            ...emptyNode("analysis", "Analysis"),
            status: "running",
            startedAt: this.runStartedAt,
        }
        this.branches = freshBranches()
        this.activity = []
        this.retries = 0
        this.finished = null
    }

    private onSubtaskStart(
        event: Extract<TrioEvent, { type: "subtask:start" }>
    ): void {
        const branch = this.branches[event.specialization]
        branch.status = "running"
        if (!branch.startedAt) branch.startedAt = this.clock()
        branch.children.push({
            id: `${event.specialization}-${event.index}`,
            label: `Sub-task ${event.index + 1}/${event.total}: ${truncate(event.description, 40)}`,
            status: "running",
            specialization: event.specialization,
            startedAt: this.clock(),
            children: [],
        })
    }

    private onSubtaskDone(
        specialization: Specialization,
        index: number,
        status: RenderNodeStatus,
        summary?: string
    ): void {
        const branch = this.branches[specialization]
        const id = `${specialization}-${index}`
        let node = branch.children.find((child) => child.id === id)
        if (!node) {
            node = emptyNode(id, `Sub-task ${index + 1}`)
            branch.children.push(node)
        }
        node.status = status
        node.completedAt = this.clock()
        node.summary = summary

        const settled = branch.children.every(
            (child) => child.status !== "running" && child.status !== "pending"
        )
        if (settled) {
            branch.status = "completed"
            branch.completedAt = this.clock()
        }
    }

    private pushActivity(line: string): void {
        if (!this.verbose) return
        this.activity.push(line)
        if (this.activity.length > MAX_VERBOSE_LINES) {
            this.activity.shift()
        }
    }

    private render(): void {
        const lines: string[] = []

        lines.push(
            `${chalk.bold.cyan("trio")}  ${chalk.dim(truncate(this.taskDescription, 80))}`
        )
        lines.push(chalk.dim("│"))

        const roots = [
            this.analysisNode,
            ...SPECIALIZATIONS.map((specialization) => this.branches[specialization]),
        ]
        roots.forEach((node, i) => {
            const isLast = i === roots.length - 1
            this.renderNode(node, lines, isLast ? "└" : "├", isLast ? " " : "│")
        })

        const subtasks = SPECIALIZATIONS.flatMap(
            (specialization) => this.branches[specialization].children
        )
        const done = subtasks.filter((node) => node.status === "completed").length
        const elapsed = this.runStartedAt
            ? formatDuration(this.clock() - this.runStartedAt)
            : ""

        lines.push(chalk.dim("│"))
        lines.push(
            chalk.dim(
                `${this.finished ? "├" : "└"}─ ${done}/${subtasks.length} sub-tasks approved  ·  ${this.retries} retries${elapsed ? `  ·  ${elapsed}` : ""}`
            )
        )

        for (const line of this.activity) {
            lines.push(chalk.dim(`   ${line}`))
        }

        if (this.finished) {
            lines.push(chalk.dim("│"))
            lines.push(
                this.finished === "failed"
                    ? chalk.red("╰─ Run failed")
                    : chalk.green("╰─ Run completed")
            )
        }

        const output = lines.join("\n")
        this.lastRenderedOutput = output
        this.frames.update(output)
    }

    private flushRunLog(): void {
        if (!this.runLogPath) return
        try {
            const header = `Input: ${this.taskDescription}\n\n---\n\n`
            writeFileSync(this.runLogPath, header + this.lastRenderedOutput, "utf-8")
        } catch (error) {
            log.cli("Could not write run log %s: %s", this.runLogPath, errorMessage(error))
        }
    }

    private renderNode(
        node: RenderNode,
        lines: string[],
        connector: string,
        childPrefix: string
    ): void {
        const elapsed = formatNodeElapsed(node, this.clock())
        lines.push(
            [
                chalk.dim(`${connector}─`),
                STATUS_GLYPHS[node.status],
                node.label,
                elapsed ? chalk.dim(elapsed) : "",
                node.summary ? chalk.dim(node.summary) : "",
            ]
                .filter(Boolean)
                .join("  ")
        )

        node.children.forEach((child, i) => {
            const isLastChild = i === node.children.length - 1
            this.renderNode(
                child,
                lines,
                `${childPrefix}  ${isLastChild ? "└" : "├"}`,
                `${childPrefix}  ${isLastChild ? " " : "│"}`
            )
        })
    }
}

function emptyNode(id: string, label: string): RenderNode {
    return { id, label, status: "pending", children: [] }
}

function freshBranches(): Record<Specialization, RenderNode> {
    return {
        frontend: { ...emptyNode("frontend", ROLE_LABELS.frontend), specialization: "frontend" },
        backend: { ...emptyNode("backend", ROLE_LABELS.backend), specialization: "backend" },
    }
}

function formatNodeElapsed(node: RenderNode, now: number): string {
    if (!node.startedAt) return ""
    const end = node.completedAt ?? now
    return formatDuration(end - node.startedAt)
}
