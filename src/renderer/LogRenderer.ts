import type { EventBus } from "../events/EventBus.js"
import type { TrioEvent } from "../events/types.js"
import { getRoleLabel } from "./roleLabels.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

export type LineWriter = (line: string) => void

/** One timestamped line per pipeline event, for logs and CI output. */
export class LogRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly write: LineWriter
    private readonly clock: () => number
    private bus: EventBus | null = null
    private handler: ((event: TrioEvent) => void) | null = null
    private startedAt = 0

    constructor(
        options: CreateRendererOptions = {},
        write: LineWriter = (line) => process.stdout.write(`${line}\n`),
        clock: () => number = Date.now
    ) {
        this.verbose = options.verbose ?? false
        this.write = write
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
        this.bus = null
        this.handler = null
    }

    private handleEvent(event: TrioEvent): void {
        const line = this.formatEvent(event)
        if (line) {
            this.write(`[${this.formatElapsed()}] ${line}`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = this.clock()
        const seconds = (this.clock() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }

    public formatEvent(event: TrioEvent): string | null {
        switch (event.type) {
            case "pipeline:start":
                return `run:start       ${event.taskId}  "${truncate(event.description, 60)}"`
            case "pipeline:status":
                return `run:status      ${pad(event.taskId)}  ${event.from} → ${event.to}`
            case "pipeline:complete":
                return `run:done        ${event.status}  ${formatDuration(event.duration)}`
            case "analysis:complete":
                return `analysis        ${event.frontend} front-end  ${event.backend} back-end  ${event.integrationPoints} integration points`
            case "subtask:start":
                return `subtask:start   ${pad(getRoleLabel(event.specialization))}  ${event.index + 1}/${event.total}  "${truncate(event.description, 40)}"`
            case "subtask:complete":
                return `subtask:done    ${pad(getRoleLabel(event.specialization))}  ${event.index + 1}  ${event.approved ? "approved" : "rejected"}`
            case "subtask:skipped":
                return `subtask:skip    ${pad(getRoleLabel(event.specialization))}  ${event.index + 1}  ${event.reason}`
            case "deadline:reached":
                return `deadline        ${formatDuration(event.elapsedMs)}`
            case "completion:retry":
                return `retry           ${pad(event.endpoint)}  attempt ${event.attempt}/${event.maxRetries}  "${truncate(event.reason, 60)}"`
            case "agent:response":
                return this.verbose
                    ? `agent:response  ${pad(event.name)}  ${event.agentId}  ${formatDuration(event.durationMs)}  ${event.characters} chars`
                    : null
            case "worker:intent":
                return this.verbose
                    ? `worker:intent   ${pad(getRoleLabel(event.specialization))}  ${event.intent}`
                    : null
        }
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}

export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}
