import type { EventBus } from "../events/EventBus.js"
import type { Specialization } from "../types.js"

export type RenderNodeStatus =
    | "pending"
    | "running"
    | "completed"
    | "rejected"
    | "failed"
    | "skipped"

export interface RenderNode {
    id: string
    label: string
    status: RenderNodeStatus
    specialization?: Specialization
    startedAt?: number
    completedAt?: number
    summary?: string
    children: RenderNode[]
}

export interface CreateRendererOptions {
    verbose?: boolean
    runLogPath?: string
}

/** Where the terminal renderer draws its frames; each frame replaces the last. */
export interface FrameSink {
    update(frame: string): void
    done(): void
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
