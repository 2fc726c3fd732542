import { EventEmitter } from "node:events"

import type { TrioEvent } from "./types.js"

type EventHandler = (event: TrioEvent) => void

export class EventBus {
    private emitter: EventEmitter = new EventEmitter()

    public on(handler: EventHandler): void {
        this.emitter.on("event", handler)
    }

    public emit(event: TrioEvent): void {
        this.emitter.emit("event", event)
    }

    public off(handler: EventHandler): void {
        this.emitter.off("event", handler)
    }
}
