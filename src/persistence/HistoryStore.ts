import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { AgentRole, ConversationEntry } from "../types.js"
import type { FileStore } from "./FileStore.js"

function isConversationEntry(value: unknown): value is ConversationEntry {
    return (
        typeof value === "object" &&
        value !== null &&
        "timestamp" in value &&
        typeof value.timestamp === "string" &&
        "message" in value &&
        typeof value.message === "string" &&
        "response" in value &&
        typeof value.response === "string"
    )
}

function isConversationLog(value: unknown): value is ConversationEntry[] {
    return Array.isArray(value) && value.every(isConversationEntry)
}

export function formatDay(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, "0")
    const day = String(date.getDate()).padStart(2, "0")
    return `${date.getFullYear()}${month}${day}`
}

export function historyKey(role: AgentRole, agentId: string, date: Date): string {
    return `${role}_${agentId}_${formatDay(date)}`
}

/**
 * Per-agent conversation logs, one document per agent and day.
 * Writes to the same key are queued behind each other; a failed write is
 * logged and the queue moves on.
 */
export class HistoryStore {
    private readonly store: FileStore
    private readonly now: () => Date
    private readonly pending: Map<string, Promise<void>> = new Map()

    constructor(store: FileStore, now: () => Date = () => new Date()) {
        this.store = store
        this.now = now
    }

    public save(
        role: AgentRole,
        agentId: string,
        entries: readonly ConversationEntry[]
    ): Promise<void> {
        const key = historyKey(role, agentId, this.now())
        const snapshot = [...entries]
        const previous = this.pending.get(key) ?? Promise.resolve()
        const next = previous
            .then(() => this.store.write(key, snapshot))
            .then(() => {
                log.persistence("Saved %d history entries to %s", snapshot.length, key)
            })
            .catch((error: unknown) => {
                log.persistence(
                    "Could not save history %s: %s",
                    key,
                    errorMessage(error)
                )
            })
        this.pending.set(key, next)
        return next
    }

    public async load(
        role: AgentRole,
        agentId: string,
        date: Date = this.now()
    ): Promise<ConversationEntry[] | null> {
        return this.store.read(historyKey(role, agentId, date), isConversationLog)
    }

    public async flush(): Promise<void> {
        await Promise.all(this.pending.values())
    }
}
