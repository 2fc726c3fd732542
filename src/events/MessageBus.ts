import { randomUUID } from "node:crypto"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"

export type MessageType = "text" | "task" | "result" | "review" | "final" | (string & {})

export interface Message {
    id: string
    content: string
    senderId: string
    senderRole: string
    recipientId?: string
    recipientRole?: string
    messageType: MessageType
    metadata: Record<string, unknown>
    timestamp: string
}

export type FilterField =
    | "id"
    | "senderId"
    | "senderRole"
    | "recipientId"
    | "recipientRole"
    | "messageType"

export interface MessageFilter {
    fields?: Partial<Record<FilterField, string>>
    metadata?: Record<string, unknown>
}

export type MessageHandler = (message: Message) => void

/** Wire form of a message, with snake_case keys. */
export interface MessageRecord {
    id: string
    content: string
    sender_id: string
    sender_role: string
    recipient_id: string | null
    recipient_role: string | null
    message_type: string
    metadata: Record<string, unknown>
    timestamp: string
}

export interface CreateMessageInput {
    content: string
    senderId: string
    senderRole: string
    recipientId?: string
    recipientRole?: string
    messageType?: MessageType
    metadata?: Record<string, unknown>
}

export function createMessage(input: CreateMessageInput): Message {
    return {
        id: randomUUID(),
        content: input.content,
        senderId: input.senderId,
        senderRole: input.senderRole,
        recipientId: input.recipientId,
        recipientRole: input.recipientRole,
        messageType: input.messageType ?? "text",
        metadata: { ...input.metadata },
        timestamp: new Date().toISOString(),
    }
}

export function toRecord(message: Message): MessageRecord {
    return {
        id: message.id,
        content: message.content,
        sender_id: message.senderId,
        sender_role: message.senderRole,
        recipient_id: message.recipientId ?? null,
        recipient_role: message.recipientRole ?? null,
        message_type: message.messageType,
        metadata: { ...message.metadata },
        timestamp: message.timestamp,
    }
}

export function fromRecord(record: MessageRecord): Message {
    return {
        id: record.id,
        content: record.content,
        senderId: record.sender_id,
        senderRole: record.sender_role,
        recipientId: record.recipient_id ?? undefined,
        recipientRole: record.recipient_role ?? undefined,
        messageType: record.message_type || "text",
        metadata: { ...record.metadata },
        timestamp: record.timestamp,
    }
}

/**
 * Every named field must equal the message's value, and every metadata key
 * must be present with an equal value. An empty filter matches everything.
 */
export function matchesFilter(message: Message, filter: MessageFilter): boolean {
    for (const [field, expected] of Object.entries(filter.fields ?? {})) {
        if (!isFilterField(field) || message[field] !== expected) return false
    }
    for (const [key, expected] of Object.entries(filter.metadata ?? {})) {
        if (!(key in message.metadata) || message.metadata[key] !== expected) {
            return false
        }
    }
    return true
}

const FILTER_FIELDS: readonly string[] = [
    "id",
    "senderId",
    "senderRole",
    "recipientId",
    "recipientRole",
    "messageType",
] satisfies FilterField[]

function isFilterField(field: string): field is FilterField {
    return FILTER_FIELDS.includes(field)
}

interface Subscription {
    filter: MessageFilter
    handler: MessageHandler
}

/** In-memory publish/subscribe relay between agents. Keeps every message sent. */
export class MessageBus {
    private readonly messages: Message[] = []
    private readonly subscriptions: Subscription[] = []

    public send(message: Message): string {
        this.messages.push(message)
        log.bus(
            "%s %s -> %s",
            message.messageType,
            message.senderRole,
            message.recipientRole ?? "*"
        )
        this.notify(message)
        return message.id
    }

    /** Returns a function that removes this subscription. */
    public subscribe(filter: MessageFilter, handler: MessageHandler): () => void {
        const subscription: Subscription = { filter, handler }
        this.subscriptions.push(subscription)
        return () => {
            const index = this.subscriptions.indexOf(subscription)
            if (index !== -1) this.subscriptions.splice(index, 1)
        }
    }

    /**
     * Remove the first subscription of `handler` whose filter is
     * structurally equal to `filter`.
     */
    public unsubscribe(filter: MessageFilter, handler: MessageHandler): boolean {
        const key = filterKey(filter)
        const index = this.subscriptions.findIndex(
            (entry) => entry.handler === handler && filterKey(entry.filter) === key
        )
        if (index === -1) return false
        this.subscriptions.splice(index, 1)
        return true
    }

    public getMessages(filter?: MessageFilter): Message[] {
        if (!filter) return [...this.messages]
        return this.messages.filter((message) => matchesFilter(message, filter))
    }

    public subscriberCount(): number {
        return this.subscriptions.length
    }

    private notify(message: Message): void {
        for (const { filter, handler } of [...this.subscriptions]) {
            if (!matchesFilter(message, filter)) continue
            try {
                handler(message)
            } catch (error) {
                log.bus(
                    "Subscriber failed on message %s: %s",
                    message.id,
                    errorMessage(error)
                )
            }
        }
    }
}

function filterKey(filter: MessageFilter): string {
    const sorted = (record: Record<string, unknown> | undefined): [string, unknown][] =>
        Object.entries(record ?? {}).sort(([a], [b]) => a.localeCompare(b))
    return JSON.stringify([sorted(filter.fields), sorted(filter.metadata)])
}
