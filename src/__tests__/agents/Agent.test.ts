import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { Agent, type AgentOptions } from "../../agents/Agent.js"
import { CompletionAbortedError } from "../../core/errors.js"
import { EventBus } from "../../events/EventBus.js"
import type { TrioEvent } from "../../events/types.js"
import { FileStore } from "../../persistence/FileStore.js"
import { HistoryStore } from "../../persistence/HistoryStore.js"
import type { ChatMessage } from "../../types.js"
import {
    createScriptedService,
    type ScriptedService,
} from "../helpers/scriptedCompletion.js"

const NOW = new Date("2024-05-01T10:00:00.000Z")

function createAgent(
    client: ScriptedService,
    overrides: Partial<AgentOptions> = {}
): Agent {
    return new Agent({
        role: "coordinator",
        identity: { name: "Tester", model: "test-model", systemPrompt: "sys" },
        client,
        params: { temperature: 0.1 },
        maxHistory: 10,
        id: "agent-01",
        now: () => NOW,
        ...overrides,
    })
}

describe("Agent.process", () => {
    it("appends the agent envelope as a CONTEXT block", async () => {
        const client = createScriptedService([["", "answer"]])
        const agent = createAgent(client)

        await expect(agent.process("Hello", { task: "x" })).resolves.toBe("answer")

        const envelope = {
            agent: { name: "Tester", role: "coordinator", id: "agent-01" },
            timestamp: "2024-05-01T10:00:00.000Z",
            task: "x",
        }
        expect(client.calls).toHaveLength(1)
        expect(client.calls[0].prompt).toBe(
            `Hello\n\nCONTEXT:\n${JSON.stringify(envelope, null, 2)}`
        )
        expect(client.calls[0].options).toEqual({
            model: "test-model",
            system: "sys",
            params: { temperature: 0.1 },
        })
    })

    it("records each exchange and keeps only the newest maxHistory entries", async () => {
        const client = createScriptedService([["", (prompt) => `re: ${prompt.split("\n")[0]}`]])
        const agent = createAgent(client, { maxHistory: 2 })

        await agent.process("first")
        await agent.process("second", { step: 2 })
        await agent.process("third")

        expect(agent.getHistory()).toEqual([
            {
                timestamp: NOW.toISOString(),
                message: "second",
                response: "re: second",
                context: { step: 2 },
            },
            {
                timestamp: NOW.toISOString(),
                message: "third",
                response: "re: third",
                context: null,
            },
        ])
    })

    it("refuses to start once the signal is aborted", async () => {
        const client = createScriptedService([["", "never"]])
        const agent = createAgent(client)
        const controller = new AbortController()
        controller.abort()

        await expect(
            agent.process("Hello", undefined, controller.signal)
        ).rejects.toBeInstanceOf(CompletionAbortedError)
        expect(client.calls).toHaveLength(0)
        expect(agent.getHistory()).toEqual([])
    })

    it("emits an agent:response event", async () => {
        const eventBus = new EventBus()
        const events: TrioEvent[] = []
        eventBus.on((event) => events.push(event))
        const agent = createAgent(createScriptedService([["", "12345"]]), { eventBus })

        await agent.process("Hello")

        expect(events).toHaveLength(1)
        expect(events[0]).toMatchObject({
            type: "agent:response",
            agentId: "agent-01",
            role: "coordinator",
            name: "Tester",
            characters: 5,
        })
    })
})

describe("Agent.chat", () => {
    it("adds the CONTEXT block to the first user message of a copy", async () => {
        const client = createScriptedService([["", "reply"]])
        const agent = createAgent(client)
        const messages: ChatMessage[] = [
            { role: "system", content: "rules" },
            { role: "user", content: "first" },
            { role: "assistant", content: "ok" },
            { role: "user", content: "second" },
        ]

        await expect(agent.chat(messages, { topic: "t" })).resolves.toBe("reply")

        const sent = client.chatMessages[0]
        expect(sent[1].content.startsWith("first\n\nCONTEXT:\n")).toBe(true)
        expect(sent[1].content).toContain('"topic": "t"')
        expect(sent[3].content).toBe("second")
        expect(messages[1].content).toBe("first")
        expect(agent.getHistory()[0]).toMatchObject({
            message: "second",
            response: "reply",
        })
    })
})

describe("Agent history persistence", () => {
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "trio-agent-"))
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("writes the conversation log through the history store", async () => {
        const historyStore = new HistoryStore(new FileStore(tempDir), () => NOW)
        const agent = createAgent(createScriptedService([["", "saved"]]), {
            historyStore,
        })

        await agent.process("persist me")
        await agent.flush()

        const loaded = await historyStore.load("coordinator", "agent-01", NOW)
        expect(loaded).toEqual([
            {
                timestamp: NOW.toISOString(),
                message: "persist me",
                response: "saved",
                context: null,
            },
        ])
    })
})
