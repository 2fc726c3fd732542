import { describe, expect, it } from "vitest"

import { EventBus } from "../../events/EventBus.js"
import { formatDuration, LogRenderer, truncate } from "../../renderer/LogRenderer.js"

const col = (text: string): string => text.padEnd(16)

describe("LogRenderer.formatEvent", () => {
    const renderer = new LogRenderer({}, () => undefined)

    it("formats run lifecycle events", () => {
        expect(
            renderer.formatEvent({
                type: "pipeline:start",
                taskId: "abcd1234",
                description: "Build it",
            })
        ).toBe(`${col("run:start")}abcd1234  "Build it"`)
        expect(
            renderer.formatEvent({
                type: "pipeline:status",
                taskId: "abcd1234",
                from: "analyzing",
                to: "executing",
            })
        ).toBe(`${col("run:status")}${col("abcd1234")}  analyzing → executing`)
        expect(
            renderer.formatEvent({
                type: "pipeline:complete",
                taskId: "abcd1234",
                status: "completed",
                duration: 65_000,
            })
        ).toBe(`${col("run:done")}completed  1m05s`)
    })

    it("formats sub-task outcomes with one-based indices", () => {
        expect(
            renderer.formatEvent({
                type: "subtask:complete",
                taskId: "t",
                specialization: "frontend",
                index: 0,
                approved: true,
            })
        ).toBe(`${col("subtask:done")}${col("Front-end")}  1  approved`)
        expect(
            renderer.formatEvent({
                type: "subtask:skipped",
                taskId: "t",
                specialization: "backend",
                index: 2,
                reason: "deadline",
            })
        ).toBe(`${col("subtask:skip")}${col("Back-end")}  3  deadline`)
    })

    it("formats retries and the deadline", () => {
        expect(
            renderer.formatEvent({
                type: "completion:retry",
                endpoint: "api/generate",
                attempt: 1,
                maxRetries: 3,
                delayMs: 2000,
                reason: "HTTP 503",
            })
        ).toBe(`${col("retry")}${col("api/generate")}  attempt 1/3  "HTTP 503"`)
        expect(
            renderer.formatEvent({ type: "deadline:reached", taskId: "t", elapsedMs: 1500 })
        ).toBe(`${col("deadline")}1.5s`)
    })

    it("shows agent activity only when verbose", () => {
        const event = {
            type: "agent:response" as const,
            agentId: "c1",
            role: "coordinator" as const,
            name: "Coordinator",
            durationMs: 2000,
            characters: 42,
        }
        expect(renderer.formatEvent(event)).toBeNull()
        expect(new LogRenderer({ verbose: true }, () => undefined).formatEvent(event)).toBe(
            `${col("agent:response")}${col("Coordinator")}  c1  2.0s  42 chars`
        )
    })
})

describe("LogRenderer attached to a bus", () => {
    it("prefixes lines with the time since the first event and stops on detach", () => {
        const lines: string[] = []
        let now = 10_000
        const renderer = new LogRenderer({}, (line) => lines.push(line), () => now)
        const bus = new EventBus()
        renderer.attach(bus)

        bus.emit({ type: "pipeline:start", taskId: "t1", description: "x" })
        now += 1500
        bus.emit({ type: "deadline:reached", taskId: "t1", elapsedMs: 1500 })
        renderer.detach()
        bus.emit({ type: "deadline:reached", taskId: "t1", elapsedMs: 9 })

        expect(lines).toEqual([
            `[00:00.0] ${col("run:start")}t1  "x"`,
            `[00:01.5] ${col("deadline")}1.5s`,
        ])
    })
})

describe("formatting helpers", () => {
    it("truncates with an ellipsis", () => {
        expect(truncate("abcdef", 4)).toBe("abc…")
        expect(truncate("abc", 4)).toBe("abc")
    })

    it("formats durations", () => {
        expect(formatDuration(1234)).toBe("1.2s")
        expect(formatDuration(125_000)).toBe("2m05s")
    })
})
