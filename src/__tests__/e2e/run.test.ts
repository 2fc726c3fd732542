import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterAll, beforeAll, describe, expect, it } from "vitest"

import { Trio } from "../../index.js"
import { createFakeFetch } from "../helpers/fakeFetch.js"
import {
    createScriptedService,
    pipelineRoutes,
} from "../helpers/scriptedCompletion.js"

describe("e2e run (completion service scripted)", () => {
    let tempDir: string

    beforeAll(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "trio-e2e-"))
    })

    afterAll(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("solves a task end to end through the public facade", async () => {
        const service = createScriptedService(
            pipelineRoutes({
                frontend: ["Login form"],
                backend: ["Session endpoint"],
                integration: ["POST /session"],
            })
        )
        const trio = new Trio({
            workingDirectory: tempDir,
            renderer: "none",
            history: { persist: false },
            completionService: service,
        })
        const kinds: string[] = []
        trio.events.on((event) => kinds.push(event.type))

        const result = await trio.solveTask("Add a login page")

        expect(result.status).toBe("completed")
        expect(result.solution).toBe("Integrated solution")
        expect(result.taskId).toMatch(/^[0-9a-f]{8}$/)
        expect(kinds[0]).toBe("pipeline:start")
        expect(kinds[kinds.length - 1]).toBe("pipeline:complete")
        expect(trio.messageBus.getMessages({ fields: { messageType: "final" } })).toHaveLength(1)
    })

    it("sends every agent to the configured model", async () => {
        const service = createScriptedService(pipelineRoutes({}))
        const trio = new Trio({
            workingDirectory: tempDir,
            history: { persist: false },
            model: "tiny:1b",
            completionService: service,
        })

        await trio.solveTask("Say hi")

        expect(service.calls.map((call) => call.options.model)).toEqual([
            "tiny:1b",
            "tiny:1b",
            "tiny:1b",
        ])
    })

    it("talks to the HTTP service when no completion service is injected", async () => {
        const fake = createFakeFetch([{ json: { models: [{ name: "tiny:1b" }] } }])
        const trio = new Trio({
            workingDirectory: tempDir,
            completion: { baseUrl: "http://ollama.test/" },
            fetch: fake.fetch,
        })

        const models = await trio.listModels()

        expect(models.map((model) => model.name)).toEqual(["tiny:1b"])
        expect(fake.calls[0].url).toBe("http://ollama.test/api/tags")
    })
})
