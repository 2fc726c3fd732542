import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { ConfigError } from "../../core/errors.js"
import {
    configFromEnv,
    loadEnvFile,
    loadRcConfig,
    mergeConfigs,
    parseEnvFile,
    parseRcConfig,
    RC_FILE,
} from "../../core/rcConfig.js"

describe("parseEnvFile", () => {
    it("reads assignments and ignores comments and blank lines", () => {
        const content = [
            "# local settings",
            "",
            "TRIO_MODEL=llama3:8b",
            'export TRIO_OLLAMA_URL="http://gpu-box:11434"',
            "EMPTY=",
            "not an assignment",
        ].join("\n")

        expect(parseEnvFile(content)).toEqual({
            TRIO_MODEL: "llama3:8b",
            TRIO_OLLAMA_URL: "http://gpu-box:11434",
            EMPTY: "",
        })
    })
})

describe("config files", () => {
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "trio-rc-"))
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("loads .env without overriding variables already set", async () => {
        await writeFile(join(tempDir, ".env"), "TRIO_MODEL=from-file\nTRIO_OLLAMA_URL=http://file:1\n")
        const env: NodeJS.ProcessEnv = { TRIO_MODEL: "from-shell" }

        await loadEnvFile(tempDir, env)

        expect(env.TRIO_MODEL).toBe("from-shell")
        expect(env.TRIO_OLLAMA_URL).toBe("http://file:1")
    })

    it("treats a missing .env as empty", async () => {
        const env: NodeJS.ProcessEnv = {}
        await loadEnvFile(tempDir, env)
        expect(env).toEqual({})
    })

    it("returns an empty config when there is no rc file", async () => {
        await expect(loadRcConfig(tempDir)).resolves.toEqual({})
    })

    it("loads and validates the rc file", async () => {
        await writeFile(
            join(tempDir, RC_FILE),
            JSON.stringify({
                model: "llama3:8b",
                renderer: "log",
                pipeline: { timeoutSeconds: 120, reviewPolicy: "keyword" },
                unknown: true,
            })
        )

        await expect(loadRcConfig(tempDir)).resolves.toEqual({
            model: "llama3:8b",
            renderer: "log",
            pipeline: { timeoutSeconds: 120, reviewPolicy: "keyword" },
        })
    })

    it("rejects an rc file that is not JSON", async () => {
        await writeFile(join(tempDir, RC_FILE), "{ model: ")
        await expect(loadRcConfig(tempDir)).rejects.toBeInstanceOf(ConfigError)
    })
})

describe("parseRcConfig", () => {
    it("names the field that has the wrong type", () => {
        expect(() => parseRcConfig({ pipeline: { timeoutSeconds: "soon" } })).toThrow(
            '.triorc.json: "pipeline.timeoutSeconds" has the wrong type'
        )
        expect(() => parseRcConfig({ renderer: "fancy" })).toThrow(
            '.triorc.json: "renderer" has the wrong type'
        )
    })

    it("rejects sections that are not objects", () => {
        expect(() => parseRcConfig({ history: [1, 2] })).toThrow(
            '.triorc.json: "history" must be an object'
        )
        expect(() => parseRcConfig("model")).toThrow(ConfigError)
    })
})

describe("mergeConfigs", () => {
    it("lets later layers win key by key inside sections", () => {
        const merged = mergeConfigs(
            {
                completion: { baseUrl: "http://a:1", maxRetries: 2 },
                pipeline: { timeoutSeconds: 10 },
            },
            { completion: { maxRetries: 5 }, model: "m" }
        )

        expect(merged).toEqual({
            model: "m",
            completion: { baseUrl: "http://a:1", maxRetries: 5 },
            pipeline: { timeoutSeconds: 10 },
            history: {},
            agents: {},
        })
    })
})

describe("configFromEnv", () => {
    it("reads the URL and model variables", () => {
        expect(
            configFromEnv({ TRIO_OLLAMA_URL: "http://gpu-box:11434", TRIO_MODEL: "m" })
        ).toEqual({ completion: { baseUrl: "http://gpu-box:11434" }, model: "m" })
        expect(configFromEnv({})).toEqual({})
    })
})
