import { randomUUID } from "node:crypto"
import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/** JSON documents under a base directory, one file per key. */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    /** Writes through a temp file and a rename, so readers never see half a document. */
    public async write(key: string, data: unknown): Promise<void> {
        const filePath = this.keyToPath(key)
        const tempPath = `${filePath}.tmp.${randomUUID().slice(0, 8)}`
        const content = JSON.stringify(data, null, 2)

        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence("Failed to write %s: %s", key, errorMessage(error))
            throw error
        }
    }

    /**
     * Read a document back. Returns null when the key was never written;
     * a document that fails `guard` is reported as an error.
     */
    public async read<T>(
        key: string,
        guard: (value: unknown) => value is T
    ): Promise<T | null> {
        const filePath = this.keyToPath(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isMissingFile(error)) {
                return null
            }
            log.persistence("Failed to read %s: %s", key, errorMessage(error))
            throw error
        }

        const parsed: unknown = JSON.parse(content)
        if (!guard(parsed)) {
            throw new Error(`Document ${key} does not have the expected shape`)
        }
        return parsed
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await access(this.keyToPath(key))
            return true
        } catch (error) {
            if (isMissingFile(error)) return false
            throw error
        }
    }

    public keyToPath(key: string): string {
        return join(this.basePath, `${key}.json`)
    }
}
