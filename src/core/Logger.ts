import createDebug from "debug"

const APP_PREFIX = "trio"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "client", "pipeline")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Turn on every trio namespace, keeping whatever DEBUG already enables.
 */
export function enableVerboseLogging(): void {
    const current = createDebug.disable()
    const namespaces = [current, `${APP_PREFIX}:*`].filter(Boolean).join(",")
    createDebug.enable(namespaces)
}

/**
 * Pre-defined loggers for each subsystem.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.client("POST %s (attempt %d)", endpoint, attempt)
 * log.pipeline("Run %s: %o", taskId, { status })
 * ```
 *
 * Enable via env: `DEBUG=trio:*`
 * Enable specific: `DEBUG=trio:client,trio:pipeline`
 */
export const log = {
    client: createLogger("client"),
    agent: createLogger("agent"),
    coordinator: createLogger("coordinator"),
    worker: createLogger("worker"),
    pipeline: createLogger("pipeline"),
    bus: createLogger("bus"),
    persistence: createLogger("persistence"),
    cli: createLogger("cli"),
}
