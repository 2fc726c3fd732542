import { log } from "../core/Logger.js"
import type { TaskIntent } from "../types.js"

export interface Decomposition {
    frontend: string[]
    backend: string[]
    integrationPoints: string[]
    source: "json" | "embedded" | "fallback"
}

const ITEM_TEXT_KEYS = ["description", "task", "title", "name"] as const

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

function tryParseObject(text: string): Record<string, unknown> | null {
    try {
        const parsed: unknown = JSON.parse(text)
        return isRecord(parsed) ? parsed : null
    } catch {
        return null
    }
}

/**
 * Yield every balanced `{...}` span in order of its opening brace.
 * Braces inside JSON string literals are ignored.
 */
export function* findJsonObjects(text: string): Generator<string> {
    for (let start = text.indexOf("{"); start !== -1; ) {
        const end = findClosingBrace(text, start)
        if (end !== -1) yield text.slice(start, end + 1)
        start = text.indexOf("{", start + 1)
    }
}

function findClosingBrace(text: string, start: number): number {
    let depth = 0
    let inString = false
    let escaped = false
    for (let i = start; i < text.length; i++) {
        const ch = text[i]
        if (inString) {
            if (escaped) escaped = false
            else if (ch === "\\") escaped = true
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === "{") depth++
        else if (ch === "}") {
            depth--
            if (depth === 0) return i
        }
    }
    return -1
}

export function toStringList(value: unknown): string[] {
    if (!Array.isArray(value)) return []
    const items: string[] = []
    for (const item of value) {
        if (typeof item === "string") {
            if (item.trim()) items.push(item.trim())
            continue
        }
        if (!isRecord(item)) continue
        for (const key of ITEM_TEXT_KEYS) {
            const text = item[key]
            if (typeof text === "string" && text.trim()) {
                items.push(text.trim())
                break
            }
        }
    }
    return items
}

/**
 * Recover the sub-task lists from a model response: the whole response as
 * JSON, then the first embedded object that parses, then empty lists.
 */
export function parseDecomposition(content: string): Decomposition {
    let source: Decomposition["source"] = "json"
    let parsed = tryParseObject(content.trim())

    if (!parsed) {
        source = "embedded"
        for (const candidate of findJsonObjects(content)) {
            parsed = tryParseObject(candidate)
            if (parsed) break
        }
    }

    if (!parsed) {
        log.coordinator("Decomposition JSON not found; using empty lists")
        return {
            frontend: [],
            backend: [],
            integrationPoints: [],
            source: "fallback",
        }
    }

    return {
        frontend: toStringList(parsed.frontend_tasks),
        backend: toStringList(parsed.backend_tasks),
        integrationPoints: toStringList(parsed.integration_points),
        source,
    }
}

export interface IntentKeywords {
    design: readonly string[]
    implementation: readonly string[]
}

const DIGIT_INTENTS: Record<string, TaskIntent> = {
    "1": "design",
    "2": "implementation",
    "3": "mixed",
}

function containsWord(text: string, word: string): boolean {
    const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    return new RegExp(`\\b${escaped}\\b`, "i").test(text)
}

/**
 * Map a classification answer to an intent. The first digit 1-3 wins;
 * keywords are only consulted when no digit is present.
 */
export function classifyIntent(
    response: string,
    keywords: IntentKeywords
): TaskIntent {
    const digit = response.match(/[123]/)
    if (digit) return DIGIT_INTENTS[digit[0]] ?? "mixed"
    if (keywords.design.some((word) => containsWord(response, word))) {
        return "design"
    }
    if (keywords.implementation.some((word) => containsWord(response, word))) {
        return "implementation"
    }
    return "mixed"
}

interface MarkerHit {
    index: number
    length: number
}

function findMarker(
    text: string,
    markers: readonly string[]
): MarkerHit | null {
    let best: MarkerHit | null = null
    for (const marker of markers) {
        const index = text.indexOf(marker)
        if (index !== -1 && (best === null || index < best.index)) {
            best = { index, length: marker.length }
        }
    }
    return best
}

function cleanSection(text: string): string | null {
    const cleaned = text.replace(/^\s*:/, "").trim()
    return cleaned || null
}

export interface Sections {
    first: string | null
    second: string | null
}

/**
 * Cut a response into two headed sections. The second header is located
 * first, so a first header that is a substring of the second one (e.g.
 * "FUNCTIONAL REQUIREMENTS" inside "NON-FUNCTIONAL REQUIREMENTS") is only
 * searched for before it.
 */
export function extractSections(
    text: string,
    firstMarkers: readonly string[],
    secondMarkers: readonly string[]
): Sections {
    const second = findMarker(text, secondMarkers)
    const head = second ? text.slice(0, second.index) : text
    const first = findMarker(head, firstMarkers)
    return {
        first: first
            ? cleanSection(head.slice(first.index + first.length))
            : null,
        second: second
            ? cleanSection(text.slice(second.index + second.length))
            : null,
    }
}

const BULLET = /^[ \t]*[-*][ \t]+(.+?)[ \t]*$/gm

export function extractBullets(text: string): string[] {
    return Array.from(text.matchAll(BULLET), (match) => match[1])
}

export interface ListWithDetails {
    items: string[]
    details: string | null
}

/**
 * Bullet items under a list header plus the free text under a details
 * header. Without the list header everything before the details header
 * is scanned for bullets.
 */
export function extractListAndDetails(
    text: string,
    listMarkers: readonly string[],
    detailMarkers: readonly string[]
): ListWithDetails {
    const details = findMarker(text, detailMarkers)
    const head = details ? text.slice(0, details.index) : text
    const list = findMarker(head, listMarkers)
    const listText = list ? head.slice(list.index + list.length) : head
    return {
        items: extractBullets(listText),
        details: details
            ? cleanSection(text.slice(details.index + details.length))
            : null,
    }
}

/** Text before the first colon of a sub-task, used as its name. */
export function candidateName(task: string, fallback: string): string {
    const colon = task.indexOf(":")
    if (colon === -1) return fallback
    return task.slice(0, colon).trim() || fallback
}
