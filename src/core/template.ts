import { TemplateError } from "./errors.js"

const PLACEHOLDER = /\{\{|\}\}|\{(\w+)\}/g

export type TemplateValues = Record<string, string | number>

/**
 * Substitute `{name}` placeholders. `{{` and `}}` render literal braces.
 * A placeholder without a value throws, since that is a wiring bug rather
 * than bad model output.
 */
export function renderTemplate(
    template: string,
    values: TemplateValues
): string {
    return template.replace(
        PLACEHOLDER,
        (match: string, name: string | undefined): string => {
            if (match === "{{") return "{"
            if (match === "}}") return "}"
            if (name === undefined) return match
            const value = values[name]
            if (value === undefined) throw new TemplateError(name)
            return String(value)
        }
    )
}

export function bulletList(items: readonly string[]): string {
    return items.map((item) => `- ${item}`).join("\n")
}
