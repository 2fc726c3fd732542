import { describe, expect, it } from "vitest"

import { TemplateError } from "../../core/errors.js"
import { bulletList, renderTemplate } from "../../core/template.js"

describe("renderTemplate", () => {
    it("substitutes named placeholders", () => {
        expect(renderTemplate("Hi {name}, task {n}", { name: "Ana", n: 3 })).toBe(
            "Hi Ana, task 3"
        )
    })

    it("renders doubled braces as literal braces", () => {
        expect(renderTemplate('{{"key": "{value}"}}', { value: "v" })).toBe(
            '{"key": "v"}'
        )
    })

    it("does not expand placeholders inside substituted values", () => {
        expect(renderTemplate("{a}", { a: "{b}", b: "nope" })).toBe("{b}")
    })

    it("throws a TemplateError naming the missing placeholder", () => {
        expect(() => renderTemplate("{missing}", {})).toThrow(TemplateError)
        try {
            renderTemplate("x {missing} y", {})
        } catch (error) {
            expect(error).toMatchObject({ placeholder: "missing" })
        }
    })
})

describe("bulletList", () => {
    it("prefixes every item", () => {
        expect(bulletList(["one", "two"])).toBe("- one\n- two")
        expect(bulletList([])).toBe("")
    })
})
