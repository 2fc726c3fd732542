import type { ReviewPolicyType } from "../types.js"

/** Decides whether a reviewed solution may flow into integration. */
export interface ReviewPolicy {
    readonly name: string
    isApproved(evaluation: string): boolean
}

export const alwaysApprove: ReviewPolicy = {
    name: "always",
    isApproved: () => true,
}

export interface KeywordPolicyOptions {
    /** Outcome when the evaluation carries no verdict line. */
    approveWithoutVerdict?: boolean
}

const VERDICT = /VERDICT\s*:\s*\**\s*(APPROVED|REJECTED)/gi

/**
 * Reads the `VERDICT: APPROVED | REJECTED` line the review prompt asks for.
 * The last verdict in the text wins.
 */
export function keywordPolicy(options: KeywordPolicyOptions = {}): ReviewPolicy {
    const fallback = options.approveWithoutVerdict ?? true
    return {
        name: "keyword",
        isApproved(evaluation: string): boolean {
            const verdicts = Array.from(evaluation.matchAll(VERDICT), (m) =>
                m[1].toUpperCase()
            )
            const last = verdicts[verdicts.length - 1]
            if (last === undefined) return fallback
            return last === "APPROVED"
        },
    }
}

export function createReviewPolicy(type: ReviewPolicyType): ReviewPolicy {
    switch (type) {
        case "always":
            return alwaysApprove
        case "keyword":
            return keywordPolicy()
    }
}
