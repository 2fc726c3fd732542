export class TrioError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "TrioError"
        this.code = code
        this.cause = cause
    }
}

/** Raised once every attempt against the completion service has failed. */
export class CompletionConnectionError extends TrioError {
    public readonly attempts: number

    constructor(message: string, attempts: number, cause?: Error) {
        super(message, "CONNECTION_ERROR", cause)
        this.name = "CompletionConnectionError"
        this.attempts = attempts
    }
}

export class CompletionAbortedError extends TrioError {
    constructor(message: string, cause?: Error) {
        super(message, "ABORTED", cause)
        this.name = "CompletionAbortedError"
    }
}

export class ConfigError extends TrioError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigError"
    }
}

export class TemplateError extends TrioError {
    public readonly placeholder: string

    constructor(placeholder: string) {
        super(
            `Missing value for template placeholder {${placeholder}}`,
            "TEMPLATE_ERROR"
        )
        this.name = "TemplateError"
        this.placeholder = placeholder
    }
}

export class PipelineError extends TrioError {
    constructor(message: string, cause?: Error) {
        super(message, "PIPELINE_ERROR", cause)
        this.name = "PipelineError"
    }
}

export function isAbortError(error: unknown): boolean {
    return error instanceof CompletionAbortedError
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
