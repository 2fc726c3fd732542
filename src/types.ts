export type Specialization = "frontend" | "backend"

export type AgentRole = "coordinator" | Specialization

export const SPECIALIZATIONS: readonly Specialization[] = [
    "frontend",
    "backend",
]

export type PipelineStatus =
    | "analyzing"
    | "executing"
    | "integrating"
    | "completed"
    | "failed"

export type RunStatus = "completed" | "failed"

export type TaskIntent = "design" | "implementation" | "mixed"

export type RendererType = "terminal" | "log" | "none"

export type ReviewPolicyType = "always" | "keyword"

export interface GenerationParams {
    temperature?: number
    top_p?: number
    max_tokens?: number
}

export interface ChatMessage {
    role: "system" | "user" | "assistant"
    content: string
}

export interface CompletionOptions {
    model: string
    system?: string
    params?: GenerationParams
    signal?: AbortSignal
}

export interface ModelDescriptor {
    name: string
    size?: number
    digest?: string
    modifiedAt?: string
}

/** The completion service boundary as the agents see it. */
export interface CompletionService {
    generate(prompt: string, options: CompletionOptions): Promise<string>
    chat(messages: ChatMessage[], options: CompletionOptions): Promise<string>
    listModels(): Promise<ModelDescriptor[]>
    pullModel(name: string): Promise<boolean>
}

export type FetchFn = typeof fetch

export interface AgentIdentity {
    name: string
    model: string
    systemPrompt: string
}

export interface ConversationEntry {
    timestamp: string
    message: string
    response: string
    context: Record<string, unknown> | null
}

export interface SubtaskLists {
    readonly frontend: readonly string[]
    readonly backend: readonly string[]
}

export interface TaskAnalysis {
    readonly originalTask: string
    readonly analysisText: string
    readonly subtasks: SubtaskLists
    readonly integrationPoints: readonly string[]
}

export interface AssignmentContext {
    projectContext: string
    specificTask: string
    constraints: string
    interfaces: string
    successCriteria: string
}

export interface Assignment {
    prompt: string
    context: AssignmentContext
    specialization: Specialization
    subtaskIndex: number
}

export type AssignmentResult =
    | { type: "assignment"; assignment: Assignment }
    | { type: "error"; code: "invalid_index"; message: string }

export type Solution = string

export interface Review {
    specialization: Specialization
    workerName: string
    originalTask: string
    evaluation: string
    approved: boolean
}

export interface SubtaskResult {
    index: number
    task: string
    solution: Solution
    review: Review
    approved: boolean
}

export interface PipelineState {
    taskId: string
    description: string
    status: PipelineStatus
    analysis: TaskAnalysis | null
    results: Record<Specialization, SubtaskResult[]>
    skipped: Record<Specialization, number[]>
    startTime: number
    endTime?: number
    duration?: number
    finalSolution?: string
    error?: string
}

export type RunResult =
    | {
          taskId: string
          status: "completed"
          solution: string
          duration: number
          state: PipelineState
      }
    | {
          taskId: string
          status: "failed"
          solution: string
          error: string
          duration: number
          state: PipelineState
      }

export interface SolveOptions {
    timeoutSeconds?: number
}

export interface CompletionSettings {
    baseUrl: string
    maxRetries: number
    requestTimeoutMs: number
    pullTimeoutMs: number
    backoffBaseMs: number
    maxConcurrentRequests: number
}

export interface HistorySettings {
    maxEntries: number
    persist: boolean
    directory: string
}

export interface PipelineSettings {
    timeoutSeconds: number
    maxConcurrency: number
    parallelSpecializations: boolean
    reviewPolicy: ReviewPolicyType
    archiveRuns: boolean
}

export interface TrioConfig {
    completion?: Partial<CompletionSettings>
    params?: GenerationParams
    model?: string
    agents?: Partial<Record<AgentRole, Partial<AgentIdentity>>>
    history?: Partial<HistorySettings>
    pipeline?: Partial<PipelineSettings>
    workingDirectory?: string
    renderer?: RendererType
    verbose?: boolean
    runLogPath?: string
    /** Replaces the HTTP client, e.g. with a scripted stand-in. */
    completionService?: CompletionService
    fetch?: FetchFn
}

export interface ResolvedConfig {
    completion: CompletionSettings
    params: Required<GenerationParams>
    agents: Record<AgentRole, AgentIdentity>
    history: HistorySettings
    pipeline: PipelineSettings
    workingDirectory: string
    renderer: RendererType
    verbose: boolean
    runLogPath?: string
}
