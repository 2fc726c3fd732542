import type {
    AgentRole,
    PipelineStatus,
    RunStatus,
    Specialization,
    TaskIntent,
} from "../types.js"

export type SkipReason = "deadline" | "cancelled" | "invalid_index"

export type TrioEvent =
    | {
          type: "pipeline:start"
          taskId: string
          description: string
      }
    | {
          type: "pipeline:status"
          taskId: string
          from: PipelineStatus
          to: PipelineStatus
      }
    | {
          type: "pipeline:complete"
          taskId: string
          status: RunStatus
          duration: number
      }
    | {
          type: "analysis:complete"
          taskId: string
          frontend: number
          backend: number
          integrationPoints: number
      }
    | {
          type: "subtask:start"
          taskId: string
          specialization: Specialization
          index: number
          total: number
          description: string
      }
    | {
          type: "subtask:complete"
          taskId: string
          specialization: Specialization
          index: number
          approved: boolean
      }
    | {
          type: "subtask:skipped"
          taskId: string
          specialization: Specialization
          index: number
          reason: SkipReason
      }
    | {
          type: "deadline:reached"
          taskId: string
          elapsedMs: number
      }
    | {
          type: "agent:response"
          agentId: string
          role: AgentRole
          name: string
          durationMs: number
          characters: number
      }
    | {
          type: "worker:intent"
          agentId: string
          specialization: Specialization
          intent: TaskIntent
      }
    | {
          type: "completion:retry"
          endpoint: string
          attempt: number
          maxRetries: number
          delayMs: number
          reason: string
      }
