import type { AgentRole } from "../types.js"

export const ROLE_LABELS: Record<AgentRole, string> = {
    coordinator: "Coordinator",
    frontend: "Front-end",
    backend: "Back-end",
}

export function getRoleLabel(role: AgentRole): string {
    return ROLE_LABELS[role]
}
