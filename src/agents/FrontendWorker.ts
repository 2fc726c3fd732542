import { bulletList, renderTemplate } from "../core/template.js"
import type { Assignment, Solution } from "../types.js"
import {
    candidateName,
    extractListAndDetails,
    extractSections,
    type IntentKeywords,
} from "../workflow/parsers.js"
import type { RoleAgentOptions } from "./Agent.js"
import {
    FRONTEND_DEFAULTS,
    FRONTEND_TEMPLATES,
    SECTION_MARKERS,
} from "./prompts.js"
import { Worker, type WorkerTemplates } from "./Worker.js"

export const FRONTEND_KEYWORDS: IntentKeywords = {
    design: ["design", "ui", "ux"],
    implementation: ["implementation", "component"],
}

export interface UiDesignRequest {
    feature: string
    projectContext: string
    targetUsers: string
    requiredFeatures: string
}

export interface ComponentRequest {
    componentName: string
    specifications: string
    backendIntegration?: string
    recommendedTechnologies?: string
}

export class FrontendWorker extends Worker {
    protected readonly keywords = FRONTEND_KEYWORDS
    protected readonly templates: WorkerTemplates = FRONTEND_TEMPLATES

    constructor(options: RoleAgentOptions) {
        super("frontend", options)
    }

    public designUi(
        request: UiDesignRequest,
        signal?: AbortSignal
    ): Promise<Solution> {
        return this.process(
            renderTemplate(FRONTEND_TEMPLATES.uiDesign, {
                feature: request.feature,
                context: request.projectContext,
                targetUsers: request.targetUsers,
                requiredFeatures: request.requiredFeatures,
            }),
            { ...request },
            signal
        )
    }

    public implementComponent(
        request: ComponentRequest,
        signal?: AbortSignal
    ): Promise<Solution> {
        const values = {
            componentName: request.componentName,
            specifications: request.specifications,
            backendIntegration:
                request.backendIntegration || FRONTEND_DEFAULTS.backendIntegration,
            recommendedTechnologies:
                request.recommendedTechnologies ||
                FRONTEND_DEFAULTS.recommendedTechnologies,
        }
        return this.process(
            renderTemplate(FRONTEND_TEMPLATES.componentImplementation, values),
            values,
            signal
        )
    }

    protected async executeDesign(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        const extracted = await this.ask(
            FRONTEND_TEMPLATES.designExtraction,
            assignment,
            signal
        )
        const sections = extractSections(
            extracted,
            SECTION_MARKERS.targetUsers,
            SECTION_MARKERS.requiredFeatures
        )
        return this.designUi(
            {
                feature: assignment.context.specificTask,
                projectContext: assignment.context.projectContext,
                targetUsers: sections.first ?? FRONTEND_DEFAULTS.targetUsers,
                requiredFeatures:
                    sections.second ?? FRONTEND_DEFAULTS.requiredFeatures,
            },
            signal
        )
    }

    protected async executeImplementation(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        const task = assignment.context.specificTask
        const extracted = await this.ask(
            FRONTEND_TEMPLATES.implementationExtraction,
            assignment,
            signal
        )
        const { items } = extractListAndDetails(
            extracted,
            SECTION_MARKERS.requirements,
            []
        )
        return this.implementComponent(
            {
                componentName: candidateName(
                    task,
                    FRONTEND_DEFAULTS.componentName
                ),
                specifications: items.length > 0 ? bulletList(items) : task,
                backendIntegration: assignment.context.interfaces,
            },
            signal
        )
    }
}
