import { bulletList, renderTemplate } from "../core/template.js"
import type { Assignment, Solution } from "../types.js"
import {
    candidateName,
    extractListAndDetails,
    extractSections,
    type IntentKeywords,
} from "../workflow/parsers.js"
import type { RoleAgentOptions } from "./Agent.js"
import { BACKEND_DEFAULTS, BACKEND_TEMPLATES, SECTION_MARKERS } from "./prompts.js"
import { Worker, type WorkerTemplates } from "./Worker.js"

export const BACKEND_KEYWORDS: IntentKeywords = {
    design: ["architecture", "design"],
    implementation: ["implementation", "api"],
}

export interface ArchitectureRequest {
    feature: string
    projectContext: string
    functionalRequirements: string
    nonFunctionalRequirements: string
}

export interface ApiRequest {
    apiName: string
    endpoints: readonly string[]
    dataModel: string
    constraints?: string
}

export class BackendWorker extends Worker {
    protected readonly keywords = BACKEND_KEYWORDS
    protected readonly templates: WorkerTemplates = BACKEND_TEMPLATES

    constructor(options: RoleAgentOptions) {
        super("backend", options)
    }

    public designArchitecture(
        request: ArchitectureRequest,
        signal?: AbortSignal
    ): Promise<Solution> {
        return this.process(
            renderTemplate(BACKEND_TEMPLATES.architectureDesign, {
                feature: request.feature,
                context: request.projectContext,
                functionalRequirements: request.functionalRequirements,
                nonFunctionalRequirements: request.nonFunctionalRequirements,
            }),
            { ...request },
            signal
        )
    }

    public implementApi(
        request: ApiRequest,
        signal?: AbortSignal
    ): Promise<Solution> {
        const constraints = request.constraints || BACKEND_DEFAULTS.constraints
        return this.process(
            renderTemplate(BACKEND_TEMPLATES.apiImplementation, {
                apiName: request.apiName,
                requiredEndpoints: bulletList(request.endpoints),
                dataModel: request.dataModel,
                constraints,
            }),
            {
                apiName: request.apiName,
                requiredEndpoints: request.endpoints,
                dataModel: request.dataModel,
                constraints,
            },
            signal
        )
    }

    protected async executeDesign(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        const extracted = await this.ask(
            BACKEND_TEMPLATES.requirementsExtraction,
            assignment,
            signal
        )
        const sections = extractSections(
            extracted,
            SECTION_MARKERS.functionalRequirements,
            SECTION_MARKERS.nonFunctionalRequirements
        )
        return this.designArchitecture(
            {
                feature: assignment.context.specificTask,
                projectContext: assignment.context.projectContext,
                functionalRequirements:
                    sections.first ?? BACKEND_DEFAULTS.functionalRequirements,
                nonFunctionalRequirements:
                    sections.second ??
                    BACKEND_DEFAULTS.nonFunctionalRequirements,
            },
            signal
        )
    }

    protected async executeImplementation(
        assignment: Assignment,
        signal?: AbortSignal
    ): Promise<Solution> {
        const extracted = await this.ask(
            BACKEND_TEMPLATES.apiExtraction,
            assignment,
            signal
        )
        const { items, details } = extractListAndDetails(
            extracted,
            SECTION_MARKERS.endpoints,
            SECTION_MARKERS.dataModel
        )
        return this.implementApi(
            {
                apiName: candidateName(
                    assignment.context.specificTask,
                    BACKEND_DEFAULTS.apiName
                ),
                endpoints: items.length > 0 ? items : BACKEND_DEFAULTS.endpoints,
                dataModel: details ?? BACKEND_DEFAULTS.dataModel,
                constraints: assignment.context.constraints,
            },
            signal
        )
    }
}
