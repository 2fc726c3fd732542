/**
 * Prompt templates. Placeholders are `{name}`; see core/template.ts.
 * Section headers the workers ask for live in SECTION_MARKERS so the
 * extraction code and the prompts cannot drift apart.
 */

export const SECTION_MARKERS = {
    functionalRequirements: ["FUNCTIONAL REQUIREMENTS"],
    nonFunctionalRequirements: ["NON-FUNCTIONAL REQUIREMENTS"],
    targetUsers: ["TARGET USERS"],
    requiredFeatures: ["REQUIRED FEATURES"],
    endpoints: ["ENDPOINTS"],
    dataModel: ["DATA MODEL", "MODÈLE DE DONNÉES"],
    requirements: ["REQUIREMENTS"],
} as const satisfies Record<string, readonly string[]>

export const ASSIGNMENT_CONSTRAINTS =
    "Use standard technologies and stay consistent with the other components."

export const ASSIGNMENT_SUCCESS_CRITERIA =
    "A working, well-documented and maintainable solution."

export const COORDINATOR_TEMPLATES = {
    taskAnalysis: `As the technical lead, analyse the following task and break it into sub-tasks:

TASK: {task}

1. Analyse the main requirements
2. Identify the key components needed
3. Split the work between the front-end and back-end developers
4. Define the interfaces between the components
5. Set success criteria for each sub-task`,

    decompositionExtraction: `From your previous analysis of the task "{task}", extract:

1. A list of specific tasks for the front-end developer (3-5 tasks).
2. A list of specific tasks for the back-end developer (3-5 tasks).
3. The critical integration points between front end and back end.

Format your answer as strict JSON with the keys "frontend_tasks", "backend_tasks" and "integration_points", each holding a list of strings.
If the task is too simple to decompose, return empty lists.`,

    taskAssignment: `Task assignment for {developerName}:

PROJECT CONTEXT: {projectContext}

YOUR TASK: {specificTask}

EXPECTATIONS:
- Deliver a working solution for the assigned task
- Document your approach and technical decisions
- Point out possible future improvements

CONSTRAINTS:
{constraints}

INTERFACES WITH OTHER COMPONENTS:
{interfaces}

SUCCESS CRITERIA:
{successCriteria}`,

    reviewWork: `Review of the work submitted by {developerName}:

ORIGINAL TASK: {originalTask}

SUBMITTED SOLUTION:
{submittedSolution}

Evaluate this solution against the following criteria:
1. Functionality - does the solution meet the requirements?
2. Quality - is the code/solution well designed and maintainable?
3. Integration - how does this solution fit with the other components?
4. Improvements - what would you improve?

End your review with a single line "VERDICT: APPROVED" or "VERDICT: REJECTED".`,

    integration: `Integrate the components for the task: {task}

FRONT-END COMPONENT:
{frontendSolution}

BACK-END COMPONENT:
{backendSolution}

Integrate the components, taking into account:
1. Consistency of the interfaces
2. Compatibility of the data exchanged
3. Communication flows between the components
4. Likely integration problems and how to solve them`,

    completeSolution: `Create a complete solution for the following task:

{task}

Cover both the front-end and the back-end aspects in your solution.`,

    directSolution: `No sub-tasks were identified for this task.
Provide a complete solution for the following task:

{task}

Cover both the front-end and the back-end aspects in your solution.
Include example code and detailed explanations.`,
}

export const NO_FRONTEND_SOLUTION = "No front-end solution available."
export const NO_BACKEND_SOLUTION = "No back-end solution available."
export const NO_SOLUTION_PRODUCED =
    "No solution was produced for this task. The model returned an empty answer."

const classification = (
    design: string,
    implementation: string
): string => `Analyse this task and decide whether it is mainly about:
1. ${design}
2. ${implementation}
3. Both

TASK:
{assignment}

Answer with a single digit only: 1, 2 or 3.`

export const FRONTEND_TEMPLATES = {
    classification: classification(
        "User interface design (UI/UX)",
        "Implementing a specific component or feature"
    ),

    designExtraction: `From the following task, extract the target users and the required features:

{assignment}

Format your answer as two clearly separated sections:

TARGET USERS:
(who will use this interface)

REQUIRED FEATURES:
- (list of features)`,

    implementationExtraction: `From the following task, extract the concrete requirements for the component:

{assignment}

Format your answer as one section:

REQUIREMENTS:
- (list of requirements)`,

    uiDesign: `Design a user interface for: {feature}

CONTEXT:
{context}

TARGET USERS:
{targetUsers}

REQUIRED FEATURES:
{requiredFeatures}

Provide:
1. A description of the interface and its structure
2. The UI components needed
3. The main user interactions
4. User-experience considerations`,

    componentImplementation: `Implement a front-end component for: {componentName}

SPECIFICATIONS:
{specifications}

BACK-END INTEGRATION:
{backendIntegration}

RECOMMENDED TECHNOLOGIES:
{recommendedTechnologies}

Provide:
1. The component code
2. Explanations of the implementation choices
3. Usage instructions
4. Suggested tests`,

    mixed: `As the front-end developer, complete the following task with all the necessary detail:

{assignment}

Provide a complete solution that includes:
1. The user-interface design
2. The technical implementation with the necessary code
3. The reasoning behind your design and implementation choices
4. Instructions for integrating with the back end`,
}

export const FRONTEND_DEFAULTS = {
    componentName: "Component",
    targetUsers: "General users of the application",
    requiredFeatures: "Core features needed for the task",
    backendIntegration: "Use standard REST APIs for the integration.",
    recommendedTechnologies:
        "HTML, CSS, TypeScript and a modern framework such as React, Vue or Angular.",
}

export const BACKEND_TEMPLATES = {
    classification: classification(
        "Back-end architecture design",
        "Implementing an API or specific components"
    ),

    requirementsExtraction: `From the following task, extract the functional and non-functional requirements:

{assignment}

Format your answer as two clearly separated sections:

FUNCTIONAL REQUIREMENTS:
- (list of requirements)

NON-FUNCTIONAL REQUIREMENTS:
- (list of requirements)`,

    apiExtraction: `From the following task, extract the required endpoints and the data model:

{assignment}

Format your answer as two sections:

ENDPOINTS:
- (list of endpoints)

DATA MODEL:
(description of the model)`,

    architectureDesign: `Design a back-end architecture for: {feature}

CONTEXT:
{context}

FUNCTIONAL REQUIREMENTS:
{functionalRequirements}

NON-FUNCTIONAL REQUIREMENTS:
{nonFunctionalRequirements}

Provide:
1. A diagram of the proposed architecture
2. The main back-end components
3. The data flows
4. Recommended technologies
5. Security and performance considerations`,

    apiImplementation: `Implement an API for: {apiName}

REQUIRED ENDPOINTS:
{requiredEndpoints}

DATA MODEL:
{dataModel}

CONSTRAINTS:
{constraints}

Provide:
1. The route/endpoint definitions
2. The input/output data structures (schemas)
3. The core business logic
4. Security and validation considerations
5. Usage examples`,

    mixed: `As the back-end developer, complete the following task with all the necessary detail:

{assignment}

Provide a complete solution that includes:
1. The back-end architecture design where needed
2. The technical implementation with the necessary code
3. The reasoning behind your architecture and implementation choices
4. The integration interfaces for the front end`,
}

export const BACKEND_DEFAULTS = {
    apiName: "API",
    functionalRequirements: "Requirements taken from the task",
    nonFunctionalRequirements: "Performance, security and maintainability",
    dataModel: "Data model derived from the task requirements.",
    constraints:
        "Follow REST conventions, keep the service secure and optimise performance.",
    endpoints: [
        "GET /api/{resource}",
        "POST /api/{resource}",
        "PUT /api/{resource}/{id}",
        "DELETE /api/{resource}/{id}",
    ],
}
