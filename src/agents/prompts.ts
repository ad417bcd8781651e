/**
 * Prompts for the specialist roles
 *
 * Each role gets a system prompt describing its expertise and a task template
 * that asks for a single JSON object matching the role's artifact schema.
 */

import type { RoleId } from "../types/workflow.js";

/**
 * System prompts per role
 */
export const SYSTEM_PROMPTS: Record<RoleId, string> = {
  education_theorist: `You are an education theorist specializing in project-based learning.

Your responsibilities:
1. Choose a pedagogical approach that fits the topic and audience
2. State the principles the course design must follow
3. Write measurable learning objectives
4. Name the competencies learners will build

You respond with JSON only.`,

  course_architect: `You are a course architect who turns learning frameworks into modular course structures.

Your responsibilities:
1. Split the course into modules that fit the requested duration
2. Give every module a stable id, objectives, key concepts and deliverables
3. Sequence modules so each builds on the previous one

You respond with JSON only.`,

  content_designer: `You are a content designer for project-based courses.

Your responsibilities:
1. Write a driving question that anchors the module project
2. Design varied, hands-on learning activities
3. List the resources learners need

You respond with JSON only.`,

  assessment_expert: `You are an assessment expert for project-based learning.

Your responsibilities:
1. Design formative checks for individual modules
2. Design summative assessments that span modules
3. Write rubrics with clear performance levels
4. Reference modules only by the ids you are given

You respond with JSON only.`,

  material_creator: `You are a learning material creator.

Your responsibilities:
1. Produce classroom-ready material of the requested type
2. Tie the material to the modules it supports
3. Keep instructions concrete and usable without further editing

You respond with JSON only.`,
};

/**
 * Prompt for the theoretical framework
 */
export const DEVELOP_FRAMEWORK_PROMPT = `Develop the theoretical framework for a project-based course.

Topic: {{topic}}
Audience: {{audience}}
Duration: {{duration}}

Goals:
{{goals}}

Constraints:
{{constraints}}

Respond in JSON format:
{
  "pedagogicalApproach": "string",
  "principles": ["string"],
  "learningObjectives": ["string"],
  "competencies": ["string"]
}`;

/**
 * Prompt for the course architecture
 */
export const DESIGN_STRUCTURE_PROMPT = `Design the module structure of the course.

Topic: {{topic}}
Audience: {{audience}}
Duration: {{duration}}

Goals:
{{goals}}

Theoretical framework:
{{framework}}

Revision notes from the previous review:
{{revisionNotes}}

Respond in JSON format:
{
  "title": "string",
  "overview": "string",
  "duration": "string",
  "modules": [
    {
      "id": "string, unique, e.g. m1",
      "title": "string",
      "duration": "string",
      "objectives": ["string"],
      "keyConcepts": ["string"],
      "deliverables": ["string"]
    }
  ]
}`;

/**
 * Prompt for one content module
 */
export const CREATE_CONTENT_PROMPT = `Create the learning content for one module of the course "{{courseTitle}}".

Module id: {{moduleId}}
Module title: {{moduleTitle}}
Duration: {{moduleDuration}}

Objectives:
{{objectives}}

Key concepts:
{{keyConcepts}}

Pedagogical approach: {{approach}}

Respond in JSON format:
{
  "moduleId": "{{moduleId}}",
  "title": "string",
  "summary": "string",
  "drivingQuestion": "string",
  "activities": [
    { "title": "string", "format": "string", "description": "string", "durationMinutes": 45 }
  ],
  "resources": ["string"],
  "selfAssessment": { "innovation": 0.0, "practicality": 0.0 }
}`;

/**
 * Prompt for the assessment strategy
 */
export const DESIGN_STRATEGY_PROMPT = `Design the assessment strategy for the course "{{courseTitle}}".

Modules (id: title):
{{modules}}

Module content summaries:
{{summaries}}

Respond in JSON format:
{
  "approach": "string",
  "formative": [{ "name": "string", "moduleId": "string", "method": "string" }],
  "summative": [{ "name": "string", "moduleIds": ["string"], "weight": 0.5, "criteria": ["string"] }],
  "rubrics": [{ "name": "string", "levels": [{ "label": "string", "description": "string" }] }]
}`;

/**
 * Prompt for one learning material
 */
export const CREATE_MATERIAL_PROMPT = `Create one learning material for the course "{{courseTitle}}".

Material type: {{materialType}}

Modules (id: title):
{{modules}}

Module content summaries:
{{summaries}}

Respond in JSON format:
{
  "materialType": "{{materialType}}",
  "title": "string",
  "description": "string",
  "moduleIds": ["string"],
  "format": "markdown",
  "content": "string",
  "selfAssessment": { "innovation": 0.0, "practicality": 0.0 }
}`;

/**
 * Fill a prompt template with variables
 */
export function fillPrompt(template: string, variables: Record<string, unknown>): string {
  let result = template;

  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    const stringValue =
      typeof value === "string"
        ? value
        : typeof value === "number"
          ? String(value)
          : JSON.stringify(value, null, 2);
    result = result.replaceAll(placeholder, stringValue);
  }

  return result;
}

/**
 * Render a list as "- item" lines, or "(none)"
 */
export function bulletList(items: readonly string[]): string {
  return items.length === 0 ? "(none)" : items.map((item) => `- ${item}`).join("\n");
}
