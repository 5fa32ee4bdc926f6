// src/services/collector/prompts/structuredOutputPrompt.ts

export const STRUCTURED_OUTPUT_SYSTEM_PROMPT = `Generate structured JSON output. Respond with a single valid JSON object and nothing else: no code fences, no commentary.`;

export const STRUCTURED_OUTPUT_USER_PROMPT_TEMPLATE = `{{INSTRUCTIONS}}

Collected information:
{{DATA}}
{{SOURCE_SECTION}}
The JSON object must have this structure:
{{SCHEMA}}
{{LANGUAGE_SECTION}}`;

export const CONFIRMED_SUMMARY_SECTION_TEMPLATE = `
The user reviewed and confirmed the following content. It is the authoritative source: convert it into the JSON structure, keep its wording, and do not invent new content.
---
{{SUMMARY}}
---
`;

export const MODIFICATIONS_SECTION_TEMPLATE = `
The user asked for these changes to the result; apply all of them:
{{MODIFICATIONS}}
`;
