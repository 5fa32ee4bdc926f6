// src/services/collector/prompts/suggestionPrompt.ts

export const SUGGESTION_PROMPT_TEMPLATE = `Generate 3-5 helpful suggestions for the field "{{FIELD_NAME}}" of "{{TITLE}}".

Field description: {{FIELD_DESCRIPTION}}
{{FIELD_DETAILS}}
Information already provided:
{{CONTEXT}}

Return only a numbered list, one suggestion per line, e.g.:
1. First suggestion
2. Second suggestion
Each suggestion must be a complete value the user could give as is.
{{LANGUAGE_SECTION}}`;
