// src/services/collector/prompts/fieldTargetPrompt.ts

export const FIELD_TARGET_PROMPT_TEMPLATE = `Identify which form field the user wants to change.

Fields:
{{FIELD_LIST}}

Respond ONLY with JSON: {"field": "<field_name>"} using one of the names above, or {"field": null} if the message does not point to a single field.`;
