// src/services/collector/prompts/contentExtractionPrompt.ts

export const CONTENT_EXTRACTION_PROMPT_TEMPLATE = `Extract values for the following fields from the document provided by the user.

Fields:
{{FIELD_LIST}}

Respond ONLY with a JSON object whose keys are the field names above. Leave out any field the document does not mention. Use plain strings or numbers as values, never nested objects.`;
