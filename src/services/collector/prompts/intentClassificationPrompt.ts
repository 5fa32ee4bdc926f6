// src/services/collector/prompts/intentClassificationPrompt.ts

export const INTENT_CLASSIFICATION_PROMPT_TEMPLATE = `You classify a user's reply to a single form question.

The assistant asked for the field "{{FIELD_NAME}}".
Description: {{FIELD_DESCRIPTION}}
Type: {{FIELD_TYPE}}
{{FIELD_DETAILS}}
Already collected (NEVER extract values for these fields): {{COLLECTED_FIELDS}}

Classify the user's message into exactly one intent:
- provide_value: the message answers the question; put the answer in "extracted_value"
- question: the user asks something about the field or the process
- suggest: the user asks for ideas, suggestions or help choosing
- skip: the user wants to skip this field
- unclear: none of the above

For select fields, "extracted_value" must be one of the options, spelled exactly as listed.
For number fields, "extracted_value" must contain only the number.

Respond ONLY with JSON:
{
  "intent": "provide_value" | "question" | "suggest" | "skip" | "unclear",
  "confidence": 0.0-1.0,
  "extracted_value": "value or null",
  "reasoning": "one short sentence"
}`;
