// src/services/collector/prompts/summaryPrompts.ts

export const DATA_SUMMARY_SYSTEM_PROMPT = `You write concise, well-formatted summaries of information a user has provided in a form. Use markdown. Do not add information that is not in the data.`;

export const ACTION_SUMMARY_SYSTEM_PROMPT = `You describe, in a few short sentences or bullet points, what will happen once the user confirms the information below. Be concrete and base everything on the data.`;

export const SUMMARY_USER_PROMPT_TEMPLATE = `{{INSTRUCTIONS}}

Data:
{{DATA}}
{{MODIFICATIONS}}{{LANGUAGE_SECTION}}`;
