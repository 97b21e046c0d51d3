export const MEMORY_SUMMARY_PROMPT_TEMPLATE = `Summarize this conversation and identify the documents being actively discussed.

Recent messages:
{{RECENT_MESSAGES}}

Current exchange:
User: {{USER_INPUT}}
Assistant: {{ASSISTANT_RESPONSE}}

Return a JSON object with these keys:
- "summary": a brief summary of the conversation (2-3 sentences)
- "active_documents": array of strings, the documents actively being discussed`;
