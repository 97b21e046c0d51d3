// Follow-up prompts for the second handler call, once tool results are in.

export const QA_FINAL_ANSWER_PROMPT_TEMPLATE = `{{TOOL_RESULTS}}

Using the tool results above, answer the original question: {{USER_INPUT}}`;

export const SUMMARIZATION_FINALIZATION_PROMPT = `You are finishing a summarization request. Write the summary from the retrieved document content you are given, and nothing else.

Return a JSON object with these keys:
- "summary": string, the summary itself
- "key_points": array of strings, the most important points
- "original_length": integer, total length in characters of the text you summarized (omit if unknown)
- "document_ids": array of strings, the sources you summarized
- "confidence": number between 0 and 1`;

export const CALCULATION_FINALIZATION_PROMPT = `You are finishing a calculation request. Use the calculator output you are given as the result; do not recompute it.

Return a JSON object with these keys:
- "expression": string, the arithmetic expression that was evaluated
- "result": number, the numeric result
- "explanation": string, how the numbers were found and combined
- "units": string, the unit of the result such as "USD" (omit if none)
- "sources": array of strings, the documents the numbers came from
- "confidence": number between 0 and 1`;

export const STRUCTURED_REQUEST_PROMPT_TEMPLATE = `User request: {{USER_INPUT}}

{{TOOL_RESULTS}}`;
