export const INTENT_CLASSIFICATION_PROMPT_TEMPLATE = `Analyze the user's input and classify their intent.

User Input: {{USER_INPUT}}

Conversation History:
{{CONVERSATION_HISTORY}}

Classify the intent as one of the following:
- "qa": the user asks a question that requires finding specific information in the documents
- "summarization": the user wants a summary or overview of one or more documents
- "calculation": the user wants a mathematical calculation on data from the documents
- "unknown": the intent does not clearly fit the categories above

When a request both asks for a summary and mentions a calculation keyword (for example "summarize the total"), classify it as "summarization".

Return a JSON object with exactly these keys:
- "intent_type": one of "qa", "summarization", "calculation", "unknown"
- "confidence": a number between 0 and 1
- "reasoning": a short explanation of the classification

Examples:
- "What is the revenue?" -> qa
- "Summarize the Q2 report" -> summarization
- "What's the total of sales in January and February?" -> calculation
- "Calculate the average revenue" -> calculation`;
