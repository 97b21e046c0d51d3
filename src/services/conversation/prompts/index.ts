export * from './handlerSystemPrompts';
export * from './intentClassificationPrompt';
export * from './finalizationPrompts';
export * from './memorySummaryPrompt';

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/**
 * Fills `{{KEY}}` placeholders in a single pass. Inserted values are never
 * scanned again, and `$` sequences in them are not replacement patterns.
 * Unknown placeholders are left as written.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(PLACEHOLDER, (placeholder: string, key: string) => values[key] ?? placeholder);
}
