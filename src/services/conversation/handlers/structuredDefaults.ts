// Backfill rules for structured handler output.

export const CONFIDENCE_WITH_TOOLS = 0.9;
export const CONFIDENCE_WITHOUT_TOOLS = 0.6;

export function backfillConfidence(confidence: number | null | undefined, toolsUsed: string[]): number {
    if (confidence) return confidence;
    return toolsUsed.length > 0 ? CONFIDENCE_WITH_TOOLS : CONFIDENCE_WITHOUT_TOOLS;
}

export function backfillList(values: string[], toolsUsed: string[]): string[] {
    return values.length > 0 ? values : [...toolsUsed];
}

export const NO_TOOL_RESULTS = 'No tool results were produced.';
