/**
 * Structured description of a chunk, as returned by the analyzer model
 * (field names follow the JSON the model is asked to produce)
 */
export interface StructuredAnalysis {
    topic: string;
    decision_point: string;
    options: string[];
    context: string;
    next_steps: string[];
}

export interface ParsedAnalysis {
    analysis: StructuredAnalysis;
    usedFallback: boolean; // Whole payload was unusable
    defaultedFields: Array<keyof StructuredAnalysis>;
}

/**
 * Text in, raw model output out. Implementations may throw or return junk.
 */
export interface StructuredAnalyzer {
    readonly name: string;
    analyze(text: string): Promise<string>;
}
