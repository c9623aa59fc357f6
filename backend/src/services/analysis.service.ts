import type { ParsedAnalysis, StructuredAnalysis, StructuredAnalyzer } from '../types';
import { MalformedAnalysisError, errorMessage } from '../errors';
import { withTimeout } from '../utils/timeout';

export function buildAnalysisPrompt(text: string): string {
    return `Analyze this conversation segment and identify:
1. Main topic or decision point
2. Key options or choices mentioned
3. Context or reasoning
4. Next logical steps or outcomes

Conversation segment: "${text}"

Respond in JSON format:
{
    "topic": "main topic",
    "decision_point": "key decision or choice",
    "options": ["option1", "option2"],
    "context": "background context",
    "next_steps": ["step1", "step2"]
}`;
}

/**
 * Substituted when the analyzer fails or says nothing usable
 */
export function fallbackAnalysis(chunkText: string): StructuredAnalysis {
    return {
        topic: 'General Discussion',
        decision_point: 'Topic Discussion',
        options: ['Continue', 'Explore Further'],
        context: chunkText.slice(0, 100),
        next_steps: ['Continue conversation']
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractPayload(raw: unknown): Record<string, unknown> {
    if (typeof raw !== 'string') {
        throw new MalformedAnalysisError(`Analyzer returned ${raw === null ? 'null' : typeof raw}, not text`, '');
    }
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end < start) {
        throw new MalformedAnalysisError('No JSON object found in analyzer output', raw);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw.slice(start, end + 1));
    } catch (error) {
        throw new MalformedAnalysisError(`Analyzer JSON did not parse: ${errorMessage(error)}`, raw);
    }
    if (!isRecord(parsed)) {
        throw new MalformedAnalysisError('Analyzer JSON is not an object', raw);
    }
    return parsed;
}

function stringList(value: unknown): string[] | undefined {
    if (!Array.isArray(value)) return undefined;
    return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Read the analyzer's raw output leniently: the text between the first `{`
 * and the last `}` is parsed as JSON. An unusable payload gives the full
 * fallback; a usable one gets the fallback value for each field that is
 * missing or of the wrong type.
 */
export function parseAnalysis(raw: unknown, chunkText: string): ParsedAnalysis {
    const fallback = fallbackAnalysis(chunkText);

    let payload: Record<string, unknown>;
    try {
        payload = extractPayload(raw);
    } catch (error) {
        if (error instanceof MalformedAnalysisError) {
            console.warn(`⚠️ ${error.message}, using fallback analysis`);
            return { analysis: fallback, usedFallback: true, defaultedFields: [] };
        }
        throw error;
    }

    const defaultedFields: Array<keyof StructuredAnalysis> = [];
    const text = (key: 'topic' | 'decision_point' | 'context'): string => {
        const value = payload[key];
        if (typeof value === 'string') return value;
        defaultedFields.push(key);
        return fallback[key];
    };
    const list = (key: 'options' | 'next_steps'): string[] => {
        const value = stringList(payload[key]);
        if (value) return value;
        defaultedFields.push(key);
        return fallback[key];
    };

    const analysis: StructuredAnalysis = {
        topic: text('topic'),
        decision_point: text('decision_point'),
        options: list('options'),
        context: text('context'),
        next_steps: list('next_steps')
    };

    if (defaultedFields.length > 0) {
        console.warn(`⚠️ Analysis missing ${defaultedFields.join(', ')}, using defaults`);
    }
    return { analysis, usedFallback: false, defaultedFields };
}

/**
 * Wraps a StructuredAnalyzer so that callers always get an analysis back
 */
export class AnalysisService {
    constructor(private analyzer: StructuredAnalyzer, private timeoutMs: number = 30000) {}

    async analyze(chunkText: string): Promise<ParsedAnalysis> {
        let raw: unknown;
        try {
            raw = await withTimeout(this.analyzer.name, this.analyzer.analyze(chunkText), this.timeoutMs);
        } catch (error) {
            console.error(`❌ Analyzer ${this.analyzer.name} unavailable: ${errorMessage(error)}`);
            return { analysis: fallbackAnalysis(chunkText), usedFallback: true, defaultedFields: [] };
        }

        try {
            return parseAnalysis(raw, chunkText);
        } catch (error) {
            console.error(`❌ Analysis of ${this.analyzer.name} output failed: ${errorMessage(error)}`);
            return { analysis: fallbackAnalysis(chunkText), usedFallback: true, defaultedFields: [] };
        }
    }
}
