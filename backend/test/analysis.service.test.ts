import { describe, it, expect } from 'vitest';
import { AnalysisService, buildAnalysisPrompt, fallbackAnalysis, parseAnalysis } from '../src/services/analysis.service';
import { FakeAnalyzer, DRINKS_JSON } from './fakes';

const CHUNK_TEXT = 'I want coffee Coffee sounds great';

describe('parseAnalysis', () => {
    it('reads a well-formed payload as-is', () => {
        const parsed = parseAnalysis(DRINKS_JSON, CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(false);
        expect(parsed.defaultedFields).toEqual([]);
        expect(parsed.analysis).toEqual({
            topic: 'Drinks',
            decision_point: 'Choose beverage',
            options: ['Coffee', 'Tea'],
            context: '',
            next_steps: []
        });
    });

    it('finds the object inside surrounding prose', () => {
        const raw = `Sure! Here is the analysis:\n${DRINKS_JSON}\nLet me know if you need more.`;

        expect(parseAnalysis(raw, CHUNK_TEXT).analysis.topic).toBe('Drinks');
    });

    it('falls back completely on output with no object', () => {
        const parsed = parseAnalysis('not json', CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(true);
        expect(parsed.analysis).toEqual({
            topic: 'General Discussion',
            decision_point: 'Topic Discussion',
            options: ['Continue', 'Explore Further'],
            context: CHUNK_TEXT,
            next_steps: ['Continue conversation']
        });
    });

    it('falls back completely when the braces do not hold JSON', () => {
        expect(parseAnalysis('{topic: Drinks}', CHUNK_TEXT).usedFallback).toBe(true);
        expect(parseAnalysis('} backwards {', CHUNK_TEXT).usedFallback).toBe(true);
        expect(parseAnalysis('{ "topic": "cut off', CHUNK_TEXT).usedFallback).toBe(true);
    });

    it('defaults each missing field on its own', () => {
        const parsed = parseAnalysis('{"topic":"Travel","options":"by car"}', CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(false);
        expect(parsed.defaultedFields).toEqual(['decision_point', 'options', 'context', 'next_steps']);
        expect(parsed.analysis).toEqual({
            topic: 'Travel',
            decision_point: 'Topic Discussion',
            options: ['Continue', 'Explore Further'],
            context: CHUNK_TEXT,
            next_steps: ['Continue conversation']
        });
    });

    it('keeps only string options, in order', () => {
        const raw = '{"topic":"T","decision_point":"D","options":["A",3,null,"B"],"context":"c","next_steps":["go"]}';

        expect(parseAnalysis(raw, CHUNK_TEXT).analysis.options).toEqual(['A', 'B']);
    });

    it('truncates fallback context to 100 characters', () => {
        const longText = 'x'.repeat(150);

        expect(fallbackAnalysis(longText).context).toBe('x'.repeat(100));
    });
});

describe('AnalysisService', () => {
    it('passes the chunk text to the analyzer and parses the reply', async () => {
        const analyzer = new FakeAnalyzer(() => DRINKS_JSON);
        const service = new AnalysisService(analyzer);

        const parsed = await service.analyze(CHUNK_TEXT);

        expect(analyzer.prompts).toEqual([CHUNK_TEXT]);
        expect(parsed.analysis.options).toEqual(['Coffee', 'Tea']);
    });

    it('falls back when the analyzer throws', async () => {
        const service = new AnalysisService(new FakeAnalyzer(() => {
            throw new Error('model crashed');
        }));

        const parsed = await service.analyze(CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(true);
        expect(parsed.analysis.topic).toBe('General Discussion');
    });

    it('falls back when the analyzer resolves to a non-string', async () => {
        const service = new AnalysisService({ name: 'null-analyzer', analyze: async () => JSON.parse('null') });

        const parsed = await service.analyze(CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(true);
        expect(parsed.analysis.options).toEqual(['Continue', 'Explore Further']);
    });

    it('falls back when the analyzer is too slow', async () => {
        const service = new AnalysisService(new FakeAnalyzer(() => new Promise<string>(() => undefined)), 20);

        const parsed = await service.analyze(CHUNK_TEXT);

        expect(parsed.usedFallback).toBe(true);
        expect(parsed.analysis.decision_point).toBe('Topic Discussion');
    });
});

describe('buildAnalysisPrompt', () => {
    it('quotes the segment and names every expected key', () => {
        const prompt = buildAnalysisPrompt('pick a date');

        expect(prompt).toContain('Conversation segment: "pick a date"');
        for (const key of ['"topic"', '"decision_point"', '"options"', '"context"', '"next_steps"']) {
            expect(prompt).toContain(key);
        }
    });
});
