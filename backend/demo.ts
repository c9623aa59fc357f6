/**
 * Runs a scripted conversation through a session against a local Ollama
 * server, then prints the decision graph and saves the export.
 * Run with: npm run demo
 */

import { loadConfig, THRESHOLD_PRESETS } from './src/config';
import { OllamaService } from './src/services/ollama.service';
import { OllamaEmbeddingService } from './src/services/embedding.service';
import { ConversationSession } from './src/services/session.service';
import { StorageService } from './src/services/storage.service';

const SAMPLE_CONVERSATION = [
    'I want to build a voice transcription system',
    'The system should work in real-time',
    'I need to process audio from a microphone',
    'The transcription should be accurate',
    'I want to group related conversation parts',
    'Semantic chunking would be useful',
    'I need to create decision trees from conversations',
    'The system should use local AI models',
    'Ollama with Llama would be perfect for this',
    'I want to visualize the conversation flow'
];

async function main(): Promise<void> {
    console.log('🎯 Conversation Decision Graph - Demo');
    console.log('='.repeat(50));

    const config = loadConfig();
    const analyzer = new OllamaService({
        baseUrl: config.ollama.url,
        model: config.ollama.model,
        timeoutMs: config.timeouts.analyzerMs
    });

    if (!(await analyzer.isAvailable())) {
        console.log(`❌ Ollama is not ready. Start it and run: ollama pull ${config.ollama.model}`);
        process.exitCode = 1;
        return;
    }

    const session = new ConversationSession({
        analyzer,
        embedder: new OllamaEmbeddingService({
            baseUrl: config.ollama.url,
            model: config.ollama.embeddingModel,
            timeoutMs: config.timeouts.embeddingMs
        }),
        threshold: THRESHOLD_PRESETS.exploratory,
        windowSize: config.chunking.windowSize
    });

    for (const text of SAMPLE_CONVERSATION) {
        const result = await session.ingest(text);
        if (result.error) {
            console.log(`⚠️ #${result.utterance.id}: ${result.error}`);
        }
    }
    await session.stop();

    const summary = session.getSummary();
    console.log('\n📈 Conversation Summary:');
    console.log(`  - Total segments: ${summary.totalSegments}`);
    console.log(`  - Semantic chunks: ${summary.semanticChunks}`);
    console.log(`  - Decision nodes: ${summary.decisionNodes}`);
    console.log(`  - Option nodes: ${summary.optionNodes}`);

    const graph = session.getGraph();
    for (const decision of graph.getDecisionNodes()) {
        console.log(`\n🌳 ${decision.id}: ${decision.topic} / ${decision.decisionPoint}`);
        for (const option of graph.getOptions(decision.id)) {
            console.log(`   └─ ${option.text}`);
        }
    }

    const file = await new StorageService(config.dataDir).saveSnapshot(session.snapshot());
    console.log(`\n✅ Demo complete, export written to ${file}`);
}

main().catch(error => {
    console.error('❌ Demo failed:', error);
    process.exitCode = 1;
});
