// --- FILE: scripts/demo.ts ---
// Prints a window of enriched chunks for one document:
//   npm run demo -- <document-url> [start] [count]

import 'dotenv/config';
import { loadConfig } from '../config';
import { DocumentPipeline } from '../core/documentPipeline';

function readIndex(raw: string | undefined, fallback: number): number {
    const value = raw === undefined ? fallback : Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`Expected a non-negative integer, got "${raw}"`);
    }
    return value;
}

async function main() {
    const [documentUrl, rawStart, rawCount] = process.argv.slice(2);
    if (!documentUrl) {
        console.error('Usage: demo <document-url> [start] [count]');
        process.exitCode = 1;
        return;
    }
    const start = readIndex(rawStart, 0);
    const count = readIndex(rawCount, 3);

    const pipeline = new DocumentPipeline(loadConfig().pipeline);
    const chunks = await pipeline.loadAndChunkInBackground(documentUrl);

    console.log('\n--- Verification of Enriched Chunks ---');
    const end = Math.min(start + count, chunks.length);
    for (let i = start; i < end; i++) {
        console.log(`\n--- Chunk ${i + 1} ---`);
        console.log(chunks[i].content);
        console.log(chunks[i].metadata);
    }
}

main().catch(error => {
    console.error('Demo failed:', error);
    process.exitCode = 1;
});
