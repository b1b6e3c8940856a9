// src/server.ts
import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { DocumentPipeline } from './core/documentPipeline';

// --- CONFIGURATION & VALIDATION ---
const config = loadConfig();
const pipeline = new DocumentPipeline(config.pipeline);
const app = createApp(pipeline);

// --- START SERVER ---
app.listen(config.port, () => {
    console.log(`📄 doc-lineage is listening at http://localhost:${config.port}`);
    console.log(
        `   chunk size ${config.pipeline.chunkSize}, overlap ${config.pipeline.chunkOverlap}, ` +
        `headings to H${config.pipeline.maxHeadingDepth} (${config.pipeline.headingLineage} lineage)`,
    );
});
