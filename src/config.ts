// src/config.ts
import { PipelineConfig } from './core/documentPipeline';
import { HeadingLineage } from './core/types';
import { validateSplitterOptions } from './core/textSplitter';

export interface AppConfig {
    port: number;
    pipeline: PipelineConfig;
}

const LINEAGES: readonly HeadingLineage[] = ['text-prefix', 'document-order'];

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`FATAL: ${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function readLineage(env: NodeJS.ProcessEnv): HeadingLineage {
    const raw = env.HEADING_LINEAGE;
    if (raw === undefined || raw.trim() === '') {
        return 'text-prefix';
    }
    const lineage = LINEAGES.find(candidate => candidate === raw);
    if (!lineage) {
        throw new Error(`FATAL: HEADING_LINEAGE must be one of ${LINEAGES.join(', ')}, got "${raw}"`);
    }
    return lineage;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const pipeline: PipelineConfig = {
        chunkSize: readInteger(env, 'CHUNK_SIZE', 1000, 1),
        chunkOverlap: readInteger(env, 'CHUNK_OVERLAP', 150, 0),
        maxHeadingDepth: readInteger(env, 'MAX_HEADING_DEPTH', 3, 1),
        headingLineage: readLineage(env),
        fetchTimeoutMs: readInteger(env, 'FETCH_TIMEOUT_MS', 30000, 0),
        backgroundConcurrency: readInteger(env, 'BACKGROUND_CONCURRENCY', 2, 1),
    };

    try {
        validateSplitterOptions(pipeline);
    } catch (error) {
        throw new Error(`FATAL: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    return {
        port: readInteger(env, 'PORT', 3000, 0),
        pipeline,
    };
}
