/**
 * Pipeline Runner
 *
 * Reads a candidate batch, drops papers already stored, classifies the rest
 * and stores every outcome.
 *
 * Usage: npm run pipeline -- <candidates.json> [--dry-run]
 */

import * as dotenv from 'dotenv';
import { parseArgs } from 'util';
import { loadConfig } from './config';
import { PaperDatabase } from './database';
import { ConfigError } from './errors';
import { MemoryPaperRepository } from './memory-database';
import { createPipeline } from './pipeline/create-pipeline';
import { JsonFilePaperSource } from './pipeline/json-paper-source';
import { PaperRepository } from './store/paper-repository';
import { AppConfig } from './types';

// Load environment variables
dotenv.config();

/**
 * Load configuration from environment variables, exiting on a ConfigError
 */
function loadConfigOrExit(dryRun: boolean): AppConfig {
    try {
        return loadConfig(process.env, { requireDatabase: !dryRun });
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`❌ Invalid configuration: ${error.message}`);
            console.error('Please check your .env file (see .env.example)');
            process.exit(1);
        }
        throw error;
    }
}

/**
 * Main entry point
 */
async function main() {
    const { values, positionals } = parseArgs({
        options: { 'dry-run': { type: 'boolean', default: false } },
        allowPositionals: true
    });
    const dryRun = values['dry-run'] === true;
    const inputPath = positionals[0];

    if (!inputPath) {
        console.error('❌ Missing candidate file');
        console.error('Usage: npm run pipeline -- <candidates.json> [--dry-run]');
        process.exit(1);
    }

    const config = loadConfigOrExit(dryRun);

    let repository: PaperRepository;
    if (dryRun || !config.storage.database_url) {
        console.log('🧪 Dry run: papers are kept in memory and no notification is sent');
        repository = new MemoryPaperRepository();
    } else {
        const db = new PaperDatabase(config.storage.database_url);
        const connected = await db.testConnection();
        if (!connected) {
            console.error('❌ Could not connect to database');
            process.exit(1);
        }
        await db.ensureSchema();
        repository = db;
    }

    const { store, pipeline, provider } = createPipeline(config, repository);
    console.log(`🤖 Classifier: ${provider.name} (${provider.model})`);
    if (config.storage.max_storage_size > 0) {
        console.log(`📦 Storage capacity: ${config.storage.max_storage_size} papers`);
    }

    // Ctrl+C stops the run between papers
    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.warn('\n⏹️  Interrupt received, stopping after the current paper...');
        controller.abort();
    });

    try {
        const source = new JsonFilePaperSource(inputPath);
        const candidates = await source.fetchCandidates();
        console.log(`\n📋 Read ${candidates.length} candidate papers from ${source.name}`);

        const result = await pipeline.run(candidates, { signal: controller.signal });

        for (const paper of result.relevant) {
            console.log(`\n📄 ${paper.title}`);
            console.log(`   ${paper.link}`);
            console.log(`   Score: ${paper.relevance_score.toFixed(2)} (${paper.decided_by})`);
            console.log(`   ${paper.relevance_reason}`);
        }

        await pipeline.showStats();

    } catch (error) {
        console.error('\n❌ Pipeline failed:', error);
        process.exitCode = 1;
    } finally {
        // Clean up
        await store.close();
    }
}

// Run the pipeline
if (require.main === module) {
    main().catch(error => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
}
