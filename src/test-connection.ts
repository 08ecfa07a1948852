/**
 * Test script to verify database and classifier connections
 */

import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { PaperDatabase } from './database';
import { errorMessage } from './errors';
import { createClassifierProvider } from './providers/provider-factory';
import { AppConfig, CandidatePaper } from './types';

// Load environment variables
dotenv.config();

const PROBE_PAPER: CandidatePaper = {
    id: 'connection-probe',
    title: 'Scaling collective communication for distributed GPU training',
    summary: 'We present a topology-aware all-reduce that lowers communication time for data-parallel training on GPU clusters.',
    authors: [],
    categories: ['cs.DC'],
    published: new Date(),
    link: 'https://example.org/connection-probe',
    pdf_link: null
};

async function testDatabase(config: AppConfig): Promise<boolean> {
    console.log('\n🔍 Testing Database Connection...');
    console.log('='.repeat(60));

    if (!config.storage.database_url) {
        console.error('❌ DATABASE_URL not found in .env file');
        return false;
    }

    const db = new PaperDatabase(config.storage.database_url);
    try {
        const connected = await db.testConnection();
        if (connected) {
            await db.ensureSchema();
            console.log('✅ papers table is ready');
        }
        return connected;
    } catch (error) {
        console.error('❌ Database test failed:', error);
        return false;
    } finally {
        await db.close();
    }
}

async function testClassifier(config: AppConfig): Promise<boolean> {
    console.log('\n🔍 Testing Classifier Connection...');
    console.log('='.repeat(60));

    const provider = createClassifierProvider(config.filter);
    console.log(`📡 Sending a probe paper to ${provider.name} (${provider.model})...`);

    try {
        const verdict = await provider.classify(PROBE_PAPER, {
            signal: AbortSignal.timeout(config.filter.timeout_ms)
        });
        console.log(`✅ Verdict: relevant=${verdict.is_relevant}, score=${verdict.score.toFixed(2)}`);
        console.log(`   Reason: ${verdict.reason}`);
        return true;
    } catch (error) {
        console.error('❌ Classifier test failed:', errorMessage(error));
        return false;
    }
}

async function main() {
    console.log('\n' + '='.repeat(60));
    console.log('🧪 TESTING PAPER FILTER SETUP');
    console.log('='.repeat(60));

    let config: AppConfig;
    try {
        config = loadConfig(process.env, { requireDatabase: false });
    } catch (error) {
        console.error('❌ Invalid configuration:', errorMessage(error));
        process.exit(1);
    }

    const dbOk = await testDatabase(config);
    const classifierOk = await testClassifier(config);

    // Summary
    console.log('\n' + '='.repeat(60));
    console.log('📋 TEST SUMMARY');
    console.log('='.repeat(60));
    console.log(`Database: ${dbOk ? '✅ PASS' : '❌ FAIL'}`);
    console.log(`Classifier: ${classifierOk ? '✅ PASS' : '❌ FAIL'}`);
    console.log('='.repeat(60));

    if (dbOk && classifierOk) {
        console.log('\n🎉 All checks passed! You are ready to run the pipeline.');
        console.log('\nNext step: npm run pipeline -- candidates.json');
    } else {
        console.log('\n⚠️  Some checks failed. Please check your configuration.');
        process.exit(1);
    }
}

if (require.main === module) {
    main().catch(error => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
}
