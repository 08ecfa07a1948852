/**
 * Prints storage statistics for the configured database
 */

import * as dotenv from 'dotenv';
import { loadStorageConfig } from './config';
import { PaperDatabase } from './database';
import { errorMessage } from './errors';
import { PaperStore } from './store/paper-store';
import { StorageConfig } from './types';

// Load environment variables
dotenv.config();

async function main() {
    let config: StorageConfig;
    try {
        config = loadStorageConfig(process.env);
    } catch (error) {
        console.error('❌ Invalid configuration:', errorMessage(error));
        console.error('Please check your .env file (see .env.example)');
        process.exit(1);
    }

    const databaseUrl = config.database_url;
    if (!databaseUrl) {
        console.error('❌ DATABASE_URL not found in environment variables');
        process.exit(1);
    }

    const db = new PaperDatabase(databaseUrl);
    const store = new PaperStore(db, { maxStorageSize: config.max_storage_size });

    try {
        await db.ensureSchema();
        const stats = await store.getStorageStats();

        console.log('\n' + '='.repeat(60));
        console.log('📊 STORAGE STATISTICS');
        console.log('='.repeat(60));
        console.log(`Total papers: ${stats.total}`);
        console.log(`   - Sent: ${stats.sent}`);
        console.log(`   - Unsent: ${stats.unsent}`);
        console.log(`   - Never accessed: ${stats.never_accessed}`);
        console.log(`Capacity: ${stats.max_storage_size > 0 ? stats.max_storage_size : 'unbounded'}`);

        if (stats.oldest_papers.length > 0) {
            console.log('\n🧹 Next in line for eviction:');
            stats.oldest_papers.forEach((paper, i) => {
                const accessed = paper.last_accessed ? paper.last_accessed.toISOString() : 'never';
                console.log(`   ${i + 1}. ${paper.title}`);
                console.log(`      last accessed: ${accessed}, stored: ${paper.created_at.toISOString()}`);
            });
        }
        console.log('='.repeat(60));

    } catch (error) {
        console.error('❌ Could not read storage statistics:', error);
        process.exitCode = 1;
    } finally {
        await store.close();
    }
}

if (require.main === module) {
    main().catch(error => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
}
