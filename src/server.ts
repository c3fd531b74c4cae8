import * as fs from 'fs';
import path from 'path';
import { createApp } from './app';
import { loadSettings } from './config/settings';
import { closeDb, getDb } from './db/postgres';
import { JobStore } from './jobs/jobStore';
import { UPLOAD_PREFIX } from './middleware/upload';

const settings = loadSettings();
const db = getDb(settings.database);
const jobs = new JobStore();
const app = createApp({ db, settings, jobs });

/**
 * Clean up old files in storage directory (handles orphaned files from crashes)
 */
function cleanupOldStorageFiles(): void {
  try {
    if (!fs.existsSync(settings.storageDir)) {
      return;
    }

    const now = Date.now();
    let cleanedCount = 0;

    for (const file of fs.readdirSync(settings.storageDir)) {
      if (!file.startsWith(UPLOAD_PREFIX)) {
        continue;
      }

      const filePath = path.join(settings.storageDir, file);
      try {
        const age = now - fs.statSync(filePath).mtimeMs;
        if (age > settings.storageMaxAgeMs) {
          fs.unlinkSync(filePath);
          cleanedCount++;
        }
      } catch (err) {
        console.error(`[Cleanup] Error processing file ${file}:`, err);
      }
    }

    if (cleanedCount > 0) {
      console.log(`[Cleanup] Removed ${cleanedCount} orphaned file(s) from storage`);
    }
  } catch (err) {
    console.error('[Cleanup] Error cleaning storage directory:', err);
  }
}

cleanupOldStorageFiles();

// Handle uncaught exceptions
process.on('uncaughtException', async (err: Error) => {
  console.error('UNCAUGHT EXCEPTION! Shutting down...');
  console.error(err.name, err.message);
  console.error(err.stack);

  try {
    await closeDb();
  } catch (poolErr) {
    console.error('[Emergency] Pool close failed:', poolErr);
  }
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', async (reason: unknown) => {
  console.error('UNHANDLED REJECTION! Shutting down...');
  console.error(reason);

  try {
    await closeDb();
  } catch (poolErr) {
    console.error('[Emergency] Pool close failed:', poolErr);
  }
  process.exit(1);
});

// Graceful shutdown
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, async () => {
    console.log(`${signal} received, closing database pool...`);
    await closeDb();
    process.exit(0);
  });
}

app.listen(settings.port, () => {
  console.log(`Staged table loader running on port ${settings.port}`);
  console.log(
    `Staging source: ${settings.staging.schema}.${settings.staging.table}(${settings.staging.column}), delimiter: ${
      settings.staging.delimiter === '\t' ? 'TAB' : settings.staging.delimiter
    }`
  );
});
