import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from './config.js';
import { RecordStore } from './db/record-store.js';
import { XtreamClient } from './catalog/xtream.js';
import { FileMatcher } from './services/file-matcher.js';
import { QueueManager } from './services/queue-manager.js';
import { startWatcher, stopWatcher } from './services/watcher.js';
import { buildServer } from './server.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  VOD Downloader');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Provider: ${config.xtream.url}`);
  console.log(`Download path: ${config.downloadPath}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log('');

  for (const dir of [config.dataPath, config.downloadPath]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const store = new RecordStore(path.join(config.dataPath, 'downloads.json'));
  const matcher = new FileMatcher(config.downloadPath, {
    minFileSize: config.minFileSize,
    movieTolerance: config.movieMatchTolerance,
  });
  const catalog = new XtreamClient({
    url: config.xtream.url,
    username: config.xtream.username,
    password: config.xtream.password,
    timeoutMs: config.xtream.timeoutMs,
  });
  const manager = new QueueManager(
    { store, matcher, provider: catalog },
    {
      downloadPath: config.downloadPath,
      chunkSize: config.chunkSize,
      minFileSize: config.minFileSize,
      cooldownMs: config.cooldownMs,
    }
  );

  await manager.init();
  manager.start();

  if (config.watchDownloads) {
    await startWatcher(config.downloadPath, () => manager.scanFiles());
  }

  const app = await buildServer({ manager, catalog });

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    await stopWatcher();
    await app.close();
    await manager.shutdown();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
