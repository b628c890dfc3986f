import { serve } from '@hono/node-server';
import { resolve } from 'node:path';
import { createApp } from './app';
import { loadConfig } from './config';
import { FilesystemBackend, MemoryBackend } from './services/storage';

const config = loadConfig();
const storage = config.STORAGE === 'memory'
  ? new MemoryBackend()
  : new FilesystemBackend(resolve(config.DATA_DIR));

const app = createApp({ logging: config.LOG_REQUESTS, storage });

console.log(`Starting Sale Server on port ${config.PORT} (${storage.name} storage)...`);

serve({ fetch: app.fetch, port: config.PORT });
