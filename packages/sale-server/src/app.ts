import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { cors } from 'hono/cors';
import { allowlists } from './routes/allowlists';
import { createSalesRoutes } from './routes/sales';
import { DeploymentService } from './services/deployments';
import { isChainError } from './services/errors';
import { MemoryBackend } from './services/storage';
import { systemClock, type Clock } from './services/chain';
import type { StorageBackend } from './types';

export interface AppOptions {
  logging?: boolean;
  storage?: StorageBackend;
  clock?: Clock;
}

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();
  const storage = options.storage ?? new MemoryBackend();
  const deployments = new DeploymentService(storage, options.clock ?? systemClock);

  // Middleware
  if (options.logging !== false) {
    app.use('*', logger());
  }
  app.use('*', cors());

  // Health check
  app.get('/health', async (c) => {
    const backend = await storage.health();
    return c.json({
      status: backend.healthy ? 'ok' : 'degraded',
      storage: { name: storage.name, ...backend },
      timestamp: new Date().toISOString(),
    });
  });

  // Mount routes
  app.route('/allowlists', allowlists);
  app.route('/sales', createSalesRoutes(deployments));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Contract reverts become 4xx, anything else is a server error
  app.onError((err, c) => {
    if (isChainError(err)) {
      return c.json({ error: err.code, message: err.message }, err.code === 'Unauthorized' ? 403 : 422);
    }

    console.error('Server error:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
