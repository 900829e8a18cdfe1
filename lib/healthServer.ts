import express, { type Express } from 'express';
import type { Server } from 'http';

export function createHealthApp(): Express {
  const app = express();

  app.get('/', (_req, res) => {
    res.type('html').send('<h3>Trading bot service is up ✅</h3>');
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}

export function startHealthServer(port: number): Promise<Server> {
  const app = createHealthApp();
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`[health] Listening on :${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
