import path from 'path';
import express, { type Express, type Request, type Response } from 'express';
import { NODE_ENV } from './config.js';
import { registerRoutes, type RouteOptions } from './routes.js';

const STATIC_DIR = path.resolve(process.cwd(), 'dist', 'public');

export function createApp(options: RouteOptions = {}): Express {
  const app = express();
  app.use(express.json());

  registerRoutes(app, options);

  if (NODE_ENV === 'production') {
    // --- Static files (Vite build output) ---
    app.use(express.static(STATIC_DIR));

    // SPA fallback: serve index.html for any non-API route
    app.get('*', (_req: Request, res: Response) => {
      res.sendFile(path.join(STATIC_DIR, 'index.html'));
    });
  }

  return app;
}
