import express from 'express';
import cors from 'cors';
import { createSearchRouter } from './routes/search';
import { PipelineConfig, PipelineDeps } from './search/pipeline';

export interface AppOptions {
  corsOrigins?: string[];
}

export function createApp(deps: PipelineDeps, config: PipelineConfig, options: AppOptions = {}): express.Express {
  const app = express();

  // Middleware
  app.use(cors(options.corsOrigins && options.corsOrigins.length > 0 ? { origin: options.corsOrigins } : undefined));
  app.use(express.json());

  // Routes
  app.use('/api/search', createSearchRouter(deps, config));

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', message: 'Server is running' });
  });

  // Error handling middleware (malformed JSON bodies land here)
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body must be valid JSON' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      error: err instanceof Error ? err.message : 'Internal server error',
      details: process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined,
    });
  });

  return app;
}
