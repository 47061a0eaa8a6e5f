import express from 'express';
import cors from 'cors';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import { matchRoutes } from './models/match/match.routes';

export function createApp() {
  const app = express();

  // Basic middleware
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api', matchRoutes);

  // Error handling
  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
