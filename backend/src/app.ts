import express, { Application } from 'express';
import cors from 'cors';
import { PerformanceController } from './controllers/performanceController';
import { SessionController } from './controllers/sessionController';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createPerformanceRoutes } from './routes/performanceRoutes';
import { createSessionRoutes } from './routes/sessionRoutes';

export interface AppControllers {
  sessions: SessionController;
  performance: PerformanceController;
}

export interface AppOptions {
  frontendUrl: string;
}

export const createApp = (controllers: AppControllers, options: AppOptions): Application => {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.frontendUrl,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/sessions', createSessionRoutes(controllers.sessions));
  app.use('/api/performance', createPerformanceRoutes(controllers.performance));

  app.use(notFoundHandler);
  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};
