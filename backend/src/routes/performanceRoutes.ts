import { Router } from 'express';
import { PerformanceController } from '../controllers/performanceController';

export const createPerformanceRoutes = (performanceController: PerformanceController): Router => {
  const router = Router();

  // Score trend and recommendations across a user's finished interviews
  router.get('/:userId', performanceController.getPerformance);

  return router;
};
