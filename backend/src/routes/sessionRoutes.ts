import { Router } from 'express';
import { SessionController } from '../controllers/sessionController';

export const createSessionRoutes = (sessionController: SessionController): Router => {
  const router = Router();

  // Start a new interview session
  router.post('/start', sessionController.startSession);

  // Stage progress and completion flag from the session store
  router.get('/:sessionId/progress', sessionController.getProgress);

  // Live interview summary
  router.get('/:sessionId/summary', sessionController.getSummary);

  // End interview session and trigger evaluation
  router.post('/:sessionId/end', sessionController.endSession);

  // Get interview results and evaluation
  router.get('/:sessionId/results', sessionController.getResults);

  return router;
};
