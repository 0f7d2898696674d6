import { Request, Response, NextFunction } from 'express';
import { UserIdParamsSchema } from '../schemas/requests.schema';
import { PerformanceService } from '../services/performance/performanceService';

export class PerformanceController {
  constructor(private performance: PerformanceService) {}

  getPerformance = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = UserIdParamsSchema.parse(req.params);
      const report = await this.performance.getUserPerformance(userId);

      res.json({ success: true, data: report });
    } catch (error) {
      next(error);
    }
  };
}
