// src/controllers/StatusController.ts
import { BadRequestError, NotFoundError } from '../errors/CustomError';
import { AcquisitionStatus } from '../services/AcquisitionStatusService';
import { NextFunction, Request, Response } from 'express';

class StatusController {
  /**
   * GET /health
   * Session state, counters and the last recorded reading.
   */
  async health(req: Request, res: Response, next: NextFunction) {
    try {
      return res.status(200).json(AcquisitionStatus.snapshot());
    } catch (err) {
      return next(err);
    }
  }

  /**
   * GET /api/readings/latest
   * 404 until the first reading has been recorded.
   */
  async latest(req: Request, res: Response, next: NextFunction) {
    try {
      const reading = AcquisitionStatus.getLatest();
      if (!reading) {
        throw new NotFoundError('No reading recorded yet');
      }
      return res.status(200).json({ success: true, data: reading });
    } catch (err) {
      return next(err);
    }
  }

  /**
   * GET /api/status/live-emit
   */
  async liveEmitStatus(req: Request, res: Response, next: NextFunction) {
    try {
      const enabled = AcquisitionStatus.isLiveEmitEnabled();
      return res.status(200).json({ success: true, data: { enabled } });
    } catch (err) {
      return next(err);
    }
  }

  /**
   * POST /api/status/live-emit
   * Body: { enabled: boolean }
   */
  async liveEmitSet(req: Request, res: Response, next: NextFunction) {
    try {
      const enabled: unknown = req.body?.enabled;
      if (typeof enabled !== 'boolean') {
        throw new BadRequestError('enabled (boolean) is required');
      }
      AcquisitionStatus.setLiveEmitEnabled(enabled);
      return res.status(200).json({ success: true, data: { enabled } });
    } catch (err) {
      return next(err);
    }
  }
}

export default new StatusController();
