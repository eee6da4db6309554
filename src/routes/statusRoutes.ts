// src/routes/statusRoutes.ts
import StatusController from '../controllers/StatusController';
import { Router } from 'express';

const statusRoutes = Router();

statusRoutes.get('/health', StatusController.health);
statusRoutes.get('/api/readings/latest', StatusController.latest);
statusRoutes.get('/api/status/live-emit', StatusController.liveEmitStatus);
statusRoutes.post('/api/status/live-emit', StatusController.liveEmitSet);

export default statusRoutes;
