import { Router } from 'express';
import { createCameraRoutes } from './camera.routes';
import { CameraRegistry } from '../services/cameraRegistry.service';

export const createRoutes = (registry: CameraRegistry): Router => {
  const router = Router();

  router.use('/cameras', createCameraRoutes(registry));

  return router;
};
