import { Router } from 'express';
import { CameraController } from '../controllers/camera.controller';
import { FeedController } from '../controllers/feed.controller';
import { CameraRegistry } from '../services/cameraRegistry.service';

export const createCameraRoutes = (registry: CameraRegistry): Router => {
  const router = Router();
  const cameraController = new CameraController(registry);
  const feedController = new FeedController(registry);

  // Cameras
  router.post('/', (req, res) => cameraController.addCamera(req, res));
  router.get('/', (req, res) => cameraController.listCameras(req, res));
  router.get('/:cameraId', (req, res) => cameraController.getCamera(req, res));
  router.patch('/:cameraId', (req, res) => cameraController.updateCamera(req, res));
  router.delete('/:cameraId', (req, res) => cameraController.removeCamera(req, res));

  // Liveness
  router.post('/:cameraId/heartbeat', (req, res) => cameraController.heartbeat(req, res));
  router.get('/:cameraId/status', (req, res) => cameraController.getStatus(req, res));

  // Feeds
  router.post('/:cameraId/feeds', (req, res) => feedController.addFeed(req, res));
  router.get('/:cameraId/feeds', (req, res) => feedController.listFeeds(req, res));
  router.get('/:cameraId/feeds/:feedId', (req, res) => feedController.getFeed(req, res));
  router.patch('/:cameraId/feeds/:feedId', (req, res) => feedController.updateFeed(req, res));
  router.delete('/:cameraId/feeds/:feedId', (req, res) => feedController.removeFeed(req, res));

  return router;
};
