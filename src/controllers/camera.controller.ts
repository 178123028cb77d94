import { Request, Response } from 'express';
import { CameraRegistry } from '../services/cameraRegistry.service';
import {
  cameraUpdateSchema,
  idParamSchema,
  listCamerasQuerySchema,
  newCameraSchema,
} from '../models/camera.schema';
import { MessageResponse } from '../types/api.types';
import { sendError } from '../utils/errorResponse';

export class CameraController {
  constructor(private readonly registry: CameraRegistry) {}

  // Register a new camera with its initial feeds
  addCamera(req: Request, res: Response): void {
    try {
      const data = newCameraSchema.parse(req.body);
      const camera = this.registry.addCamera(data);
      res.status(201).json(camera);
    } catch (error) {
      sendError(req, res, error, 'adding camera');
    }
  }

  // List cameras with optional model / IP range / online filters
  listCameras(req: Request, res: Response): void {
    try {
      const { page, pageSize, ...filters } = listCamerasQuerySchema.parse(req.query);
      const cameras = this.registry.listCameras(filters, page, pageSize);
      res.json(cameras);
    } catch (error) {
      sendError(req, res, error, 'listing cameras');
    }
  }

  getCamera(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      res.json(this.registry.getCamera(cameraId));
    } catch (error) {
      sendError(req, res, error, 'fetching camera');
    }
  }

  updateCamera(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const updates = cameraUpdateSchema.parse(req.body);
      res.json(this.registry.updateCamera(cameraId, updates));
    } catch (error) {
      sendError(req, res, error, 'updating camera');
    }
  }

  // Removing a camera drops all of its feeds with it
  removeCamera(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      this.registry.removeCamera(cameraId);
      const body: MessageResponse = { message: 'Camera removed successfully' };
      res.json(body);
    } catch (error) {
      sendError(req, res, error, 'removing camera');
    }
  }

  heartbeat(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      this.registry.heartbeat(cameraId);
      const body: MessageResponse = { message: 'Heartbeat updated' };
      res.json(body);
    } catch (error) {
      sendError(req, res, error, 'recording heartbeat');
    }
  }

  getStatus(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      res.json(this.registry.getCameraStatus(cameraId));
    } catch (error) {
      sendError(req, res, error, 'fetching camera status');
    }
  }
}
