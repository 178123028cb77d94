import { Request, Response } from 'express';
import { CameraRegistry } from '../services/cameraRegistry.service';
import {
  feedSetupSchema,
  feedUpdateSchema,
  idParamSchema,
  listFeedsQuerySchema,
} from '../models/camera.schema';
import { MessageResponse } from '../types/api.types';
import { sendError } from '../utils/errorResponse';

export class FeedController {
  constructor(private readonly registry: CameraRegistry) {}

  addFeed(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const setup = feedSetupSchema.parse(req.body);
      const feed = this.registry.addFeed(cameraId, setup);
      res.status(201).json({ message: 'Feed added', feed });
    } catch (error) {
      sendError(req, res, error, 'adding feed');
    }
  }

  // Filter by protocol, port and a path substring (q)
  listFeeds(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const { protocol, port, q, page, pageSize } = listFeedsQuerySchema.parse(req.query);
      const feeds = this.registry.listFeeds(cameraId, { protocol, port, pathContains: q }, page, pageSize);
      res.json(feeds);
    } catch (error) {
      sendError(req, res, error, 'listing feeds');
    }
  }

  getFeed(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const feedId = idParamSchema.parse(req.params.feedId);
      res.json(this.registry.getFeed(cameraId, feedId));
    } catch (error) {
      sendError(req, res, error, 'fetching feed');
    }
  }

  updateFeed(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const feedId = idParamSchema.parse(req.params.feedId);
      const updates = feedUpdateSchema.parse(req.body);
      const feed = this.registry.updateFeed(cameraId, feedId, updates);
      res.json({ message: 'Feed updated', feed });
    } catch (error) {
      sendError(req, res, error, 'updating feed');
    }
  }

  removeFeed(req: Request, res: Response): void {
    try {
      const cameraId = idParamSchema.parse(req.params.cameraId);
      const feedId = idParamSchema.parse(req.params.feedId);
      this.registry.removeFeed(cameraId, feedId);
      const body: MessageResponse = { message: 'Feed removed successfully' };
      res.json(body);
    } catch (error) {
      sendError(req, res, error, 'removing feed');
    }
  }
}
