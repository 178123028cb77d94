import { randomUUID } from 'node:crypto';
import {
  Camera,
  CameraFilters,
  CameraState,
  CameraUpdate,
  Feed,
  FeedFilters,
  FeedSetup,
  FeedUpdate,
  NewCameraData,
} from '../models/camera.model';
import { CameraStore } from './cameraStore.service';
import { ConflictError, NotFoundError } from '../types/errors.types';
import { AddressRange, canonicalAddress, isInRange, parseAddress } from '../utils/ipAddress';
import { paginate } from '../utils/paginate';
import { scopedLogger, SimpleLogger } from '../config/logger.config';

export const DEFAULT_PAGE_SIZE = 20;

export interface CameraRegistryOptions {
  heartbeatTimeoutSeconds: number;
  now?: () => Date;
  logger?: SimpleLogger;
}

/**
 * Business rules over a {@link CameraStore}: uniqueness of addresses,
 * (name, model) pairs and feed ports, heartbeat liveness, and filtered,
 * paginated listings.
 *
 * Every method is synchronous. On Node's single event loop that makes each
 * scan-then-write atomic with respect to every other request, which is what
 * the cross-record uniqueness checks rely on. Moving to an asynchronous
 * store would need one reader/writer lock over the whole collection.
 */
export class CameraRegistry {
  private readonly store: CameraStore;
  private readonly heartbeatTimeoutMs: number;
  private readonly now: () => Date;
  private readonly logger: SimpleLogger;

  constructor(store: CameraStore, options: CameraRegistryOptions) {
    this.store = store;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutSeconds * 1000;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? scopedLogger('registry');
  }

  addCamera(data: NewCameraData): Camera {
    const existing = this.store.listAll();
    const ipAddress = canonicalAddress(data.network.ipAddress);

    if (existing.some((camera) => canonicalAddress(camera.network.ipAddress) === ipAddress)) {
      this.logger.warn(`Duplicate IP rejected: ${ipAddress}`);
      throw new ConflictError('A camera with this IP address already exists.');
    }

    if (existing.some((camera) => camera.name === data.name && camera.model === data.model)) {
      this.logger.warn(`Duplicate name+model rejected: ${data.name} | ${data.model}`);
      throw new ConflictError('A camera with same name and model already exists.');
    }

    // The initial batch is not checked against itself or against other cameras' ports
    const now = this.now();
    const camera: Camera = {
      id: randomUUID(),
      name: data.name,
      model: data.model,
      network: { ipAddress },
      imageSettings: { ...data.imageSettings },
      feeds: data.feeds.map((feed) => this.materializeFeed(feed)),
      createdAt: now,
      updatedAt: now,
      lastCheckin: null,
    };

    this.store.put(camera);
    this.logger.info(`📷 Camera created: ${camera.id} (${camera.network.ipAddress})`);
    return camera;
  }

  getCamera(cameraId: string): Camera {
    const camera = this.store.get(cameraId);
    if (!camera) {
      this.logger.warn(`Camera not found: ${cameraId}`);
      throw new NotFoundError('Camera not found.');
    }
    return camera;
  }

  removeCamera(cameraId: string): void {
    if (!this.store.delete(cameraId)) {
      this.logger.warn(`Cannot remove, camera not found: ${cameraId}`);
      throw new NotFoundError('Camera not found.');
    }
    this.logger.info(`🗑️ Camera removed: ${cameraId}`);
  }

  /**
   * Overwrites the fields present in `updates`. `updatedAt` only moves when
   * a value actually changes. Address and (name, model) uniqueness are not
   * re-checked here.
   */
  updateCamera(cameraId: string, updates: CameraUpdate): Camera {
    const camera = this.getCamera(cameraId);
    let changed = false;

    if (updates.name !== undefined && updates.name !== camera.name) {
      camera.name = updates.name;
      changed = true;
    }
    if (updates.model !== undefined && updates.model !== camera.model) {
      camera.model = updates.model;
      changed = true;
    }
    if (updates.network !== undefined) {
      const ipAddress = canonicalAddress(updates.network.ipAddress);
      if (ipAddress !== canonicalAddress(camera.network.ipAddress)) {
        camera.network = { ipAddress };
        changed = true;
      }
    }
    if (updates.imageSettings !== undefined) {
      const { brightness, contrast, saturation } = updates.imageSettings;
      const settings = camera.imageSettings;
      if (brightness !== undefined && brightness !== settings.brightness) {
        settings.brightness = brightness;
        changed = true;
      }
      if (contrast !== undefined && contrast !== settings.contrast) {
        settings.contrast = contrast;
        changed = true;
      }
      if (saturation !== undefined && saturation !== settings.saturation) {
        settings.saturation = saturation;
        changed = true;
      }
    }

    if (!changed) {
      this.logger.debug(`No fields changed for camera ${cameraId}`);
      return camera;
    }

    camera.updatedAt = this.now();
    this.store.put(camera);
    this.logger.info(`✏️ Camera updated: ${cameraId}`);
    return camera;
  }

  /**
   * Filters run in a fixed order (model, address range, online status),
   * each narrowing the previous result, then the result is paginated.
   */
  listCameras(filters: CameraFilters = {}, page = 1, pageSize = DEFAULT_PAGE_SIZE): Camera[] {
    let cameras = this.store.listAll();

    if (filters.model) {
      const needle = filters.model.toLowerCase();
      cameras = cameras.filter((camera) => camera.model.toLowerCase().includes(needle));
    }

    if (filters.ipFrom || filters.ipTo) {
      const range = this.parseRange(filters.ipFrom, filters.ipTo);
      cameras = cameras.filter((camera) => {
        const address = parseAddress(camera.network.ipAddress);
        return address !== null && isInRange(address, range);
      });
    }

    if (filters.online !== undefined) {
      const online = filters.online;
      cameras = cameras.filter((camera) => this.computeOnline(camera) === online);
    }

    this.logger.debug(`Listing cameras: ${cameras.length} matched, page ${page} of size ${pageSize}`);
    return paginate(cameras, page, pageSize);
  }

  addFeed(cameraId: string, setup: FeedSetup): Feed {
    const camera = this.getCamera(cameraId);

    if (camera.feeds.some((feed) => feed.protocol === setup.protocol && feed.port === setup.port)) {
      this.logger.warn(`Duplicate feed ${setup.protocol}:${setup.port} rejected on camera ${cameraId}`);
      throw new ConflictError('A feed with same protocol and port already exists for this camera.');
    }

    // Ports are global: any feed on any camera blocks reuse, whatever its protocol
    const portTaken = this.store
      .listAll()
      .some((other) => other.feeds.some((feed) => feed.port === setup.port));
    if (portTaken) {
      this.logger.warn(`Feed port ${setup.port} already in use, rejected on camera ${cameraId}`);
      throw new ConflictError(`Feed port ${setup.port} already used by another feed.`);
    }

    const feed = this.materializeFeed(setup);
    camera.feeds.push(feed);
    camera.updatedAt = this.now();
    this.store.put(camera);
    this.logger.info(`🎥 Feed ${feed.id} added to camera ${cameraId}`);
    return feed;
  }

  getFeed(cameraId: string, feedId: string): Feed {
    const camera = this.getCamera(cameraId);
    return this.findFeed(camera, feedId);
  }

  /** Overwrites the present fields. Port uniqueness is not re-checked. */
  updateFeed(cameraId: string, feedId: string, updates: FeedUpdate): Feed {
    const camera = this.getCamera(cameraId);
    const feed = this.findFeed(camera, feedId);

    if (updates.protocol !== undefined) {
      feed.protocol = updates.protocol;
    }
    if (updates.port !== undefined) {
      feed.port = updates.port;
    }
    if (updates.path !== undefined) {
      feed.path = updates.path;
    }

    camera.updatedAt = this.now();
    this.store.put(camera);
    this.logger.info(`✏️ Feed ${feedId} updated on camera ${cameraId}`);
    return feed;
  }

  removeFeed(cameraId: string, feedId: string): void {
    const camera = this.getCamera(cameraId);
    const feed = this.findFeed(camera, feedId);

    camera.feeds = camera.feeds.filter((candidate) => candidate !== feed);
    camera.updatedAt = this.now();
    this.store.put(camera);
    this.logger.info(`🗑️ Feed ${feedId} removed from camera ${cameraId}`);
  }

  listFeeds(
    cameraId: string,
    filters: FeedFilters = {},
    page = 1,
    pageSize = DEFAULT_PAGE_SIZE
  ): Feed[] {
    const camera = this.getCamera(cameraId);
    const protocol = filters.protocol?.toLowerCase();
    const pathNeedle = filters.pathContains?.toLowerCase();

    const feeds = camera.feeds.filter(
      (feed) =>
        (!protocol || feed.protocol.toLowerCase() === protocol) &&
        (filters.port === undefined || feed.port === filters.port) &&
        (!pathNeedle || feed.path.toLowerCase().includes(pathNeedle))
    );

    return paginate(feeds, page, pageSize);
  }

  heartbeat(cameraId: string): void {
    const camera = this.getCamera(cameraId);
    const now = this.now();
    camera.lastCheckin = now;
    camera.updatedAt = now;
    this.store.put(camera);
    this.logger.info(`💓 Heartbeat from camera ${cameraId}`);
  }

  isOnline(cameraId: string): boolean {
    return this.computeOnline(this.getCamera(cameraId));
  }

  getCameraStatus(cameraId: string): CameraState {
    const camera = this.getCamera(cameraId);
    return {
      cameraId: camera.id,
      isOnline: this.computeOnline(camera),
      lastCheckin: camera.lastCheckin,
    };
  }

  // Staleness is only discovered when asked; nothing expires in the background
  private computeOnline(camera: Camera): boolean {
    if (!camera.lastCheckin) {
      return false;
    }
    return this.now().getTime() - camera.lastCheckin.getTime() <= this.heartbeatTimeoutMs;
  }

  private parseRange(ipFrom?: string, ipTo?: string): AddressRange {
    const from = ipFrom ? parseAddress(ipFrom) : null;
    const to = ipTo ? parseAddress(ipTo) : null;
    if ((ipFrom && !from) || (ipTo && !to)) {
      this.logger.warn(`Invalid IP range bounds: ${ipFrom ?? '*'} - ${ipTo ?? '*'}`);
      throw new ConflictError('Invalid IP format.');
    }
    return { from, to };
  }

  private findFeed(camera: Camera, feedId: string): Feed {
    const feed = camera.feeds.find((candidate) => candidate.id === feedId);
    if (!feed) {
      this.logger.warn(`Feed ${feedId} not found on camera ${camera.id}`);
      throw new NotFoundError('Feed not found.');
    }
    return feed;
  }

  private materializeFeed(setup: FeedSetup): Feed {
    return {
      id: randomUUID(),
      protocol: setup.protocol,
      port: setup.port,
      path: setup.path,
    };
  }
}
