import { Camera } from '../models/camera.model';
import { scopedLogger, SimpleLogger } from '../config/logger.config';

/** Keyed persistence for camera records. No business rules live here. */
export interface CameraStore {
  put(camera: Camera): void;
  get(id: string): Camera | undefined;
  delete(id: string): boolean;
  listAll(): Camera[];
}

export class InMemoryCameraStore implements CameraStore {
  private cameras: Map<string, Camera> = new Map();
  private logger: SimpleLogger;

  constructor(logger: SimpleLogger = scopedLogger('store')) {
    this.logger = logger;
  }

  // Inserts or overwrites by id
  put(camera: Camera): void {
    this.cameras.set(camera.id, structuredClone(camera));
    this.logger.debug(`Stored camera ${camera.id} (${this.cameras.size} total)`);
  }

  get(id: string): Camera | undefined {
    const camera = this.cameras.get(id);
    return camera ? structuredClone(camera) : undefined;
  }

  delete(id: string): boolean {
    const removed = this.cameras.delete(id);
    if (removed) {
      this.logger.debug(`Deleted camera ${id}`);
    }
    return removed;
  }

  // Snapshot in insertion order
  listAll(): Camera[] {
    return Array.from(this.cameras.values(), (camera) => structuredClone(camera));
  }
}
