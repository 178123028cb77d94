export const FEED_PROTOCOLS = ['rtsp', 'http'] as const;

export type FeedProtocol = (typeof FEED_PROTOCOLS)[number];

export interface ImageSettings {
  brightness: number;
  contrast: number;
  saturation: number;
}

export interface NetworkSetup {
  ipAddress: string;
}

export interface Feed {
  id: string;
  protocol: FeedProtocol;
  port: number;
  path: string;
}

export interface Camera {
  id: string;
  name: string;
  model: string;
  network: NetworkSetup;
  imageSettings: ImageSettings;
  feeds: Feed[];
  createdAt: Date;
  updatedAt: Date;
  // null until the first heartbeat
  lastCheckin: Date | null;
}

export interface CameraState {
  cameraId: string;
  isOnline: boolean;
  lastCheckin: Date | null;
}

export type FeedSetup = Omit<Feed, 'id'>;

export interface NewCameraData {
  name: string;
  model: string;
  network: NetworkSetup;
  imageSettings: ImageSettings;
  feeds: FeedSetup[];
}

export interface CameraUpdate {
  name?: string;
  model?: string;
  network?: NetworkSetup;
  imageSettings?: Partial<ImageSettings>;
}

export type FeedUpdate = Partial<FeedSetup>;

export interface CameraFilters {
  model?: string;
  ipFrom?: string;
  ipTo?: string;
  online?: boolean;
}

export interface FeedFilters {
  protocol?: string;
  port?: number;
  pathContains?: string;
}
