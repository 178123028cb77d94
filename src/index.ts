import { config } from './config/env.config';
import { logger } from './config/logger.config';
import { createApp } from './app';
import { InMemoryCameraStore } from './services/cameraStore.service';
import { CameraRegistry } from './services/cameraRegistry.service';

const store = new InMemoryCameraStore();
const registry = new CameraRegistry(store, {
  heartbeatTimeoutSeconds: config.heartbeatTimeoutSeconds,
});
const app = createApp(registry);

const PORT = config.port;

const server = app.listen(PORT, () => {
  logger.info(`🚀 Server is running on http://localhost:${PORT}`);
  logger.info(`📷 Camera registry ready (heartbeat timeout ${config.heartbeatTimeoutSeconds}s)`);
});

server.on('error', (error) => {
  logger.error(`Failed to start server: ${error.message}`);
  process.exit(1);
});

export default app;
