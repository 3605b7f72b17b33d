import { resolveServerConfig } from './config.js';
import { startSignalingServer } from './server.js';

startSignalingServer(resolveServerConfig(process.env))
  .then((server) => {
    const shutdown = () => {
      void server.close().then(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  })
  .catch((err: unknown) => {
    console.error('[SignalingServer] failed to start:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
