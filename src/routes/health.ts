import { Router } from 'express';
import type { GatewayStatus } from '../gateway';

const startTime = Date.now();

export function createHealthRouter(getStatus: () => GatewayStatus): Router {
  const router = Router();

  // Liveness: 200 whenever the process is serving requests
  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/', (_req, res) => {
    const status = getStatus();
    res.status(status.registered ? 200 : 503).json({
      status: status.registered ? 'ok' : 'not_registered',
      registered: status.registered,
      registration_attempts: status.registrationAttempts,
      call: status.call
        ? {
            call_id: status.call.callId,
            phase: status.call.phase,
            ai_state: status.call.aiState,
            buffered_playback_bytes: status.call.bufferedPlaybackBytes,
          }
        : null,
      bridge: status.bridge,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    });
  });

  return router;
}
