import type http from 'http';
import { buildGatewayConfig } from './config';
import { ConfigError, loadEnv } from './env';
import { VoiceGateway } from './gateway';
import { applyLogLevel, log } from './log';
import { buildServer } from './server';

const SHUTDOWN_TIMEOUT_MS = 10_000;

function loadConfig() {
  try {
    const env = loadEnv();
    applyLogLevel(env.LOG_LEVEL);
    return buildGatewayConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.fatal({ event: 'config_invalid', issues: error.issues }, 'configuration error');
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfig();
const gateway = new VoiceGateway(config);
let server: http.Server | null = null;

if (config.http.port !== undefined) {
  const port = config.http.port;
  server = buildServer(() => gateway.status()).server;
  server.listen(port, () => {
    log.info({ port }, 'http server listening');
  });
}

log.info(
  {
    event: 'gateway_config',
    extension: config.sip.extension,
    sip_server: config.sip.server,
    codec: config.sip.codec,
    model: config.gemini.model,
    voice: config.gemini.voice,
  },
  'voice gateway configured',
);

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    log.warn({ signal }, 'shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info({ signal }, 'graceful shutdown initiated');

  const forceExit = setTimeout(() => {
    log.warn({ timeout_ms: SHUTDOWN_TIMEOUT_MS }, 'shutdown timeout reached, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server?.close(() => {
    log.info('http server closed');
  });

  try {
    await gateway.stop();
  } catch (error) {
    log.error({ err: error }, 'gateway stop failed');
  }

  log.info('shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

process.on('uncaughtException', (error) => {
  log.fatal({ err: error }, 'uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error({ reason }, 'unhandled rejection');
});

gateway
  .start()
  .then((registered) => {
    if (!registered && !isShuttingDown) {
      log.fatal({ event: 'gateway_start_failed' }, 'could not register with the sip server, exiting');
      process.exit(1);
    }
  })
  .catch((error: unknown) => {
    log.fatal({ err: error }, 'gateway failed to start');
    process.exit(1);
  });
