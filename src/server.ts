import 'dotenv/config';
import http from 'http';
import logger from './utils/logger.js';
import { debugManager, initializeDebugManager } from './utils/debug-manager.js';
import { getErrorMessage } from './utils/error-helper.js';
import { backoffDelay } from './utils/retry.js';
import { formatConfigInfo, loadConfiguration, streamerLocation } from './utils/config-loader.js';
import { UPnPSubscriber } from './upnp/subscriber.js';
import { CapabilityNegotiator } from './capability-negotiator.js';
import { StreamerDevice } from './streamer-device.js';
import { BroadlinkClient } from './broadlink/broadlink-client.js';
import { RemoteCommandBridge } from './remote-command-bridge.js';
import { ApiRouter, type StreamEvent } from './api-router.js';
import type { PlaybackSnapshot } from './types/streamer.js';
import type { StateTransition } from './playback-state-machine.js';

// Load configuration from multiple sources
const configResult = loadConfiguration();
const config = configResult.config;
logger.info(formatConfigInfo(configResult));

// Initialize debug manager with the loaded config
initializeDebugManager(config);

const location = streamerLocation(config);
if (!location) {
  logger.error('No streamer configured: set STREAMER_LOCATION or STREAMER_HOST');
  process.exit(1);
}

// NOTIFYs land here and are queued on the device; nothing else runs in the handler
const subscriber = new UPnPSubscriber(event => device.pushEvent(event), {
  timeoutMs: config.httpTimeout,
  callbackHost: config.callback.host
});

const negotiator = new CapabilityNegotiator({
  timeoutMs: config.httpTimeout,
  subscriptionTimeout: config.subscriptionTimeout
});

const device = new StreamerDevice({
  location,
  negotiator,
  subscriber,
  httpTimeout: config.httpTimeout,
  subscriptionTimeout: config.subscriptionTimeout,
  pollInterval: config.pollInterval,
  malformedThreshold: config.malformedThreshold,
  volumeStep: config.volumeStep
});

let bridge: RemoteCommandBridge | undefined;
if (config.broadlink) {
  const client = new BroadlinkClient({
    host: config.broadlink.host,
    port: config.broadlink.port,
    mac: config.broadlink.mac,
    devtype: config.broadlink.devtype,
    timeoutMs: config.httpTimeout
  });
  bridge = new RemoteCommandBridge(client, config.buttonCodes, { debounceMs: config.debounceMs });
} else {
  logger.info('No Broadlink bridge configured, remote buttons disabled');
}

const router = new ApiRouter(device, config, bridge);

const server = http.createServer((req, res) => {
  router.handleRequest(req, res).catch((error) => {
    logger.error(`Unhandled request error: ${getErrorMessage(error)}`);
    if (!res.headersSent) {
      res.statusCode = 500;
    }
    res.end();
  });
});

function publish(event: StreamEvent): void {
  router.broadcast(event);

  // Send to webhooks
  config.webhooks.forEach(webhook => {
    // Skip invalid URLs
    try {
      new URL(webhook.url);
    } catch {
      return;
    }

    fetch(webhook.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...webhook.headers
      },
      body: JSON.stringify(event),
      signal: AbortSignal.timeout(config.httpTimeout)
    }).catch((error) => {
      logger.error(`Webhook error for ${webhook.url}: ${getErrorMessage(error)}`);
    });
  });
}

device.on('snapshot', (snapshot: PlaybackSnapshot) => {
  publish({ type: 'snapshot', data: snapshot });
});

device.on('state-change', (transition: StateTransition) => {
  debugManager.info('state', `Player ${transition.from} -> ${transition.to}`);
  publish({ type: 'state-change', data: transition });
});

device.on('unreachable', (reason: string) => {
  publish({ type: 'unreachable', data: { reason, timestamp: new Date().toISOString() } });
  scheduleReconnect(1);
});

device.on('recovered', (snapshot: PlaybackSnapshot) => {
  publish({ type: 'recovered', data: snapshot });
});

let reconnectTimer: NodeJS.Timeout | undefined;

/**
 * Keep trying the device with backoff (5s doubling to 5min) until it answers
 */
function scheduleReconnect(attempt: number): void {
  if (reconnectTimer || isShuttingDown) {
    return;
  }
  const delay = backoffDelay(attempt, 5000, 300000);
  logger.info(`Retrying streamer at ${location} in ${Math.round(delay / 1000)}s`);
  reconnectTimer = setTimeout(() => {
    reconnectTimer = undefined;
    const attemptConnect = device.getCapabilities() ? device.reconnect() : device.connect();
    attemptConnect.catch((error) => {
      logger.warn(`Streamer still unavailable: ${getErrorMessage(error)}`);
      scheduleReconnect(attempt + 1);
    });
  }, delay);
  reconnectTimer.unref();
}

// Graceful shutdown
let isShuttingDown = false;

async function shutdown(): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info('Shutting down gracefully...');

  if (reconnectTimer) {
    clearTimeout(reconnectTimer);
    reconnectTimer = undefined;
  }

  // Force exit after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();

  router.closeClients();
  server.close(() => {
    logger.info('HTTP server closed');
  });

  try {
    await device.close();
    await bridge?.close();
    await subscriber.stop();
  } catch (error) {
    logger.error(`Error during shutdown: ${getErrorMessage(error)}`);
  }
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

// Start server
async function start(): Promise<void> {
  await subscriber.start(config.callback.port);

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(`Port ${config.port} is already in use`);
    } else {
      logger.error(`Server error: ${err.message}`);
    }
    process.exit(1);
  });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => resolve());
  });
  logger.always(`✅ Server ready at http://${config.host}:${config.port}`);

  try {
    await device.connect();
    const descriptor = device.getDescriptor();
    const capabilities = device.getCapabilities();
    logger.info('═══════════════════════════════════════');
    logger.info(`🎵 ${descriptor?.manufacturer ?? ''} ${descriptor?.modelName ?? ''} '${descriptor?.friendlyName ?? location}'`);
    logger.info(`🔊 Volume: ${capabilities?.hasVolume ? 'yes' : 'no'}, sources: ${capabilities?.sources.length ?? 0}, seek: ${capabilities?.hasSeek ? 'yes' : 'no'}`);
    logger.info(`🎛️  Remote buttons: ${bridge ? Object.keys(config.buttonCodes).length : 0} configured`);
    logger.info(`🔗 Webhooks: ${config.webhooks.length} configured`);
    logger.info('═══════════════════════════════════════');
  } catch (error) {
    logger.error(`Failed to connect to streamer at ${location}: ${getErrorMessage(error)}`);
    scheduleReconnect(1);
  }
}

start().catch((error) => {
  logger.error(`Failed to start: ${getErrorMessage(error)}`);
  process.exit(1);
});
