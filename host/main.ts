#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';

// Load .env from the working directory before anything reads process.env
loadEnv({ path: resolve(process.cwd(), '.env') });

import { createGloveSession } from '../ble-bridge/BleServiceFactory';
import type { DeviceHandle } from '../ble-bridge/BleBridgeTypes';
import { configureLogging, createLogger, getLogFilePath } from '../shared/Logger';
import { describeError } from '../shared/errors';
import { DisplayFeed } from '../websocket-bridge/DisplayFeed';
import { WebSocketBridge } from '../websocket-bridge/WebSocketBridge';
import { loadConfig } from './config';
import { GloveController } from './GloveController';

const log = createLogger('Main');

function pickDevice(devices: DeviceHandle[], address: string | null): DeviceHandle | undefined {
  if (address) return devices.find(device => device.address.toLowerCase() === address);
  return devices[0];
}

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, filePath: config.appLogPath });
  log.info(`🚀 Glove host starting (transport: ${config.transport}, log: ${getLogFilePath() ?? 'console only'})`);

  const session = await createGloveSession(config.transport, {
    filter: { deviceNamePatterns: config.deviceNamePatterns, minRssi: config.minRssi },
    mock: { streamTelemetry: true },
    session: {
      scanTimeoutMs: config.scanTimeoutMs,
      connectTimeoutMs: config.connectTimeoutMs,
      channelCapacity: config.channelCapacity,
      reconnect: config.reconnect,
    },
  });
  const controller = new GloveController({ config, session });

  let feed: DisplayFeed | null = null;
  let bridge: WebSocketBridge | null = null;
  if (config.display.enabled) {
    feed = new DisplayFeed({ status: () => controller.getDisplayStatus() });
    bridge = new WebSocketBridge({ host: config.display.host, port: config.display.port });
    await bridge.start();
    bridge.attachFeed(feed);
    feed.start(controller.router);
  }

  controller.on('connectionLost', (error: unknown) => {
    log.error(`❌ ${describeError(error)}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);

    feed?.stop();
    await bridge?.stop();
    await controller.dispose();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(`Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
    });
  }

  const devices = await controller.scan();
  const device = pickDevice(devices, config.deviceAddress);
  if (!device) {
    log.warn(`No glove found (${devices.length} candidate(s) seen)`);
    await shutdown('no device');
    return;
  }

  await controller.connect(device);
  await controller.startStreaming();
  log.info('📡 Streaming; Ctrl+C to stop');
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${describeError(error)}`);
  process.exit(1);
});
