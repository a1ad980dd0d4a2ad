#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Bridge } from './bridge';
import { loadConfig } from './config';
import { DeviceLink } from './device-link';
import { ConfigError } from './errors';
import { MQTTTransport } from './mqtt-transport';
import { NOT_AVAILABLE, availabilityTopic } from './topics';
import { BridgeConfig } from './types';

dotenv.config();

async function main() {
  console.log('[Main] Starting Zense MQTT bridge...');

  let config: BridgeConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Config] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const { gateway, mqtt } = config;
  console.log(
    `[Main] Gateway ${gateway.host}:${gateway.port}, MQTT ${mqtt.brokerUrl} (user=${mqtt.username ? 'yes' : 'no'})`
  );
  if (config.devices.length === 0) {
    console.log('[Main] No DEVICES configured, lights will be read from the gateway after login');
  } else {
    console.log(`[Main] Loaded ${config.devices.length} device(s)`);
  }

  const transport = new MQTTTransport(mqtt, {
    topic: availabilityTopic(config.topics),
    payload: NOT_AVAILABLE,
  });
  const link = new DeviceLink(gateway);
  const bridge = new Bridge(config, transport, link);

  const shutdown = () => {
    console.log('[Main] Shutting down...');
    bridge
      .stop()
      .catch((error) => {
        console.error('[Main] Error during shutdown:', error);
      })
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  bridge.start();
  console.log('[Main] Bridge running');
}

main().catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
