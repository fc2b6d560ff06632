import mqtt from 'mqtt';
import { ConfigurationError, createLogger, errorMessage, loadConfig } from '@factory-sim/shared';
import { FactorySimulator } from './factory-simulator.js';
import { MqttTelemetryChannel } from './mqtt-channel.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger({ name: 'simulator', level: config.logLevel, pretty: config.logPretty });

  logger.info({ url: config.mqttUrl }, 'Connecting to MQTT broker...');
  const client = mqtt.connect(config.mqttUrl, { reconnectPeriod: 3000 });
  const channel = new MqttTelemetryChannel(client, logger);
  const simulator = new FactorySimulator(
    channel,
    { topology: config.topology, seed: config.simulation.seed, tickResolutionMs: config.simulation.tickResolutionMs },
    logger,
  );

  // fires again after every reconnect; start() is idempotent
  client.on('connect', () => {
    logger.info('Connected to MQTT broker');
    simulator.start();
  });

  client.on('error', (err) => {
    logger.warn({ err: err.message }, 'MQTT connection error, retrying in 3s (is the broker running?)');
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    simulator
      .stop()
      .then(() => client.endAsync())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    createLogger({ name: 'simulator' }).fatal({ issues: err.issues }, 'Invalid configuration');
  } else {
    createLogger({ name: 'simulator' }).fatal({ err: errorMessage(err) }, 'Simulator failed to start');
  }
  process.exit(1);
});
