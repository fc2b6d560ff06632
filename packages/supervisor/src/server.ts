import { createBroker } from 'aedes';
import { createServer } from 'net';
import type { Server } from 'net';
import mqtt from 'mqtt';
import {
  ConfigurationError,
  TransientChannelError,
  createLogger,
  errorMessage,
  loadConfig,
  patterns,
} from '@factory-sim/shared';
import type { Logger } from '@factory-sim/shared';
import { MqttTelemetryChannel } from '@factory-sim/simulator/mqtt-channel';
import { processMessage } from './mqtt-handler.js';
import type { SupervisoryEvent } from './mqtt-handler.js';
import { SupervisoryPolicy } from './supervisory-policy.js';
import { SupervisoryState } from './supervisory-state.js';

interface EmbeddedBroker {
  aedes: ReturnType<typeof createBroker>;
  server: Server;
}

/** Local MQTT broker so the factory runs without external infrastructure */
function startEmbeddedBroker(port: number, logger: Logger): Promise<EmbeddedBroker> {
  const aedes = createBroker();
  const server = createServer(aedes.handle);

  return new Promise((resolve, reject) => {
    server.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new ConfigurationError([`port ${port} is already in use, set MQTT_PORT or EMBEDDED_BROKER=false`]));
      } else {
        reject(err);
      }
    });
    server.listen(port, () => {
      logger.info({ port }, 'Embedded MQTT broker running');
      resolve({ aedes, server });
    });
  });
}

function closeBroker({ aedes, server }: EmbeddedBroker): Promise<void> {
  return new Promise((resolve) => {
    aedes.close(() => {
      server.close(() => resolve());
    });
  });
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger({ name: 'supervisor', level: config.logLevel, pretty: config.logPretty });
  const { supervisor, topology } = config;

  // 1. Broker
  const broker = supervisor.embeddedBroker ? await startEmbeddedBroker(supervisor.mqttPort, logger) : null;
  const url = broker ? `mqtt://localhost:${supervisor.mqttPort}` : config.mqttUrl;

  // 2. Supervisory state and policy
  const state = new SupervisoryState();
  const client = mqtt.connect(url, { reconnectPeriod: 3000 });
  const channel = new MqttTelemetryChannel(client, logger);
  const policy = new SupervisoryPolicy(topology.supervisorId, supervisor, channel, logger);

  const onEvent = (event: SupervisoryEvent) => {
    switch (event.type) {
      case 'controller_telemetry':
        try {
          policy.onTelemetry(event.data);
        } catch (err) {
          if (!(err instanceof TransientChannelError)) throw err;
          logger.warn({ controllerId: event.data.controllerId, err: err.message }, 'Command not sent, retrying on next telemetry');
        }
        break;
      case 'alert':
        if (event.data.severity === 'critical') {
          logger.warn({ sensorId: event.data.sensorId, kind: event.data.kind }, event.data.message);
        }
        break;
      case 'peer_message':
        if (event.data.kind === 'response' && event.data.destination === topology.supervisorId) {
          logger.info({ controllerId: event.data.source, status: event.data.payload['status'] }, 'Command acknowledged');
        }
        break;
      case 'sorting_summary':
        logger.info({ total: event.data.total, efficiency: event.data.efficiency, percentages: event.data.percentages }, 'Sorting summary');
        break;
      default:
        break;
    }
  };

  // 3. Subscribe to every factory topic
  client.on('connect', () => logger.info({ url }, 'Supervisor MQTT client connected'));
  client.on('error', (err) => logger.warn({ err: err.message }, 'MQTT connection error'));
  const unsubscribe = channel.subscribe(patterns.everything, (topic, payload) => {
    const event = processMessage(topic, payload, state, logger);
    if (event) onEvent(event);
  });

  // 4. Periodic overview
  const overviewTimer = setInterval(() => {
    logger.info(state.overview(), 'Factory overview');
  }, supervisor.overviewIntervalMs);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    clearInterval(overviewTimer);
    unsubscribe();
    client
      .endAsync()
      .then(() => (broker ? closeBroker(broker) : undefined))
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
  const logger = createLogger({ name: 'supervisor' });
  if (err instanceof ConfigurationError) {
    logger.fatal({ issues: err.issues }, 'Invalid configuration');
  } else {
    logger.fatal({ err: errorMessage(err) }, 'Supervisor failed to start');
  }
  process.exit(1);
});
