import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { loadConfig, validateTopology } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_TOPOLOGY } from '../factory-config.js';
import type { FactoryTopology } from '../types.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
}

function withChanges(change: (t: FactoryTopology) => void): FactoryTopology {
  const topology: FactoryTopology = structuredClone(DEFAULT_TOPOLOGY);
  change(topology);
  return topology;
}

describe('validateTopology', () => {
  it('accepts the default factory line', () => {
    expect(validateTopology(DEFAULT_TOPOLOGY)).toEqual(DEFAULT_TOPOLOGY);
  });

  it('reports duplicate sensor ids', () => {
    const topology = withChanges((t) => {
      t.sensors.push({ ...t.sensors[0] });
    });
    expect(issuesOf(() => validateTopology(topology))).toEqual(['duplicate sensor id "feed-temp-01"']);
  });

  it('reports an empty range', () => {
    const topology = withChanges((t) => {
      t.sensors[0].range = [35, 15];
    });
    expect(issuesOf(() => validateTopology(topology))).toEqual([
      'sensor "feed-temp-01": range min (35) must be below max (15)',
    ]);
  });

  it('reports references to unknown controllers', () => {
    const topology = withChanges((t) => {
      t.sensors[0].controllerId = 'plc-ghost';
      t.controllers[0].downstream = ['plc-ghost'];
    });
    expect(issuesOf(() => validateTopology(topology))).toEqual([
      'sensor "feed-temp-01": unknown parent controller "plc-ghost"',
      'controller "plc-feed": unknown downstream peer "plc-ghost"',
    ]);
  });

  it('rejects a controller that is its own peer', () => {
    const topology = withChanges((t) => {
      t.controllers[0].downstream = ['plc-feed'];
    });
    expect(issuesOf(() => validateTopology(topology))).toEqual([
      'controller "plc-feed": cannot be its own downstream peer',
    ]);
  });

  it('accepts a controller with several downstream peers', () => {
    const topology = withChanges((t) => {
      t.controllers[0].downstream = ['plc-print', 'plc-sort'];
    });
    expect(validateTopology(topology).controllers[0].downstream).toEqual(['plc-print', 'plc-sort']);
  });

  it('checks the sorting cell settings', () => {
    const topology = withChanges((t) => {
      if (!t.sorting) return;
      t.sorting.minDelayMs = 6000;
      t.sorting.colorWeights = { red: 0, blue: 0, green: 0, yellow: 0, unknown: 0 };
    });
    expect(issuesOf(() => validateTopology(topology))).toEqual([
      'sorting: minDelayMs must not exceed maxDelayMs',
      'sorting: color weights must sum to a positive value',
    ]);
  });

  it('reports schema violations with their path', () => {
    const topology = { ...DEFAULT_TOPOLOGY, controllers: [] };
    expect(issuesOf(() => validateTopology(topology))).toEqual([
      'controllers: Array must contain at least 1 element(s)',
    ]);
  });
});

describe('loadConfig', () => {
  it('falls back to defaults', async () => {
    const config = await loadConfig({});
    expect(config.mqttUrl).toBe('mqtt://localhost:1883');
    expect(config.logLevel).toBe('info');
    expect(config.logPretty).toBe(true);
    expect(config.simulation).toEqual({ seed: 42, tickResolutionMs: 1000 });
    expect(config.supervisor).toEqual({
      embeddedBroker: true,
      mqttPort: 1883,
      degradedHealthThreshold: 70,
      reducedSpeedFactor: 0.8,
      overviewIntervalMs: 30000,
    });
    expect(config.topology).toEqual(DEFAULT_TOPOLOGY);
  });

  it('reads environment variables', async () => {
    const config = await loadConfig({
      MQTT_URL: 'mqtt://broker.test:1884',
      SIM_SEED: '7',
      EMBEDDED_BROKER: 'false',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
    });
    expect(config.mqttUrl).toBe('mqtt://broker.test:1884');
    expect(config.simulation.seed).toBe(7);
    expect(config.supervisor.embeddedBroker).toBe(false);
    expect(config.logLevel).toBe('debug');
    expect(config.logPretty).toBe(false);
  });

  it('layers the config file under the environment', async () => {
    const fromFile = await loadConfig({ FACTORY_CONFIG: fixture('factory.json') });
    expect(fromFile.simulation).toEqual({ seed: 99, tickResolutionMs: 500 });
    expect(fromFile.supervisor.degradedHealthThreshold).toBe(60);
    expect(fromFile.supervisor.reducedSpeedFactor).toBe(0.8);

    const overridden = await loadConfig({ FACTORY_CONFIG: fixture('factory.json'), SIM_SEED: '5' });
    expect(overridden.simulation.seed).toBe(5);
  });

  it('rejects an invalid environment', async () => {
    await expect(loadConfig({ LOG_LEVEL: 'loud' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects an invalid config file', async () => {
    await expect(loadConfig({ FACTORY_CONFIG: fixture('invalid.json') })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a missing config file', async () => {
    await expect(loadConfig({ FACTORY_CONFIG: fixture('missing.json') })).rejects.toThrow('cannot read config file');
  });
});
