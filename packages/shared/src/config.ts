import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { DEFAULT_TOPOLOGY } from './factory-config.js';
import type { FactoryTopology } from './types.js';
import { BLOCK_COLORS, CONTROLLER_ROLES, QUANTITY_KINDS } from './wire.js';

// ---- Topology schema ----

const probability = z.number().min(0).max(1);
const positive = z.number().positive();

const signalTuningSchema = z
  .object({
    processPeriodS: positive,
    pumpCycleS: positive,
    pressureDropProbability: probability,
    pressureDropFraction: probability,
    vibrationBaseline: positive,
    rotationPeriodS: positive,
    spikeProbability: probability,
    spikeMin: positive,
    spikeMax: positive,
    baseDefectRate: probability,
    qualityCycleS: positive,
    inspectedPerTick: z.number().int().positive(),
    driftPerHour: z.number().min(0),
    calibrationIntervalDays: positive,
    rapidChangePerSecond: positive,
  })
  .partial();

const sensorProfileSchema = z.object({
  sensorId: z.string().min(1),
  kind: z.enum(QUANTITY_KINDS),
  unit: z.string(),
  range: z.tuple([z.number(), z.number()]),
  accuracy: positive,
  updatePeriodMs: positive,
  controllerId: z.string().min(1),
  manufacturer: z.string(),
  model: z.string(),
  lastCalibratedAt: z.string().datetime().optional(),
  tuning: signalTuningSchema.optional(),
});

const controllerSchema = z.object({
  controllerId: z.string().min(1),
  name: z.string(),
  role: z.enum(CONTROLLER_ROLES),
  downstream: z.array(z.string()),
  telemetryPeriodMs: positive,
  heartbeatPeriodMs: positive,
  thresholds: z.object({
    hotTemperature: z.number(),
    highPressure: z.number(),
    vibrationAlarm: z.number(),
  }),
  processParameters: z.record(z.number()),
});

const colorWeightsSchema = z.object({
  red: z.number().min(0),
  blue: z.number().min(0),
  green: z.number().min(0),
  yellow: z.number().min(0),
  unknown: z.number().min(0),
});

const sortingSchema = z.object({
  controllerId: z.string().min(1),
  colorWeights: colorWeightsSchema,
  minDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  errorBackoffMs: z.number().min(0),
  summaryEvery: z.number().int().positive(),
});

export const topologySchema = z.object({
  supervisorId: z.string().min(1),
  controllers: z.array(controllerSchema).min(1),
  sensors: z.array(sensorProfileSchema),
  sorting: sortingSchema.nullable(),
});

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

/**
 * Checks the schema cannot express: unique ids, ranges, references
 * between sensors, controllers and the sorting cell.
 */
function semanticIssues(topology: FactoryTopology): string[] {
  const issues: string[] = [];
  const controllerIds = new Set(topology.controllers.map((c) => c.controllerId));

  for (const id of findDuplicates(topology.controllers.map((c) => c.controllerId))) {
    issues.push(`duplicate controller id "${id}"`);
  }
  for (const id of findDuplicates(topology.sensors.map((s) => s.sensorId))) {
    issues.push(`duplicate sensor id "${id}"`);
  }
  if (controllerIds.has(topology.supervisorId)) {
    issues.push(`supervisor id "${topology.supervisorId}" collides with a controller id`);
  }

  for (const sensor of topology.sensors) {
    const [min, max] = sensor.range;
    if (min >= max) issues.push(`sensor "${sensor.sensorId}": range min (${min}) must be below max (${max})`);
    if (!controllerIds.has(sensor.controllerId)) {
      issues.push(`sensor "${sensor.sensorId}": unknown parent controller "${sensor.controllerId}"`);
    }
    const tuning = sensor.tuning;
    if (tuning?.spikeMin !== undefined && tuning.spikeMax !== undefined && tuning.spikeMin > tuning.spikeMax) {
      issues.push(`sensor "${sensor.sensorId}": spikeMin must not exceed spikeMax`);
    }
  }

  for (const controller of topology.controllers) {
    for (const peer of controller.downstream) {
      if (peer === controller.controllerId) {
        issues.push(`controller "${controller.controllerId}": cannot be its own downstream peer`);
      } else if (!controllerIds.has(peer)) {
        issues.push(`controller "${controller.controllerId}": unknown downstream peer "${peer}"`);
      }
    }
  }

  const sorting = topology.sorting;
  if (sorting) {
    if (!controllerIds.has(sorting.controllerId)) {
      issues.push(`sorting: unknown controller "${sorting.controllerId}"`);
    }
    if (sorting.minDelayMs > sorting.maxDelayMs) {
      issues.push('sorting: minDelayMs must not exceed maxDelayMs');
    }
    const weightSum = BLOCK_COLORS.reduce((sum, color) => sum + sorting.colorWeights[color], 0);
    if (weightSum <= 0) issues.push('sorting: color weights must sum to a positive value');
  }

  return issues;
}

/** Validate a topology; throws ConfigurationError listing every issue */
export function validateTopology(input: unknown): FactoryTopology {
  const parsed = topologySchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error));
  }
  const topology: FactoryTopology = parsed.data;
  const issues = semanticIssues(topology);
  if (issues.length > 0) throw new ConfigurationError(issues);
  return topology;
}

// ---- Runtime configuration ----

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configFileSchema = z.object({
  simulation: z
    .object({
      seed: z.number().int().optional(),
      tickResolutionMs: positive.optional(),
    })
    .optional(),
  supervisor: z
    .object({
      degradedHealthThreshold: z.number().min(0).max(100).optional(),
      reducedSpeedFactor: z.number().positive().optional(),
      overviewIntervalMs: positive.optional(),
    })
    .optional(),
  topology: z.unknown().optional(),
});

const envSchema = z.object({
  MQTT_URL: z.string().url().optional(),
  MQTT_PORT: z.coerce.number().int().positive().optional(),
  EMBEDDED_BROKER: booleanFromEnv.optional(),
  LOG_LEVEL: logLevelSchema.optional(),
  LOG_PRETTY: booleanFromEnv.optional(),
  SIM_SEED: z.coerce.number().int().optional(),
  FACTORY_CONFIG: z.string().min(1).optional(),
  NODE_ENV: z.string().optional(),
});

export interface AppConfig {
  mqttUrl: string;
  logLevel: z.infer<typeof logLevelSchema>;
  logPretty: boolean;
  simulation: {
    seed: number;
    /** How often controller nodes check whether telemetry or heartbeats are due */
    tickResolutionMs: number;
  };
  supervisor: {
    embeddedBroker: boolean;
    mqttPort: number;
    degradedHealthThreshold: number;
    reducedSpeedFactor: number;
    overviewIntervalMs: number;
  };
  topology: FactoryTopology;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  mqttUrl: 'mqtt://localhost:1883',
  logLevel: 'info',
  logPretty: true,
  simulation: { seed: 42, tickResolutionMs: 1000 },
  supervisor: {
    embeddedBroker: true,
    mqttPort: 1883,
    degradedHealthThreshold: 70,
    reducedSpeedFactor: 0.8,
    overviewIntervalMs: 30000,
  },
  topology: DEFAULT_TOPOLOGY,
};

async function readConfigFile(path: string): Promise<z.infer<typeof configFileSchema>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError([`cannot read config file ${path}: ${errorMessage(err)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError([`config file ${path} is not valid JSON: ${errorMessage(err)}`]);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) throw new ConfigurationError(formatZodIssues(parsed.error));
  return parsed.data;
}

/**
 * Load configuration. Priority (highest wins):
 * 1. Environment variables
 * 2. Config file named by FACTORY_CONFIG
 * 3. Defaults
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const envParsed = envSchema.safeParse(env);
  if (!envParsed.success) throw new ConfigurationError(formatZodIssues(envParsed.error));
  const e = envParsed.data;

  const file: z.infer<typeof configFileSchema> = e.FACTORY_CONFIG ? await readConfigFile(e.FACTORY_CONFIG) : {};
  const d = DEFAULT_APP_CONFIG;

  const topology = validateTopology(file.topology ?? d.topology);

  return {
    mqttUrl: e.MQTT_URL ?? d.mqttUrl,
    logLevel: e.LOG_LEVEL ?? d.logLevel,
    logPretty: e.LOG_PRETTY ?? e.NODE_ENV !== 'production',
    simulation: {
      seed: e.SIM_SEED ?? file.simulation?.seed ?? d.simulation.seed,
      tickResolutionMs: file.simulation?.tickResolutionMs ?? d.simulation.tickResolutionMs,
    },
    supervisor: {
      embeddedBroker: e.EMBEDDED_BROKER ?? d.supervisor.embeddedBroker,
      mqttPort: e.MQTT_PORT ?? d.supervisor.mqttPort,
      degradedHealthThreshold: file.supervisor?.degradedHealthThreshold ?? d.supervisor.degradedHealthThreshold,
      reducedSpeedFactor: file.supervisor?.reducedSpeedFactor ?? d.supervisor.reducedSpeedFactor,
      overviewIntervalMs: file.supervisor?.overviewIntervalMs ?? d.supervisor.overviewIntervalMs,
    },
    topology,
  };
}
