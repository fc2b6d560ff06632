import type {
  ControllerConfig,
  ControllerRole,
  FactoryTopology,
  HealthThresholds,
  QuantityKind,
  SensorProfile,
  SignalTuning,
  SortingConfig,
} from './types.js';

// ---- Signal defaults ----

export const DEFAULT_SIGNAL_TUNING: SignalTuning = {
  processPeriodS: 300,
  pumpCycleS: 120,
  pressureDropProbability: 0.1,
  pressureDropFraction: 0.1,
  vibrationBaseline: 1.0,
  rotationPeriodS: 60,
  spikeProbability: 0.02,
  spikeMin: 2,
  spikeMax: 5,
  baseDefectRate: 0.02,
  qualityCycleS: 3600,
  inspectedPerTick: 100,
  driftPerHour: 0.0005,
  calibrationIntervalDays: 180,
  rapidChangePerSecond: 1.0,
};

export function resolveTuning(profile: SensorProfile): SignalTuning {
  return { ...DEFAULT_SIGNAL_TUNING, ...profile.tuning };
}

// ---- Controller defaults ----

export const DEFAULT_THRESHOLDS: HealthThresholds = {
  hotTemperature: 40,
  highPressure: 8,
  vibrationAlarm: 2.5,
};

export const DEFAULT_HEARTBEAT_PERIOD_MS = 5000;

/** Setpoints each role starts with; Commands may only touch these keys */
const ROLE_PARAMETERS: Record<ControllerRole, Record<string, number>> = {
  paper_feed: { feedRate: 60, speedFactor: 1, jamProbability: 0.01, jamClearProbability: 0.2, upstreamBlocked: 0 },
  print: { printSpeed: 40, speedFactor: 1, inkLevel: 100, inkPerPage: 0.05, inkLowLevel: 10, upstreamBlocked: 0 },
  sorting: { speedFactor: 1, upstreamBlocked: 0 },
  transport: { beltSpeed: 0.5, speedFactor: 1, upstreamBlocked: 0 },
};

export function defaultParametersFor(role: ControllerRole): Record<string, number> {
  return { ...ROLE_PARAMETERS[role] };
}

// ---- Default factory line ----
// paper feed → print → color sort → transport, one PLC per stage

interface StageDef {
  controllerId: string;
  name: string;
  role: ControllerRole;
  telemetryPeriodMs: number;
  thresholds?: Partial<HealthThresholds>;
  sensors: Array<{
    suffix: string;
    kind: QuantityKind;
    range: [number, number];
    accuracy: number;
    periodMs: number;
    lastCalibratedAt?: string;
  }>;
}

const UNITS: Record<QuantityKind, string> = {
  temperature: '°C',
  pressure: 'bar',
  vibration: 'mm/s',
  flow: 'L/min',
  vision_defect_count: 'count',
};

const MODELS: Record<QuantityKind, [string, string]> = {
  temperature: ['Sensirion', 'STS40'],
  pressure: ['Keller', 'PA-21Y'],
  vibration: ['SKF', 'CMSS 2200'],
  flow: ['Endress+Hauser', 'Promag 10'],
  vision_defect_count: ['Cognex', 'In-Sight 2800'],
};

const STAGES: StageDef[] = [
  {
    controllerId: 'plc-feed', name: 'Paper Feed', role: 'paper_feed', telemetryPeriodMs: 5000,
    sensors: [
      { suffix: 'temp-01', kind: 'temperature', range: [15, 35], accuracy: 0.2, periodMs: 2000 },
      { suffix: 'vib-01', kind: 'vibration', range: [0, 10], accuracy: 0.05, periodMs: 1000 },
    ],
  },
  {
    controllerId: 'plc-print', name: 'Print', role: 'print', telemetryPeriodMs: 6000,
    thresholds: { hotTemperature: 75 },
    sensors: [
      { suffix: 'temp-01', kind: 'temperature', range: [60, 80], accuracy: 0.3, periodMs: 2000 },
      { suffix: 'pres-01', kind: 'pressure', range: [0, 10], accuracy: 0.05, periodMs: 2000, lastCalibratedAt: '2025-01-15T00:00:00.000Z' },
      { suffix: 'vis-01', kind: 'vision_defect_count', range: [0, 50], accuracy: 1, periodMs: 3000 },
    ],
  },
  {
    controllerId: 'plc-sort', name: 'Color Sort', role: 'sorting', telemetryPeriodMs: 7000,
    sensors: [
      { suffix: 'vib-01', kind: 'vibration', range: [0, 10], accuracy: 0.05, periodMs: 1000 },
      { suffix: 'pres-01', kind: 'pressure', range: [0, 8], accuracy: 0.05, periodMs: 2000 },
    ],
  },
  {
    controllerId: 'plc-transport', name: 'Transport', role: 'transport', telemetryPeriodMs: 8000,
    sensors: [
      { suffix: 'temp-01', kind: 'temperature', range: [15, 45], accuracy: 0.2, periodMs: 2000 },
      { suffix: 'vib-01', kind: 'vibration', range: [0, 10], accuracy: 0.05, periodMs: 1000 },
      { suffix: 'flow-01', kind: 'flow', range: [0, 40], accuracy: 0.2, periodMs: 2000 },
    ],
  },
];

function buildControllers(): ControllerConfig[] {
  return STAGES.map((stage, i) => ({
    controllerId: stage.controllerId,
    name: stage.name,
    role: stage.role,
    downstream: i < STAGES.length - 1 ? [STAGES[i + 1].controllerId] : [],
    telemetryPeriodMs: stage.telemetryPeriodMs,
    heartbeatPeriodMs: DEFAULT_HEARTBEAT_PERIOD_MS,
    thresholds: { ...DEFAULT_THRESHOLDS, ...stage.thresholds },
    processParameters: defaultParametersFor(stage.role),
  }));
}

function buildSensors(): SensorProfile[] {
  return STAGES.flatMap((stage) =>
    stage.sensors.map((s) => {
      const [manufacturer, model] = MODELS[s.kind];
      return {
        sensorId: `${stage.controllerId.replace('plc-', '')}-${s.suffix}`,
        kind: s.kind,
        unit: UNITS[s.kind],
        range: s.range,
        accuracy: s.accuracy,
        updatePeriodMs: s.periodMs,
        controllerId: stage.controllerId,
        manufacturer,
        model,
        ...(s.lastCalibratedAt !== undefined ? { lastCalibratedAt: s.lastCalibratedAt } : {}),
      };
    }),
  );
}

export const DEFAULT_SORTING: SortingConfig = {
  controllerId: 'plc-sort',
  colorWeights: { red: 0.25, blue: 0.25, green: 0.25, yellow: 0.2, unknown: 0.05 },
  minDelayMs: 3000,
  maxDelayMs: 5000,
  errorBackoffMs: 1000,
  summaryEvery: 10,
};

export const DEFAULT_TOPOLOGY: FactoryTopology = {
  supervisorId: 'supervisor',
  controllers: buildControllers(),
  sensors: buildSensors(),
  sorting: DEFAULT_SORTING,
};

/** Sensors whose parent is the given controller */
export function getChildSensors(topology: FactoryTopology, controllerId: string): SensorProfile[] {
  return topology.sensors.filter((s) => s.controllerId === controllerId);
}
