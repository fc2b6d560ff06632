// ---- Sensors ----

export type QuantityKind = 'temperature' | 'pressure' | 'vibration' | 'flow' | 'vision_defect_count';

export interface SignalTuning {
  /** Short process sinusoid period for temperature sensors (s) */
  processPeriodS: number;
  /** Pump cycle period for pressure and flow sensors (s) */
  pumpCycleS: number;
  pressureDropProbability: number;
  /** Fraction of the value lost during a transient pressure drop */
  pressureDropFraction: number;
  /** Nominal vibration level, in the sensor's unit */
  vibrationBaseline: number;
  rotationPeriodS: number;
  spikeProbability: number;
  spikeMin: number;
  spikeMax: number;
  baseDefectRate: number;
  qualityCycleS: number;
  /** Items inspected by a vision sensor per tick */
  inspectedPerTick: number;
  /** Drift per operating hour, as a fraction of the range */
  driftPerHour: number;
  calibrationIntervalDays: number;
  /** Temperature change rate (units/s) above which a rapid change alert fires */
  rapidChangePerSecond: number;
}

export interface SensorProfile {
  sensorId: string;
  kind: QuantityKind;
  unit: string;
  /** Valid range [min, max] */
  range: [number, number];
  /** Noise standard deviation in the sensor's unit */
  accuracy: number;
  updatePeriodMs: number;
  /** Parent controller */
  controllerId: string;
  manufacturer: string;
  model: string;
  /** ISO timestamp of the last calibration; defaults to simulation start */
  lastCalibratedAt?: string;
  tuning?: Partial<SignalTuning>;
}

export interface SensorState {
  baseValue: number;
  driftAccumulator: number;
  operatingHours: number;
  /** Epoch ms */
  lastCalibrationAt: number;
  previousValue: number | null;
  /** Epoch ms of the previous tick */
  lastTickAt: number | null;
  /** Fixed at creation, uniform in [0.8, 1.2] */
  wearFactor: number;
}

export type AlertKind =
  | 'range_warning'
  | 'range_critical'
  | 'calibration_due'
  | 'rapid_change'
  | 'mechanical_anomaly';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface Alert {
  readonly kind: AlertKind;
  readonly message: string;
  readonly severity: AlertSeverity;
  readonly sensorId: string;
  readonly timestamp: string;
}

export interface ReadingDerived {
  /** Vision detection confidence 0..1 */
  confidence?: number;
  imageQuality?: number;
}

export interface Reading {
  readonly sensorId: string;
  readonly kind: QuantityKind;
  readonly value: number;
  readonly unit: string;
  readonly timestamp: string;
  readonly derived: ReadingDerived;
  readonly alerts: readonly Alert[];
}

// ---- Controllers ----

export type ControllerRole = 'paper_feed' | 'print' | 'sorting' | 'transport';
export type ConnectionStatus = 'isolated' | 'connected';

export interface HealthThresholds {
  /** Average temperature above which health is penalised */
  hotTemperature: number;
  /** Max pressure above which health is penalised */
  highPressure: number;
  /** Any vibration reading above this raises the vibration alarm */
  vibrationAlarm: number;
}

export interface ControllerConfig {
  controllerId: string;
  name: string;
  role: ControllerRole;
  /** Controllers this one sends heartbeats and process events to */
  downstream: string[];
  telemetryPeriodMs: number;
  heartbeatPeriodMs: number;
  thresholds: HealthThresholds;
  /** Initial setpoints; Commands may only change keys listed here */
  processParameters: Record<string, number>;
}

export interface AggregatedMetrics {
  avgTemperature: number | null;
  maxPressure: number | null;
  vibrationAlarm: boolean;
  /** Number of alerts carried by the latest reading of each child */
  activeAlerts: number;
  /** 0..100 */
  health: number;
}

export interface PeerCounters {
  helloSent: number;
  helloReceived: number;
  acksReceived: number;
  commandsProcessed: number;
  processEventsReceived: number;
}

export interface ControllerState {
  readings: Map<string, Reading>;
  metrics: AggregatedMetrics;
  peerCounters: PeerCounters;
  connection: ConnectionStatus;
  processParameters: Record<string, number>;
  processMetrics: Record<string, number>;
}

/** Aggregate record a controller publishes on its own topic */
export interface ControllerTelemetry {
  controllerId: string;
  role: ControllerRole;
  timestamp: string;
  metrics: AggregatedMetrics;
  connection: ConnectionStatus;
  peerCounters: PeerCounters;
  knownSensors: number;
  processParameters: Record<string, number>;
  processMetrics: Record<string, number>;
}

// ---- Peer link ----

export type PeerMessageKind = 'heartbeat' | 'ack' | 'process_event' | 'command' | 'response';

export interface PeerMessage {
  readonly source: string;
  readonly destination: string;
  readonly kind: PeerMessageKind;
  readonly seq: number;
  readonly payload: Readonly<Record<string, string>>;
  readonly timestamp: string;
}

// ---- Sorting process ----

export type BlockColor = 'red' | 'blue' | 'green' | 'yellow' | 'unknown';
export type KnownColor = Exclude<BlockColor, 'unknown'>;
export type SizeClass = 'small' | 'medium' | 'large';
export type SortingPhase = 'idle' | 'generating' | 'detecting' | 'sorting' | 'reporting' | 'stopped';

export interface Block {
  readonly blockId: number;
  readonly color: BlockColor;
  readonly confidence: number;
  readonly sizeClass: SizeClass;
  /** Epoch ms */
  readonly createdAt: number;
}

export interface SortingStats {
  counts: Record<KnownColor, number>;
  unknown: number;
  totalProcessed: number;
  efficiency: number;
  throughputPerHour: number;
  /** Epoch ms */
  startedAt: number;
}

export interface SortingConfig {
  /** Controller owning the sorting cell */
  controllerId: string;
  colorWeights: Record<BlockColor, number>;
  minDelayMs: number;
  maxDelayMs: number;
  errorBackoffMs: number;
  /** Publish a summary to the supervisor every N processed blocks */
  summaryEvery: number;
}

export interface CameraRecord {
  blockId: number;
  color: BlockColor;
  confidence: number;
  imageQuality: number;
  sizeClass: SizeClass;
  timestamp: string;
}

export interface ActuationCommand {
  blockId: number;
  color: BlockColor;
  /** Target bin angle in degrees */
  position: number;
  timestamp: string;
}

export interface SortingSummary {
  total: number;
  /** Percentage of total per color, including unknown */
  percentages: Record<BlockColor, number>;
  efficiency: number;
  throughputPerHour: number;
  timestamp: string;
}

// ---- Topology ----

export interface FactoryTopology {
  supervisorId: string;
  controllers: ControllerConfig[];
  sensors: SensorProfile[];
  sorting: SortingConfig | null;
}
