import type {
  Alert,
  ControllerRole,
  ControllerTelemetry,
  ConnectionStatus,
  Reading,
  SortingStats,
  SortingSummary,
} from '@factory-sim/shared';

export const ALERT_HISTORY_SIZE = 100;

export interface ControllerOverview {
  controllerId: string;
  role: ControllerRole;
  health: number;
  connection: ConnectionStatus;
  activeAlerts: number;
  lastSeen: string;
}

export interface FactoryOverview {
  controllers: ControllerOverview[];
  sensorsReporting: number;
  alertsRecorded: number;
  criticalAlerts: number;
  sortedBlocks: number;
  sortingEfficiency: number | null;
}

/** Latest known view of the factory, as seen from the supervisory node */
export class SupervisoryState {
  controllers = new Map<string, ControllerTelemetry>();
  /** sensorId → latest reading */
  readings = new Map<string, Reading>();
  /** Most recent alerts, oldest first (ring buffer, max ALERT_HISTORY_SIZE) */
  alerts: Alert[] = [];
  /** controllerId → latest incremental stats of its sorting cell */
  sortingStats = new Map<string, SortingStats>();
  lastSummary: SortingSummary | null = null;
  private alertTotal = 0;

  handleTelemetry(telemetry: ControllerTelemetry): void {
    this.controllers.set(telemetry.controllerId, telemetry);
  }

  handleReading(reading: Reading): void {
    this.readings.set(reading.sensorId, reading);
  }

  handleAlert(alert: Alert): void {
    this.alertTotal++;
    this.alerts.push(alert);
    if (this.alerts.length > ALERT_HISTORY_SIZE) {
      this.alerts.splice(0, this.alerts.length - ALERT_HISTORY_SIZE);
    }
  }

  handleSortingStats(controllerId: string, stats: SortingStats): void {
    this.sortingStats.set(controllerId, stats);
  }

  handleSortingSummary(summary: SortingSummary): void {
    this.lastSummary = summary;
  }

  /** Alerts ever received, including those evicted from the history */
  get alertsRecorded(): number {
    return this.alertTotal;
  }

  overview(): FactoryOverview {
    const controllers = [...this.controllers.values()]
      .map((t) => ({
        controllerId: t.controllerId,
        role: t.role,
        health: t.metrics.health,
        connection: t.connection,
        activeAlerts: t.metrics.activeAlerts,
        lastSeen: t.timestamp,
      }))
      .sort((a, b) => a.controllerId.localeCompare(b.controllerId));

    return {
      controllers,
      sensorsReporting: this.readings.size,
      alertsRecorded: this.alertTotal,
      criticalAlerts: this.alerts.filter((a) => a.severity === 'critical').length,
      sortedBlocks: [...this.sortingStats.values()].reduce((sum, s) => sum + s.totalProcessed, 0),
      sortingEfficiency: this.lastSummary?.efficiency ?? null,
    };
  }
}
