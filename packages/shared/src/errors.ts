/**
 * Error taxonomy shared by the simulator and the supervisor
 */

/**
 * Base class for all simulator errors
 */
export class FactorySimError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FactorySimError';
  }
}

/**
 * Invalid topology or runtime configuration. Fatal at startup.
 */
export class ConfigurationError extends FactorySimError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Malformed payload received from the channel. The message is dropped.
 */
export class DecodeError extends FactorySimError {
  readonly payload: string;

  constructor(message: string, payload: string) {
    super(message);
    this.name = 'DecodeError';
    this.payload = payload;
  }
}

/**
 * Channel transport unavailable. Retried on the next scheduled tick.
 */
export class TransientChannelError extends FactorySimError {
  constructor(message: string) {
    super(message);
    this.name = 'TransientChannelError';
  }
}

/**
 * A computed value broke a simulation invariant (programming defect)
 */
export class SimulationInvariantViolation extends FactorySimError {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationInvariantViolation';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
