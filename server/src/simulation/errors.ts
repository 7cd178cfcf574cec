// server/src/simulation/errors.ts

export type SimulationErrorKind = 'insufficient-data' | 'invalid-profile' | 'configuration' | 'not-found' | 'aborted';

export interface ErrorDetails {
  entityId?: number;
  entityKind?: string;
  season?: number;
  scope?: string;
  threshold?: string;
  reason?: string;
  issues?: string[];
  completedTrials?: number;
  requestedTrials?: number;
}

export class SimulationError extends Error {
  readonly kind: SimulationErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: SimulationErrorKind, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.details = details;
  }

  toJSON() {
    return { error: this.message, kind: this.kind, details: this.details };
  }
}

/**
 * A required scope has zero underlying records. `details.reason` is
 * 'empty-population' when the season holds no records of that kind at all and
 * 'empty-scope' when records exist but none belong to the entity.
 */
export class InsufficientDataError extends SimulationError {
  constructor(message: string, details: ErrorDetails) {
    super('insufficient-data', message, details);
  }
}

/** No general (season) baseline exists for an entity. */
export class InvalidProfileError extends SimulationError {
  constructor(message: string, details: ErrorDetails) {
    super('invalid-profile', message, details);
  }
}

export class ConfigurationError extends SimulationError {
  constructor(message: string, issues: string[]) {
    super('configuration', message, { issues });
  }
}

export class NotFoundError extends SimulationError {
  constructor(entityKind: string, entityId: number) {
    super('not-found', `${entityKind} ${entityId} not found`, { entityId, entityKind });
  }
}

/** Attached to a partial result when a run is cancelled between trials. */
export class SimulationAbortedError extends SimulationError {
  constructor(completedTrials: number, requestedTrials: number, reason?: string) {
    super(
      'aborted',
      `Simulation aborted after ${completedTrials} of ${requestedTrials} trials`,
      { completedTrials, requestedTrials, reason }
    );
  }
}

export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}
