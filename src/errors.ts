/**
 * Error types raised outside the engine core.
 *
 * The engine itself never throws: leaving the grid is reported through
 * `RoverState.lost`, and unsupported commands come back as decode results.
 * These errors cover configuration that cannot be turned into a run at all.
 */

export enum RoverSimErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  MISSION_UNREADABLE = 'MISSION_UNREADABLE',
  MISSION_INVALID = 'MISSION_INVALID',
}

export class RoverSimError extends Error {
  readonly code: RoverSimErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: RoverSimErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RoverSimError';
    this.code = code;
    this.context = context;
  }
}

export class ConfigError extends RoverSimError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(RoverSimErrorCode.CONFIG_INVALID, `Invalid environment configuration: ${issues.join('; ')}`, {
      issues,
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class MissionConfigError extends RoverSimError {
  readonly issues: string[];

  constructor(
    code: RoverSimErrorCode.MISSION_INVALID | RoverSimErrorCode.MISSION_UNREADABLE,
    issues: string[],
    context: Record<string, unknown> = {},
  ) {
    super(code, `Invalid mission: ${issues.join('; ')}`, { ...context, issues });
    this.name = 'MissionConfigError';
    this.issues = issues;
  }
}

export const isRoverSimError = (error: unknown): error is RoverSimError =>
  error instanceof RoverSimError;
