export const ErrorCodes = {
  UNRECOGNIZED_PERIOD: 'UNRECOGNIZED_PERIOD',
  INVALID_RANGE: 'INVALID_RANGE',
  AUTH_ERROR: 'AUTH_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  API_ERROR: 'API_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export const ExitCodes = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  UNRECOGNIZED_PERIOD: 2,
  INVALID_RANGE: 3,
  AUTH_ERROR: 4,
  NETWORK_ERROR: 5,
  API_ERROR: 6,
} as const;

export class CostReportError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'CostReportError';
  }
}

const SUPPORTED_PERIODS_HINT =
  "Supported formats: 'today', 'yesterday', 'last N days', 'this week', 'last week', " +
  "'this month', 'last month', 'YYYY-MM-DD', 'YYYY-MM-DD to YYYY-MM-DD', 'january', 'jan 2025'";

export class UnrecognizedPeriodError extends CostReportError {
  constructor(public readonly expression: string) {
    super(
      `Could not parse period '${expression}'. ${SUPPORTED_PERIODS_HINT}`,
      ErrorCodes.UNRECOGNIZED_PERIOD,
      ExitCodes.UNRECOGNIZED_PERIOD
    );
    this.name = 'UnrecognizedPeriodError';
  }
}

export class InvalidRangeError extends CostReportError {
  constructor(public readonly start: string, public readonly end: string) {
    super(
      `Invalid range: start date ${start} is after end date ${end}`,
      ErrorCodes.INVALID_RANGE,
      ExitCodes.INVALID_RANGE
    );
    this.name = 'InvalidRangeError';
  }
}

export class AuthError extends CostReportError {
  constructor(message: string) {
    super(message, ErrorCodes.AUTH_ERROR, ExitCodes.AUTH_ERROR);
    this.name = 'AuthError';
  }
}

export class NetworkError extends CostReportError {
  constructor(message: string) {
    super(`Network error: ${message}`, ErrorCodes.NETWORK_ERROR, ExitCodes.NETWORK_ERROR);
    this.name = 'NetworkError';
  }
}

export class ApiError extends CostReportError {
  constructor(public readonly status: number, public readonly detail: string) {
    super(`API error (${status}): ${detail}`, ErrorCodes.API_ERROR, ExitCodes.API_ERROR);
    this.name = 'ApiError';
  }
}
