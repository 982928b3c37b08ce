export class EdgeprobeError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'EdgeprobeError';
  }
}

/**
 * The in-process transport cannot serve the request in this runtime
 * (no `fetch`, or no TLS support for an https URL). Never shown to the user:
 * the fallback client swaps to the external tool instead.
 */
export class CapabilityUnavailableError extends EdgeprobeError {
  constructor(message: string) {
    super(message, 'CAPABILITY_UNAVAILABLE');
    this.name = 'CapabilityUnavailableError';
  }
}

export class ToolNotFoundError extends EdgeprobeError {
  constructor(public readonly tool: string) {
    super(`${tool} not found on PATH`, 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}

export class NetworkError extends EdgeprobeError {
  constructor(message: string, public readonly timedOut = false) {
    super(message, timedOut ? 'NETWORK_TIMEOUT' : 'NETWORK_ERROR');
    this.name = 'NetworkError';
  }
}

export class LocalIoError extends EdgeprobeError {
  constructor(message: string, public readonly path?: string) {
    super(message, 'LOCAL_IO_ERROR');
    this.name = 'LocalIoError';
  }
}

export class ConfigError extends EdgeprobeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class MeasurementError extends EdgeprobeError {
  constructor(message: string, public readonly exitCode?: number | null) {
    super(message, 'MEASUREMENT_ERROR');
    this.name = 'MeasurementError';
  }
}

export class UserCancelledError extends EdgeprobeError {
  constructor(message = 'Cancelled by user') {
    super(message, 'USER_CANCELLED');
    this.name = 'UserCancelledError';
  }
}
