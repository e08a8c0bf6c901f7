import type { JsonValue } from '../models/types.js';

export class MaintenanceConnectionError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'MaintenanceConnectionError';
    this.status = status;
  }
}

/**
 * Thrown when a GET body parses as JSON but carries no `Results` array,
 * which is what the server sends back on most failed queries.
 */
export class ResultsMissingError extends MaintenanceConnectionError {
  readonly module: string;
  readonly body: JsonValue;

  constructor(module: string, status: number, body: JsonValue) {
    super(`Response from ${module} (HTTP ${status}) has no Results array`, status);
    this.name = 'ResultsMissingError';
    this.module = module;
    this.body = body;
  }
}

export class QueryParameterError extends MaintenanceConnectionError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryParameterError';
  }
}

export class ConfigError extends MaintenanceConnectionError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid Maintenance Connection config: ${errors.join(', ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}
