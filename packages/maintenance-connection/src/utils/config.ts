/**
 * Client Configuration
 * Server host and Basic-auth credentials for the v8 API.
 */

export interface MaintenanceConnectionConfig {
  /** Host (and optional port) of the Maintenance Connection server, no scheme. */
  server: string;
  user: string;
  password: string;
  /** Request timeout in ms. Unset means no timeout. */
  timeout?: number;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): MaintenanceConnectionConfig {
  const config: MaintenanceConnectionConfig = {
    server: env.MC_SERVER || '',
    user: env.MC_USER || '',
    password: env.MC_PASSWORD || '',
  };

  const timeout = parseInt(env.MC_TIMEOUT_MS || '');
  if (timeout > 0) {
    config.timeout = timeout;
  }

  return config;
}

/**
 * Validate configuration has required fields.
 */
export function validateConfig(config: MaintenanceConnectionConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.server) {
    errors.push('Missing server');
  } else if (/^https?:\/\//.test(config.server) || config.server.includes('/')) {
    errors.push('server must be a bare host, without scheme or path');
  }
  if (!config.user) {
    errors.push('Missing user');
  }
  if (!config.password) {
    errors.push('Missing password');
  }
  if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout <= 0)) {
    errors.push(`timeout must be a positive number, got ${config.timeout}`);
  }

  return { valid: errors.length === 0, errors };
}
