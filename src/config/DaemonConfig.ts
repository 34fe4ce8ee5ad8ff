/**
 * Daemon Configuration
 *
 * Settings derived from environment variables. The dispatcher, the HTTP
 * binding and the CLI read their defaults from here; explicit options
 * passed to them win.
 */

export interface DaemonConfiguration {
  /** Try every operation when no action hint matches (SOAP_ACCEPT_SLOW_SELECT, default true) */
  acceptSlowSelect: boolean;
  /** List registered operations in "message not recognized" faults (SOAP_DISCLOSE_OPERATIONS, default true) */
  discloseOperations: boolean;
  /** Listen address (SOAP_HTTP_HOST, default 0.0.0.0) */
  host: string;
  /** Listen port (SOAP_HTTP_PORT, default 8081) */
  port: number;
  /** Per-request time limit in ms (SOAP_CLIENT_TIMEOUT, default 30000) */
  clientTimeout: number;
  /** Requests served per connection before it is closed (SOAP_CLIENT_MAXREQ, default 100) */
  clientMaxRequests: number;
  /** Largest accepted request body (SOAP_BODY_LIMIT, default 50mb) */
  bodyLimit: string;
  /** Server header value (SOAP_SERVER_NAME, default 'soap daemon') */
  serverName: string;
}

let cachedConfig: DaemonConfiguration | null = null;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Current daemon configuration; cached after the first call, use
 * resetDaemonConfig() in tests.
 */
export function getDaemonConfig(): DaemonConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    acceptSlowSelect: parseBoolean(process.env['SOAP_ACCEPT_SLOW_SELECT'], true),
    discloseOperations: parseBoolean(process.env['SOAP_DISCLOSE_OPERATIONS'], true),
    host: process.env['SOAP_HTTP_HOST'] || '0.0.0.0',
    port: parseNumber(process.env['SOAP_HTTP_PORT'], 8081),
    clientTimeout: parseNumber(process.env['SOAP_CLIENT_TIMEOUT'], 30000),
    clientMaxRequests: parseNumber(process.env['SOAP_CLIENT_MAXREQ'], 100),
    bodyLimit: process.env['SOAP_BODY_LIMIT'] || '50mb',
    serverName: process.env['SOAP_SERVER_NAME'] || 'soap daemon',
  };

  return cachedConfig;
}

export function resetDaemonConfig(): void {
  cachedConfig = null;
}
