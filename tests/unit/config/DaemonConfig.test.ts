import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getDaemonConfig, resetDaemonConfig } from '../../../src/config/DaemonConfig.js';

const VARIABLES = [
  'SOAP_ACCEPT_SLOW_SELECT',
  'SOAP_DISCLOSE_OPERATIONS',
  'SOAP_HTTP_HOST',
  'SOAP_HTTP_PORT',
  'SOAP_CLIENT_TIMEOUT',
  'SOAP_CLIENT_MAXREQ',
  'SOAP_BODY_LIMIT',
  'SOAP_SERVER_NAME',
];

describe('getDaemonConfig', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of VARIABLES) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
    resetDaemonConfig();
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    resetDaemonConfig();
  });

  it('should use defaults without environment variables', () => {
    expect(getDaemonConfig()).toEqual({
      acceptSlowSelect: true,
      discloseOperations: true,
      host: '0.0.0.0',
      port: 8081,
      clientTimeout: 30000,
      clientMaxRequests: 100,
      bodyLimit: '50mb',
      serverName: 'soap daemon',
    });
  });

  it('should read settings from the environment', () => {
    process.env['SOAP_ACCEPT_SLOW_SELECT'] = 'false';
    process.env['SOAP_DISCLOSE_OPERATIONS'] = '0';
    process.env['SOAP_HTTP_HOST'] = '127.0.0.1';
    process.env['SOAP_HTTP_PORT'] = '9090';
    process.env['SOAP_SERVER_NAME'] = 'test-daemon';

    const config = getDaemonConfig();

    expect(config.acceptSlowSelect).toBe(false);
    expect(config.discloseOperations).toBe(false);
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(9090);
    expect(config.serverName).toBe('test-daemon');
  });

  it('should accept yes and 1 as true', () => {
    process.env['SOAP_ACCEPT_SLOW_SELECT'] = 'yes';
    process.env['SOAP_DISCLOSE_OPERATIONS'] = '1';

    expect(getDaemonConfig().acceptSlowSelect).toBe(true);
    expect(getDaemonConfig().discloseOperations).toBe(true);
  });

  it('should keep the default for numbers that do not parse', () => {
    process.env['SOAP_HTTP_PORT'] = 'eighty';

    expect(getDaemonConfig().port).toBe(8081);
  });

  it('should cache until reset', () => {
    const first = getDaemonConfig();
    process.env['SOAP_HTTP_PORT'] = '9191';

    expect(getDaemonConfig()).toBe(first);

    resetDaemonConfig();
    expect(getDaemonConfig().port).toBe(9191);
  });
});
