import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LoggingConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    delete process.env['SOAP_DEBUG_COMPONENTS'];
    delete process.env['LOG_FORMAT'];
    delete process.env['LOG_FILE'];
    delete process.env['LOG_TIMESTAMP_FORMAT'];
    resetLoggingConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  it('should use defaults without environment', () => {
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.INFO,
      debugComponents: [],
      logFormat: 'text',
      logFile: undefined,
      timestampFormat: 'daemon',
    });
  });

  describe('LOG_LEVEL parsing', () => {
    it.each([
      ['TRACE', LogLevel.TRACE],
      ['debug', LogLevel.DEBUG],
      ['WARNING', LogLevel.WARN],
      ['ERROR', LogLevel.ERROR],
      ['VERBOSE', LogLevel.INFO],
    ])('should parse %s', (value, expected) => {
      process.env['LOG_LEVEL'] = value;
      expect(getLoggingConfig().logLevel).toBe(expected);
    });
  });

  describe('SOAP_DEBUG_COMPONENTS parsing', () => {
    it('should split, trim and drop empty entries', () => {
      process.env['SOAP_DEBUG_COMPONENTS'] = ' dispatcher , ,http:TRACE,';
      expect(getLoggingConfig().debugComponents).toEqual(['dispatcher', 'http:TRACE']);
    });

    it('should return an empty array for blank input', () => {
      process.env['SOAP_DEBUG_COMPONENTS'] = '   ';
      expect(getLoggingConfig().debugComponents).toEqual([]);
    });
  });

  describe('format options', () => {
    it('should accept json and iso', () => {
      process.env['LOG_FORMAT'] = 'json';
      process.env['LOG_TIMESTAMP_FORMAT'] = 'iso';
      const config = getLoggingConfig();
      expect(config.logFormat).toBe('json');
      expect(config.timestampFormat).toBe('iso');
    });

    it('should fall back for unknown values', () => {
      process.env['LOG_FORMAT'] = 'yaml';
      process.env['LOG_TIMESTAMP_FORMAT'] = 'unix';
      const config = getLoggingConfig();
      expect(config.logFormat).toBe('text');
      expect(config.timestampFormat).toBe('daemon');
    });
  });

  describe('LOG_FILE parsing', () => {
    it('should set logFile when present and ignore an empty value', () => {
      process.env['LOG_FILE'] = '/var/log/soap-daemon.log';
      expect(getLoggingConfig().logFile).toBe('/var/log/soap-daemon.log');

      resetLoggingConfig();
      process.env['LOG_FILE'] = '';
      expect(getLoggingConfig().logFile).toBeUndefined();
    });
  });

  describe('caching', () => {
    it('should cache until reset', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      const first = getLoggingConfig();
      process.env['LOG_LEVEL'] = 'ERROR';
      expect(getLoggingConfig()).toBe(first);

      resetLoggingConfig();
      expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);
    });
  });
});
