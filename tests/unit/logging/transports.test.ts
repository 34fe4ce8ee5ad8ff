import { describe, it, expect } from '@jest/globals';
import { formatDaemonTimestamp, formatTextLine } from '../../../src/logging/transports.js';

describe('transports', () => {
  const when = new Date(2026, 1, 10, 14, 30, 5, 42);

  it('should format daemon timestamps in local time', () => {
    expect(formatDaemonTimestamp(when)).toBe('2026-02-10 14:30:05,042');
  });

  it('should format a text line with level, timestamp and component', () => {
    const line = formatTextLine({ level: 'info', message: 'added 3 operations from WSDL', component: 'wsdl' }, 'daemon', when);
    expect(line).toBe('INFO  2026-02-10 14:30:05,042 [wsdl] added 3 operations from WSDL');
  });

  it('should omit the component when absent and use ISO timestamps on request', () => {
    const line = formatTextLine({ level: 'warn', message: 'careful' }, 'iso', when);
    expect(line).toBe(`WARN  ${when.toISOString()} careful`);
  });

  it('should append the error stack on its own line', () => {
    const line = formatTextLine(
      { level: 'error', message: 'handler threw', component: 'dispatcher', errorStack: 'Error: boom\n    at x' },
      'daemon',
      when
    );
    expect(line).toBe('ERROR 2026-02-10 14:30:05,042 [dispatcher] handler threw\nError: boom\n    at x');
  });
});
