import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { join } from 'path';
import { createProgram, VERSION } from '../../../src/cli/program.js';

const INFO = join(__dirname, '../../fixtures/info-service.wsdl');

describe('createProgram', () => {
  it('should define the index and serve commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('soap-daemon');
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((c) => c.name())).toEqual(['index', 'serve']);
  });

  it('should offer the serve options', () => {
    const serve = createProgram().commands.find((c) => c.name() === 'serve');

    expect(serve?.options.map((o) => o.long)).toEqual([
      '--handlers',
      '--host',
      '--port',
      '--no-slow-select',
      '--wsdl-response',
    ]);
  });

  describe('index', () => {
    let written: string[];

    beforeEach(() => {
      written = [];
      jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
        written.push(String(chunk));
        return true;
      });
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      jest.restoreAllMocks();
      process.exitCode = undefined;
    });

    it('should print the operations per SOAP version', async () => {
      await createProgram().parseAsync(['index', INFO], { from: 'user' });

      expect(written.join('')).toBe('SOAP11:\n   getInfo\n   setInfo\nSOAP12:\n   getInfo\n');
      expect(process.exitCode).toBeUndefined();
    });

    it('should set a failing exit code for unreadable WSDL', async () => {
      await createProgram().parseAsync(['index', join(__dirname, 'missing.wsdl')], { from: 'user' });

      expect(written).toEqual([]);
      expect(process.exitCode).toBe(1);
    });
  });
});
