import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { HostFault } from './fault-reporter';

// The reporter is process-wide, so each test loads a fresh copy of the module.
async function freshModule(): Promise<typeof import('./fault-reporter')> {
  vi.resetModules();
  return import('./fault-reporter');
}

describe('fault reporter', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to the console when nothing is installed', async () => {
    const { hasFaultReporter, reportFault } = await freshModule();
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const error = new Error('boom');

    reportFault(error, 'decoding events');

    expect(hasFaultReporter()).toBe(false);
    expect(consoleError).toHaveBeenCalledWith('[EventClient] decoding events:', error);
  });

  it('keeps the first installed reporter', async () => {
    const { installFaultReporter, hasFaultReporter, reportFault } = await freshModule();
    const first: HostFault[] = [];
    const second: HostFault[] = [];

    expect(installFaultReporter((fault) => first.push(fault))).toBe(true);
    expect(installFaultReporter((fault) => second.push(fault))).toBe(false);
    reportFault(new TypeError('bad value'), 'log sink failed');
    reportFault('plain failure', 'unexpected failure in event client');

    expect(hasFaultReporter()).toBe(true);
    expect(second).toEqual([]);
    expect(first).toHaveLength(2);
    expect(first[0]).toMatchObject({ context: 'log sink failed', message: 'bad value', name: 'TypeError' });
    expect(first[1]).toEqual({ context: 'unexpected failure in event client', message: 'plain failure' });
  });

  it('survives a reporter that throws', async () => {
    const { installFaultReporter, reportFault } = await freshModule();
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reporterError = new Error('reporter down');
    installFaultReporter(() => {
      throw reporterError;
    });

    expect(() => reportFault('oops', 'decoding events')).not.toThrow();
    expect(consoleError).toHaveBeenCalledWith('[EventClient] fault reporter failed:', reporterError, {
      context: 'decoding events',
      message: 'oops',
    });
  });
});
