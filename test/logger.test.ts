import { resolveLogLevel } from '../src/logger';

describe('resolveLogLevel', () => {
  it('defaults to info', () => {
    expect(resolveLogLevel()).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });

  it('accepts pino levels in any case', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });
});
