import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/logger.js';

describe('createLogger', () => {
  it('logs at info by default', () => {
    expect(createLogger().level).toBe('info');
  });

  it('switches to debug', () => {
    expect(createLogger({ debug: true }).level).toBe('debug');
  });

  it('has a silent variant', () => {
    expect(silentLogger().level).toBe('silent');
  });
});
