import { describe, it, expect, vi, afterEach } from 'vitest';
import { componentLogger, createChildLogger, createLogger } from '../logger/index.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should be silent under test by default', () => {
    expect(createLogger().level).toBe('silent');
  });

  it('should use custom log level', () => {
    expect(createLogger({ level: 'debug', pretty: false }).level).toBe('debug');
  });

  it('should use LOG_LEVEL environment variable', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');

    expect(createLogger({ pretty: false }).level).toBe('warn');
  });

  it('should bind the service name', () => {
    const logger = createLogger({ serviceName: 'lineage-test', pretty: false });

    expect(logger.bindings()).toMatchObject({ service: 'lineage-test' });
  });
});

describe('child loggers', () => {
  const parent = createLogger({ level: 'silent', pretty: false });

  it('should bind the component name', () => {
    expect(componentLogger('lineage-map-builder', parent).bindings()).toMatchObject({
      component: 'lineage-map-builder',
    });
  });

  it('should bind arbitrary context', () => {
    expect(createChildLogger(parent, { runId: 'run-1' }).bindings()).toMatchObject({ runId: 'run-1' });
  });
});
