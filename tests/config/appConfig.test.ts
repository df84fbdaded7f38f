import { DEFAULT_APP_CONFIG, loadAppConfig, validateAppConfig } from '../../src/config/appConfig';

describe('loadAppConfig', () => {
  test('uses defaults when nothing is set', () => {
    const { config, errors } = loadAppConfig({});
    expect(config).toEqual(DEFAULT_APP_CONFIG);
    expect(errors).toEqual([]);
  });

  test('reads every variable', () => {
    const { config, errors } = loadAppConfig({
      FIELD_ROUTE_ENV: 'Prod',
      FIELD_ROUTE_DEBUG: 'true',
      FIELD_ROUTE_LANGUAGE: 'es',
      SYNC_MAX_RETRIES: '3',
      SYNC_BACKOFF_MS: '250',
      DEMO_TICK_MS: '1000',
      DEMO_COMPLETE_AFTER_MS: '60000'
    });
    expect(errors).toEqual([]);
    expect(config).toEqual({
      environment: 'prod',
      debug: true,
      language: 'ES',
      sync: { maxRetries: 3, backoffMs: 250 },
      demo: { tickMs: 1000, completeAfterMs: 60000 }
    });
  });

  test('unknown environment falls back to local and is reported', () => {
    const { config, errors } = loadAppConfig({ FIELD_ROUTE_ENV: 'staging' });
    expect(config.environment).toBe('local');
    expect(errors).toEqual(['Unsupported environment "staging". Use one of: local, dev, prod.']);
  });

  test('unparsable numbers keep their defaults', () => {
    const { config, errors } = loadAppConfig({ SYNC_BACKOFF_MS: 'soon', DEMO_TICK_MS: '' });
    expect(config.sync.backoffMs).toBe(2000);
    expect(config.demo.tickMs).toBe(5000);
    expect(errors).toEqual([]);
  });

  test('out-of-range numbers are kept but reported', () => {
    const { config, errors } = loadAppConfig({ SYNC_MAX_RETRIES: '-1', DEMO_TICK_MS: '0' });
    expect(config.sync.maxRetries).toBe(-1);
    expect(errors).toEqual(['SYNC_MAX_RETRIES must be >= 0.', 'DEMO_TICK_MS must be > 0.']);
  });
});

describe('validateAppConfig', () => {
  test('accepts the defaults', () => {
    expect(validateAppConfig(DEFAULT_APP_CONFIG)).toEqual([]);
  });

  test('reports negative backoff and completion delay', () => {
    const errors = validateAppConfig({
      ...DEFAULT_APP_CONFIG,
      sync: { maxRetries: 1, backoffMs: -5 },
      demo: { tickMs: 10, completeAfterMs: -1 }
    });
    expect(errors).toEqual(['SYNC_BACKOFF_MS must be >= 0.', 'DEMO_COMPLETE_AFTER_MS must be >= 0.']);
  });
});
