import configuration from './configuration';

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should apply defaults when nothing is set', () => {
    for (const key of [
      'DATA_API_PORT',
      'WEBHOOK_URL',
      'WEBHOOK_RETRIES',
      'WEBHOOK_SITE_BASE_URL',
      'FAKER_LOCALE',
      'FAKER_SEED',
      'MAX_BATCH_SIZE',
      'DISPATCH_CREATE_TOKEN',
    ]) {
      delete process.env[key];
    }

    const config = configuration();

    expect(config.dataApiPort).toBe(8010);
    expect(config.webhookUrl).toBeUndefined();
    expect(config.webhookRetries).toBe(0);
    expect(config.webhookSiteBaseUrl).toBe('https://webhook.site');
    expect(config.fakerLocale).toBe('en');
    expect(config.fakerSeed).toBeUndefined();
    expect(config.maxBatchSize).toBe(1000);
    expect(config.dispatchCreateToken).toBe(false);
  });

  it('should parse numeric and boolean variables', () => {
    process.env.FAKER_SEED = '42';
    process.env.WEBHOOK_RETRIES = '3';
    process.env.DISPATCH_CREATE_TOKEN = 'true';
    process.env.WEBHOOK_URL = 'https://webhook.test/test-token';

    const config = configuration();

    expect(config.fakerSeed).toBe(42);
    expect(config.webhookRetries).toBe(3);
    expect(config.dispatchCreateToken).toBe(true);
    expect(config.webhookUrl).toBe('https://webhook.test/test-token');
  });

  it('should refuse a FAKER_SEED that is not a non-negative integer', () => {
    process.env.FAKER_SEED = 'abc';
    expect(() => configuration()).toThrow(
      'Invalid FAKER_SEED: abc (expected a non-negative integer)',
    );

    process.env.FAKER_SEED = '-1';
    expect(() => configuration()).toThrow('Invalid FAKER_SEED: -1');
  });
});
