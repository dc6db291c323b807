import { loadCostAlerterSettings, loadResizeSettings } from '../lib';

/**
 * Unit Tests for environment configuration
 */
const ENV_KEYS = [
  'UPLOAD_BUCKET',
  'RESIZED_BUCKET',
  'RESIZED_WIDTH',
  'RESIZED_HEIGHT',
  'PRESIGNED_URL_EXPIRES_IN',
  'ALERT_THRESHOLD',
  'CRITICAL_THRESHOLD',
  'NTFY_SERVER',
  'NTFY_TOPIC',
  'NTFY_TOKEN',
  'ENABLE_AUTO_NUKE',
  'NUKE_DRY_RUN',
  'SEND_DAILY_SUMMARY',
];

beforeEach(() => {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
});

describe('loadResizeSettings', () => {
  test('should apply defaults when only the buckets are set', () => {
    // GIVEN
    process.env.UPLOAD_BUCKET = 'uploads';
    process.env.RESIZED_BUCKET = 'resized';

    // WHEN
    const settings = loadResizeSettings();

    // THEN
    expect(settings).toEqual({
      uploadBucket: 'uploads',
      resizedBucket: 'resized',
      defaults: { width: 800, height: 600 },
      urlExpiresIn: 3600,
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  test('should read configured dimensions and URL lifetime', () => {
    process.env.UPLOAD_BUCKET = 'uploads';
    process.env.RESIZED_BUCKET = 'resized';
    process.env.RESIZED_WIDTH = '1024';
    process.env.RESIZED_HEIGHT = '768';
    process.env.PRESIGNED_URL_EXPIRES_IN = '900';

    expect(loadResizeSettings()).toMatchObject({ defaults: { width: 1024, height: 768 }, urlExpiresIn: 900 });
  });

  test('should throw when UPLOAD_BUCKET is missing', () => {
    process.env.RESIZED_BUCKET = 'resized';

    expect(() => loadResizeSettings()).toThrow('UPLOAD_BUCKET environment variable is not set');
  });

  test.each(['0', '-1', '1.5', 'wide'])('should reject RESIZED_WIDTH=%s', (value) => {
    process.env.UPLOAD_BUCKET = 'uploads';
    process.env.RESIZED_BUCKET = 'resized';
    process.env.RESIZED_WIDTH = value;

    expect(() => loadResizeSettings()).toThrow('RESIZED_WIDTH environment variable must be a positive integer');
  });
});

describe('loadCostAlerterSettings', () => {
  /**
   * Test: an empty environment can never stop or delete anything
   */
  test('should default to safe settings', () => {
    expect(loadCostAlerterSettings()).toEqual({
      policy: {
        alertThreshold: 10,
        criticalThreshold: 50,
        sendDailySummary: false,
        enableAutoNuke: false,
        nukeDryRun: true,
      },
      ntfy: {
        server: 'https://ntfy.sh',
        topic: 'aws-cost-alerts',
      },
    });
  });

  test('should read every variable', () => {
    // GIVEN
    process.env.ALERT_THRESHOLD = '25.5';
    process.env.CRITICAL_THRESHOLD = '100';
    process.env.NTFY_SERVER = 'https://ntfy.example.com/';
    process.env.NTFY_TOPIC = 'team-costs';
    process.env.NTFY_TOKEN = 'test-secret';
    process.env.ENABLE_AUTO_NUKE = 'YES';
    process.env.NUKE_DRY_RUN = '0';
    process.env.SEND_DAILY_SUMMARY = 'true';

    // WHEN
    const settings = loadCostAlerterSettings();

    // THEN
    expect(settings).toEqual({
      policy: {
        alertThreshold: 25.5,
        criticalThreshold: 100,
        sendDailySummary: true,
        enableAutoNuke: true,
        nukeDryRun: false,
      },
      ntfy: {
        server: 'https://ntfy.example.com',
        topic: 'team-costs',
        token: 'test-secret',
      },
    });
  });

  test('should accept equal alert and critical thresholds', () => {
    process.env.ALERT_THRESHOLD = '20';
    process.env.CRITICAL_THRESHOLD = '20';

    expect(loadCostAlerterSettings().policy).toMatchObject({ alertThreshold: 20, criticalThreshold: 20 });
  });

  test('should reject a critical threshold below the alert threshold', () => {
    process.env.ALERT_THRESHOLD = '30';
    process.env.CRITICAL_THRESHOLD = '20';

    expect(() => loadCostAlerterSettings()).toThrow(
      'CRITICAL_THRESHOLD (20) must not be lower than ALERT_THRESHOLD (30)'
    );
  });

  test('should reject a negative threshold', () => {
    process.env.ALERT_THRESHOLD = '-5';

    expect(() => loadCostAlerterSettings()).toThrow('ALERT_THRESHOLD environment variable must be a non-negative number');
  });

  test.each(['10abc', '1e', 'ten', 'Infinity'])('should reject a malformed threshold %s', (value) => {
    process.env.CRITICAL_THRESHOLD = value;

    expect(() => loadCostAlerterSettings()).toThrow(
      'CRITICAL_THRESHOLD environment variable must be a non-negative number'
    );
  });

  test('should accept a fractional threshold', () => {
    process.env.ALERT_THRESHOLD = '12.5';
    process.env.CRITICAL_THRESHOLD = '60';

    expect(loadCostAlerterSettings().policy).toMatchObject({ alertThreshold: 12.5, criticalThreshold: 60 });
  });

  /**
   * Test: a typo must not flip a safety switch
   */
  test('should reject an unrecognised boolean', () => {
    process.env.NUKE_DRY_RUN = 'flase';

    expect(() => loadCostAlerterSettings()).toThrow('NUKE_DRY_RUN environment variable must be true or false');
  });
});
