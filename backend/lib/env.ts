import { CostAlerterSettings, ResizeSettings } from '../interfaces';

/**
 * Get the upload bucket name from environment variables
 * @returns S3 bucket holding source images
 * @throws Error if the environment variable is not set
 */
export function getEnvUploadBucket(): string {
  return getEnvStringVar('UPLOAD_BUCKET');
}

/**
 * Get the resized bucket name from environment variables
 * @returns S3 bucket receiving resized images
 * @throws Error if the environment variable is not set
 */
export function getEnvResizedBucket(): string {
  return getEnvStringVar('RESIZED_BUCKET');
}

export function getEnvResizedWidth(defaultValue = 800): number {
  return getEnvIntVar('RESIZED_WIDTH', defaultValue);
}

export function getEnvResizedHeight(defaultValue = 600): number {
  return getEnvIntVar('RESIZED_HEIGHT', defaultValue);
}

/**
 * Lifetime of the presigned GET URL handed back for a resized image
 * @returns Seconds
 */
export function getEnvUrlExpiresIn(defaultValue = 3600): number {
  return getEnvIntVar('PRESIGNED_URL_EXPIRES_IN', defaultValue);
}

/**
 * Read every resize setting at once
 * @returns Frozen settings passed into the resize pipeline
 * @throws Error if a required variable is missing or a number is malformed
 */
export function loadResizeSettings(): ResizeSettings {
  return Object.freeze({
    uploadBucket: getEnvUploadBucket(),
    resizedBucket: getEnvResizedBucket(),
    defaults: Object.freeze({
      width: getEnvResizedWidth(),
      height: getEnvResizedHeight(),
    }),
    urlExpiresIn: getEnvUrlExpiresIn(),
  });
}

/**
 * Read the cost alerter configuration
 *
 * Dry run defaults to on and auto-nuke to off, so an empty environment can
 * never stop or delete anything.
 *
 * @returns Frozen settings passed into the cost check
 * @throws Error if a value is malformed or the critical threshold is below the alert threshold
 */
export function loadCostAlerterSettings(): CostAlerterSettings {
  const alertThreshold = getEnvFloatVar('ALERT_THRESHOLD', 10);
  const criticalThreshold = getEnvFloatVar('CRITICAL_THRESHOLD', 50);
  if (criticalThreshold < alertThreshold) {
    throw new Error(
      `CRITICAL_THRESHOLD (${criticalThreshold}) must not be lower than ALERT_THRESHOLD (${alertThreshold})`
    );
  }

  const token = process.env.NTFY_TOKEN;
  return Object.freeze({
    policy: Object.freeze({
      alertThreshold,
      criticalThreshold,
      sendDailySummary: getEnvBoolVar('SEND_DAILY_SUMMARY', false),
      enableAutoNuke: getEnvBoolVar('ENABLE_AUTO_NUKE', false),
      nukeDryRun: getEnvBoolVar('NUKE_DRY_RUN', true),
    }),
    ntfy: Object.freeze({
      server: (process.env.NTFY_SERVER || 'https://ntfy.sh').replace(/\/+$/, ''),
      topic: process.env.NTFY_TOPIC || 'aws-cost-alerts',
      ...(token ? { token } : {}),
    }),
  });
}

/**
 * Helper function to retrieve and validate string environment variables
 * @param varName Name of the environment variable
 * @returns Value of the environment variable
 * @throws Error if the environment variable is not set or empty
 */
function getEnvStringVar(varName: string): string {
  const value = process.env[varName];
  if (!value) {
    throw new Error(`${varName} environment variable is not set`);
  }
  return value;
}

/**
 * Helper function to retrieve and validate positive integer environment variables
 * @param varName Name of the environment variable
 * @param defaultValue Used when the variable is unset or empty
 * @returns Integer value of the environment variable
 * @throws Error if the value is not a positive integer
 */
function getEnvIntVar(varName: string, defaultValue: number): number {
  const value = process.env[varName];
  if (!value) {
    return defaultValue;
  }
  const intValue = Number(value);
  if (!Number.isInteger(intValue) || intValue <= 0) {
    throw new Error(`${varName} environment variable must be a positive integer`);
  }
  return intValue;
}

function getEnvFloatVar(varName: string, defaultValue: number): number {
  const value = process.env[varName];
  if (!value) {
    return defaultValue;
  }
  const floatValue = Number(value);
  if (!Number.isFinite(floatValue) || floatValue < 0) {
    throw new Error(`${varName} environment variable must be a non-negative number`);
  }
  return floatValue;
}

/**
 * Helper function to retrieve boolean flags
 * Accepts true/false, yes/no and 1/0 in any case.
 * @throws Error for any other value, so a typo cannot silently flip a safety switch
 */
function getEnvBoolVar(varName: string, defaultValue: boolean): boolean {
  const value = process.env[varName]?.trim().toLowerCase();
  if (!value) {
    return defaultValue;
  }
  if (['true', 'yes', '1'].includes(value)) {
    return true;
  }
  if (['false', 'no', '0'].includes(value)) {
    return false;
  }
  throw new Error(`${varName} environment variable must be true or false`);
}
