import { Dimensions } from './ResizeRequest';

/**
 * Settings for the resize job, read once per invocation from the environment.
 */
export interface ResizeSettings {
  readonly uploadBucket: string;
  readonly resizedBucket: string;
  readonly defaults: Readonly<Dimensions>;
  readonly urlExpiresIn: number;
}

/**
 * ThresholdPolicy Interface
 *
 * Cost limits and the switches that decide what happens when they are crossed.
 * Fixed at deployment time.
 */
export interface ThresholdPolicy {
  readonly alertThreshold: number;
  readonly criticalThreshold: number;
  readonly sendDailySummary: boolean;
  readonly enableAutoNuke: boolean;
  readonly nukeDryRun: boolean;
}

export interface NtfySettings {
  readonly server: string;
  readonly topic: string;
  readonly token?: string;
}

export interface CostAlerterSettings {
  readonly policy: ThresholdPolicy;
  readonly ntfy: NtfySettings;
}
