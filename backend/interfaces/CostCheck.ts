import { NukeSummary } from './Nuke';

export type CostLevel = 'ok' | 'alert' | 'critical';

/**
 * What started a cost check: the daily schedule, a budget notification
 * relayed through SNS, or a direct invoke.
 */
export type CostCheckTrigger =
  | { source: 'schedule'; time: string }
  | { source: 'budget'; subject?: string; message: string }
  | { source: 'manual' };

export type NotificationKind = 'summary' | 'alert' | 'critical' | 'nuke';

export interface NotificationRecord {
  kind: NotificationKind;
  title: string;
  delivered: boolean;
  error?: string;
}

/**
 * CostCheckResult Interface
 *
 * Returned by the cost alerter Lambda. Nothing consumes it; it lands in the
 * invocation log and in the async destination if one is configured.
 */
export interface CostCheckResult {
  trigger: CostCheckTrigger;
  level: CostLevel;
  currentCost: number;
  forecastedCost: number | null;
  alertThreshold: number;
  criticalThreshold: number;
  notifications: Array<NotificationRecord>;
  alertSent: boolean;
  nukeTriggered: boolean;
  nuke?: NukeSummary;
}
