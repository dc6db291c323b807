import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import {
  CostAlerterSettings,
  CostCheckResult,
  CostCheckTrigger,
  CostLevel,
  NotificationKind,
  NotificationRecord,
  ThresholdPolicy,
} from '../interfaces';
import { fetchCostSnapshot } from './costs';
import { InventoryClients, listActiveResources } from './inventory';
import { buildAlert, buildCriticalAlert, buildDailySummary, buildNukeReport } from './messages';
import { NukeClients, runNukePass } from './nuke';
import { Notification, Notifier } from './ntfy';

export interface CostCheckDeps extends NukeClients, InventoryClients {
  costExplorer: CostExplorerClient;
  notify: Notifier;
}

/**
 * Place month-to-date spend against the two thresholds. Both bounds are inclusive.
 */
export function evaluateCost(cost: number, policy: ThresholdPolicy): CostLevel {
  if (cost >= policy.criticalThreshold) return 'critical';
  if (cost >= policy.alertThreshold) return 'alert';
  return 'ok';
}

/**
 * Work out what invoked the Lambda
 *
 * AWS Budgets reaches us through SNS, the daily check through an EventBridge
 * scheduled rule. Anything else is treated as a manual invoke.
 */
export function parseTrigger(event: unknown): CostCheckTrigger {
  if (typeof event !== 'object' || event === null) {
    return { source: 'manual' };
  }
  if ('Records' in event && Array.isArray(event.Records)) {
    const record: unknown = event.Records[0];
    if (
      typeof record === 'object' &&
      record !== null &&
      'Sns' in record &&
      typeof record.Sns === 'object' &&
      record.Sns !== null &&
      'Message' in record.Sns &&
      typeof record.Sns.Message === 'string'
    ) {
      const subject = 'Subject' in record.Sns && typeof record.Sns.Subject === 'string' ? record.Sns.Subject : undefined;
      return { source: 'budget', message: record.Sns.Message, ...(subject ? { subject } : {}) };
    }
  }
  if ('detail-type' in event && event['detail-type'] === 'Scheduled Event' && 'time' in event && typeof event.time === 'string') {
    return { source: 'schedule', time: event.time };
  }
  return { source: 'manual' };
}

/**
 * One cost check, start to finish
 *
 * Fetch, evaluate, notify, and at the critical level list the account's
 * active resources for the alert, then optionally run the nuke pass followed
 * by a report. A failed fetch propagates before any notification
 * is sent. Undelivered notifications are recorded, never thrown.
 *
 * @throws UpstreamUnavailableError if Cost Explorer cannot be read
 */
export async function runCostCheck(
  trigger: CostCheckTrigger,
  settings: CostAlerterSettings,
  deps: CostCheckDeps,
  now: Date = new Date()
): Promise<CostCheckResult> {
  const { policy } = settings;
  console.log(
    `Cost check running - Alert threshold: $${policy.alertThreshold}, Critical: $${policy.criticalThreshold}, trigger: ${trigger.source}`
  );

  const snapshot = await fetchCostSnapshot(deps.costExplorer, now);
  console.log(
    JSON.stringify({ currentCost: snapshot.total, forecast: snapshot.forecast, period: snapshot.period })
  );

  const level = evaluateCost(snapshot.total, policy);
  const notifications: NotificationRecord[] = [];
  const send = async (kind: NotificationKind, notification: Notification) => {
    const outcome = await deps.notify(notification);
    notifications.push({
      kind,
      title: notification.title,
      delivered: outcome.delivered,
      ...(outcome.delivered ? {} : { error: outcome.error }),
    });
  };

  const result: CostCheckResult = {
    trigger,
    level,
    currentCost: snapshot.total,
    forecastedCost: snapshot.forecast,
    alertThreshold: policy.alertThreshold,
    criticalThreshold: policy.criticalThreshold,
    notifications,
    alertSent: false,
    nukeTriggered: false,
  };

  switch (level) {
    case 'critical':
      console.log(`CRITICAL: Cost $${snapshot.total} exceeds critical threshold $${policy.criticalThreshold}`);
      const inventory = await listActiveResources(deps);
      await send('critical', buildCriticalAlert(snapshot, policy, trigger, inventory));
      result.alertSent = true;
      if (policy.enableAutoNuke) {
        result.nukeTriggered = true;
        result.nuke = await runNukePass(deps, { dryRun: policy.nukeDryRun, now });
        console.log(JSON.stringify({ nuke: { ...result.nuke, records: undefined } }));
        await send('nuke', buildNukeReport(result.nuke));
      }
      break;
    case 'alert':
      console.log(`ALERT: Cost $${snapshot.total} exceeds threshold $${policy.alertThreshold}`);
      await send('alert', buildAlert(snapshot, policy, trigger));
      result.alertSent = true;
      break;
    case 'ok':
      console.log(`Cost $${snapshot.total} is within threshold $${policy.alertThreshold}`);
      if (policy.sendDailySummary) {
        await send('summary', buildDailySummary(snapshot, policy, trigger));
      }
      break;
  }

  return result;
}
