import { CostCheckTrigger, CostSnapshot, NukeSummary, ResourceCount, ServiceCost, ThresholdPolicy } from '../interfaces';
import { Notification } from './ntfy';

function usd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * Bullet list of the most expensive services, leaving out anything under a cent
 */
export function formatTopServices(services: ServiceCost[], topN = 5): string {
  const lines = [...services]
    .sort((a, b) => b.amount - a.amount)
    .slice(0, topN)
    .filter((s) => s.amount > 0.01)
    .map((s) => `  - ${s.service}: ${usd(s.amount)}`);
  return lines.length > 0 ? lines.join('\n') : '  (No significant costs yet)';
}

/**
 * Inventory lines for the critical alert. Empty kinds are left out; a kind
 * that could not be listed is shown as unavailable.
 */
export function formatInventory(inventory: ResourceCount[]): string {
  const lines = inventory
    .filter((r) => r.count !== 0)
    .map((r) => `  - ${r.label}: ${r.count === null ? 'unavailable' : r.count}`);
  return lines.length > 0 ? lines.join('\n') : '  (none found)';
}

export function describeTrigger(trigger: CostCheckTrigger): string {
  switch (trigger.source) {
    case 'schedule':
      return `Trigger: scheduled check (${trigger.time})`;
    case 'budget':
      return `Trigger: AWS Budgets${trigger.subject ? ` (${trigger.subject})` : ''}`;
    case 'manual':
      return 'Trigger: manual invocation';
  }
}

function forecastLine(snapshot: CostSnapshot): string {
  return snapshot.forecast === null
    ? 'Forecasted month-end cost: unavailable'
    : `Forecasted month-end cost: ${usd(snapshot.forecast)}`;
}

export function buildDailySummary(
  snapshot: CostSnapshot,
  policy: ThresholdPolicy,
  trigger: CostCheckTrigger
): Notification {
  return {
    title: `AWS Cost Summary: ${usd(snapshot.total)}`,
    priority: 'low',
    tags: ['chart_with_upwards_trend', 'white_check_mark'],
    message: [
      'AWS Daily Cost Summary',
      '',
      `Current spending: ${usd(snapshot.total)} ${snapshot.currency}`,
      `Alert threshold: ${usd(policy.alertThreshold)} ${snapshot.currency}`,
      forecastLine(snapshot),
      '',
      'Top services:',
      formatTopServices(snapshot.services),
      '',
      'All costs within limits.',
      describeTrigger(trigger),
    ].join('\n'),
  };
}

export function buildAlert(
  snapshot: CostSnapshot,
  policy: ThresholdPolicy,
  trigger: CostCheckTrigger
): Notification {
  return {
    title: `AWS Cost Alert: ${usd(snapshot.total)}`,
    priority: 'high',
    tags: ['warning', 'dollar'],
    message: [
      'AWS Cost Alert',
      '',
      `Current spending: ${usd(snapshot.total)} ${snapshot.currency}`,
      `Alert threshold: ${usd(policy.alertThreshold)} ${snapshot.currency}`,
      `Period: ${snapshot.period.start} to ${snapshot.period.end}`,
      forecastLine(snapshot),
      '',
      'Top services by cost:',
      formatTopServices(snapshot.services),
      '',
      'Review your AWS resources to control costs.',
      describeTrigger(trigger),
    ].join('\n'),
  };
}

export function buildCriticalAlert(
  snapshot: CostSnapshot,
  policy: ThresholdPolicy,
  trigger: CostCheckTrigger,
  inventory: ResourceCount[]
): Notification {
  const nukeLine = !policy.enableAutoNuke
    ? 'Auto-nuke is DISABLED. Review and terminate unnecessary resources manually.'
    : policy.nukeDryRun
      ? 'Auto-nuke is enabled in DRY RUN mode: resources will be listed, not touched.'
      : 'Auto-nuke is ENABLED: untagged instances and databases will be stopped, resources tagged CanNuke=true terminated.';

  return {
    title: 'CRITICAL: AWS Cost Emergency',
    priority: 'urgent',
    tags: ['rotating_light', 'dollar', 'skull'],
    message: [
      'CRITICAL COST ALERT!',
      '',
      `Current AWS spending: ${usd(snapshot.total)} ${snapshot.currency}`,
      `Critical threshold: ${usd(policy.criticalThreshold)} ${snapshot.currency}`,
      `Period: ${snapshot.period.start} to ${snapshot.period.end}`,
      forecastLine(snapshot),
      '',
      'Top services by cost:',
      formatTopServices(snapshot.services),
      '',
      'Active resources that may be nuked:',
      formatInventory(inventory),
      '',
      nukeLine,
      describeTrigger(trigger),
    ].join('\n'),
  };
}

export function buildNukeReport(summary: NukeSummary): Notification {
  const lines = summary.records
    .filter((r) => r.outcome !== 'skipped')
    .map((r) => `  - ${r.outcome} ${r.kind} ${r.id}${r.error ? `: ${r.error}` : ''}`);

  const counts = summary.dryRun
    ? `Would stop: ${summary.wouldStop}, would terminate: ${summary.wouldTerminate}, skipped: ${summary.skipped}, failed: ${summary.failed}`
    : `Stopped: ${summary.stopped}, terminated: ${summary.terminated}, skipped: ${summary.skipped}, failed: ${summary.failed}`;

  return {
    title: summary.dryRun ? 'Nuke DRY RUN' : 'Resource Nuke Complete',
    priority: summary.dryRun ? 'high' : 'urgent',
    tags: summary.dryRun ? ['test_tube', 'warning'] : ['skull', 'check'],
    message: [
      summary.dryRun ? 'DRY RUN - no resource was changed' : 'NUKE EXECUTED',
      '',
      counts,
      '',
      'Resources:',
      lines.length > 0 ? lines.join('\n') : '  (none)',
      '',
      summary.dryRun
        ? 'Set NUKE_DRY_RUN=false to actually stop and terminate resources.'
        : 'Please verify the changes in your AWS console.',
    ].join('\n'),
  };
}
