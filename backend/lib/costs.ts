import {
  CostExplorerClient,
  DataUnavailableException,
  GetCostAndUsageCommand,
  GetCostAndUsageCommandOutput,
  GetCostForecastCommand,
} from '@aws-sdk/client-cost-explorer';
import { BillingPeriod, CostSnapshot, ServiceCost } from '../interfaces';
import { UpstreamUnavailableError, errorMessage } from './errors';

const DAY_MS = 24 * 60 * 60 * 1000;

function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * First of the current UTC month up to (excluding) tomorrow
 */
export function monthToDatePeriod(now: Date): BillingPeriod {
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const tomorrow = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) + DAY_MS);
  return { start: toDateString(start), end: toDateString(tomorrow) };
}

/**
 * Days of the current month still ahead: tomorrow up to the first of next month
 * @returns undefined on the last day of the month
 */
export function remainingMonthPeriod(now: Date): BillingPeriod | undefined {
  const tomorrow = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) + DAY_MS);
  const nextMonth = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
  if (tomorrow.getTime() >= nextMonth.getTime()) {
    return undefined;
  }
  return { start: toDateString(tomorrow), end: toDateString(nextMonth) };
}

/**
 * Read month-to-date spend per service and the month-end forecast
 *
 * Forecast = month-to-date + Cost Explorer's forecast for the remaining days.
 * A DataUnavailableException on the forecast (accounts with too little
 * history) gives a null forecast; any other failure aborts.
 *
 * @throws UpstreamUnavailableError if either Cost Explorer call fails
 */
export async function fetchCostSnapshot(client: CostExplorerClient, now: Date): Promise<CostSnapshot> {
  const period = monthToDatePeriod(now);
  const byService = new Map<string, number>();
  let currency = 'USD';

  try {
    let nextPageToken: string | undefined;
    do {
      const response: GetCostAndUsageCommandOutput = await client.send(
        new GetCostAndUsageCommand({
          TimePeriod: { Start: period.start, End: period.end },
          Granularity: 'MONTHLY',
          Metrics: ['UnblendedCost'],
          GroupBy: [{ Type: 'DIMENSION', Key: 'SERVICE' }],
          NextPageToken: nextPageToken,
        })
      );
      for (const result of response.ResultsByTime ?? []) {
        for (const group of result.Groups ?? []) {
          const service = group.Keys?.[0] ?? 'Unknown';
          const metric = group.Metrics?.UnblendedCost;
          const amount = parseFloat(metric?.Amount ?? '0');
          currency = metric?.Unit ?? currency;
          byService.set(service, (byService.get(service) ?? 0) + (isNaN(amount) ? 0 : amount));
        }
      }
      nextPageToken = response.NextPageToken;
    } while (nextPageToken);
  } catch (error) {
    throw new UpstreamUnavailableError(`Cost Explorer GetCostAndUsage failed: ${errorMessage(error)}`, error);
  }

  const services: ServiceCost[] = [...byService.entries()]
    .map(([service, amount]) => ({ service, amount }))
    .sort((a, b) => b.amount - a.amount);
  const total = roundCents(services.reduce((sum, s) => sum + s.amount, 0));

  return {
    total,
    forecast: await fetchMonthEndForecast(client, now, total),
    currency,
    period,
    services,
  };
}

async function fetchMonthEndForecast(
  client: CostExplorerClient,
  now: Date,
  monthToDate: number
): Promise<number | null> {
  const remaining = remainingMonthPeriod(now);
  if (!remaining) {
    return monthToDate;
  }
  try {
    const response = await client.send(
      new GetCostForecastCommand({
        TimePeriod: { Start: remaining.start, End: remaining.end },
        Metric: 'UNBLENDED_COST',
        Granularity: 'MONTHLY',
      })
    );
    const amount = parseFloat(response.Total?.Amount ?? '');
    return isNaN(amount) ? null : roundCents(monthToDate + amount);
  } catch (error) {
    if (error instanceof DataUnavailableException) {
      console.log(`Could not get forecast: ${error.message}`);
      return null;
    }
    throw new UpstreamUnavailableError(`Cost Explorer GetCostForecast failed: ${errorMessage(error)}`, error);
  }
}
