/**
 * CostSnapshot Interface
 *
 * Month-to-date spend as reported by Cost Explorer for a single invocation.
 * `forecast` is the projected month-end total, or null when Cost Explorer has
 * too little history to forecast.
 */
export interface CostSnapshot {
  total: number;
  forecast: number | null;
  currency: string;
  period: BillingPeriod;
  services: Array<ServiceCost>;
}

/**
 * Half-open date range, `YYYY-MM-DD` strings as Cost Explorer expects them.
 */
export interface BillingPeriod {
  start: string;
  end: string;
}

/**
 * ServiceCost Interface
 *
 * @see {@link CostSnapshot}
 */
export interface ServiceCost {
  service: string;
  amount: number;
}
