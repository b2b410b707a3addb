import { getApiEnv } from "../../common/env";

export const BILLING_OPTIONS = Symbol("BILLING_OPTIONS");

export type BillingOptions = {
  /** How many times a unit of work is re-run after a transient failure. */
  transientRetryLimit: number;
};

export const billingOptionsFromEnv = (): BillingOptions => ({
  transientRetryLimit: getApiEnv().BILLING_TRANSIENT_RETRY_LIMIT,
});
