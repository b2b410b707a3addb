import { Injectable } from "@nestjs/common";

@Injectable()
export class BillingClock {
  now() {
    return new Date();
  }
}

/** ISO calendar date (UTC) used for payment, receipt and due dates. */
export const toIsoDate = (at: Date) => at.toISOString().slice(0, 10);
