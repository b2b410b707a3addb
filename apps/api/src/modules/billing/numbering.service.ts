import { Injectable } from "@nestjs/common";
import {
  buildAutoReference,
  formatSequentialNumber,
  type NumberingKind,
  type SequentialNumberingKind,
} from "../../common/numbering";
import type { BillingUnitOfWork } from "./billing.store";

@Injectable()
export class NumberingService {
  /** Receipt and invoice numbers, dense within a period. */
  async nextSequentialNumber(uow: BillingUnitOfWork, kind: SequentialNumberingKind, periodKey: string) {
    const sequence = await uow.nextSequence(kind, periodKey);
    return formatSequentialNumber(kind, periodKey, sequence);
  }

  generateReferenceNumber(at: Date) {
    return buildAutoReference(at);
  }

  async nextReference(uow: BillingUnitOfWork, kind: NumberingKind, periodKey: string, at: Date) {
    if (kind === "payment") {
      return this.generateReferenceNumber(at);
    }
    return this.nextSequentialNumber(uow, kind, periodKey);
  }
}
