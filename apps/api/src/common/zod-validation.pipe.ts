import { BadRequestException, Injectable, type PipeTransform } from "@nestjs/common";
import type { ZodType, ZodTypeDef } from "zod";
import { ErrorCodes } from "@rentledger/shared";

@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const { formErrors, fieldErrors } = result.error.flatten();
      throw new BadRequestException({
        code: ErrorCodes.VALIDATION_ERROR,
        message: "Validation failed",
        hint: "Fix the highlighted fields and resubmit.",
        details: formErrors.length > 0 ? { formErrors, fieldErrors } : fieldErrors,
      });
    }
    return result.data;
  }
}
