import { Injectable, type CallHandler, type ExecutionContext, type NestInterceptor } from "@nestjs/common";
import type { ApiSuccess } from "@rentledger/shared";
import { Observable } from "rxjs";
import { map } from "rxjs/operators";
import { RequestContext } from "../logging/request-context";

@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiSuccess<T>> {
  intercept(_context: ExecutionContext, next: CallHandler<T>): Observable<ApiSuccess<T>> {
    return next.handle().pipe(
      map((data) => ({
        ok: true as const,
        data,
        requestId: RequestContext.get()?.requestId,
      })),
    );
  }
}
