import { Catch, HttpException, HttpStatus, type ArgumentsHost, type ExceptionFilter } from "@nestjs/common";
import type { Request, Response } from "express";
import { ErrorCodes, type ApiError, type ErrorCode } from "@rentledger/shared";
import * as Sentry from "@sentry/node";
import { createLogger } from "../logging/logger";
import { RequestContext } from "../logging/request-context";

const capturedErrors = new WeakSet<object>();
const errorCodeValues = new Set<string>(Object.values(ErrorCodes));
const logger = createLogger("http");

type ErrorTags = {
  requestId?: string;
  traceId?: string;
  spanId?: string;
  userId?: string;
  role?: string;
  method?: string;
  route?: string;
};

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const context = RequestContext.get();
    const requestId = context?.requestId;

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code: ErrorCode | undefined;
    let message = "Internal server error";
    let details: unknown = undefined;
    let hint: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const payload = exception.getResponse();
      if (typeof payload === "string") {
        message = payload;
      } else if (typeof payload === "object" && payload !== null) {
        if ("code" in payload && this.isErrorCode(payload.code)) {
          code = payload.code;
        }
        if ("message" in payload) {
          if (typeof payload.message === "string") {
            message = payload.message;
          } else if (Array.isArray(payload.message)) {
            message = payload.message.filter((item) => typeof item === "string").join(", ") || message;
          }
        }
        if ("details" in payload && payload.details !== undefined) {
          details = payload.details;
        }
        if ("hint" in payload && typeof payload.hint === "string") {
          hint = payload.hint;
        }
      }
    }

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR && !code) {
      this.captureException(exception, {
        requestId,
        traceId: context?.traceId,
        spanId: context?.spanId,
        userId: context?.caller?.userId,
        role: context?.caller?.role,
        method: request?.method,
        route: request?.originalUrl ?? request?.url,
      });
      logger.error({ err: exception, status }, "Unhandled exception");
    }

    const body: ApiError = {
      ok: false,
      error: {
        code: code ?? this.mapStatusToCode(status),
        message,
        details,
        hint: hint ?? this.mapStatusToHint(status),
      },
      requestId,
    };

    response.status(status).json(body);
  }

  private captureException(exception: unknown, tags: ErrorTags) {
    if (typeof exception !== "object" || exception === null) {
      Sentry.captureException(exception);
      return;
    }

    if (capturedErrors.has(exception)) {
      return;
    }
    capturedErrors.add(exception);

    Sentry.withScope((scope) => {
      for (const [key, value] of Object.entries(tags)) {
        if (value) {
          scope.setTag(key, value);
        }
      }
      Sentry.captureException(exception);
    });
  }

  private isErrorCode(value: unknown): value is ErrorCode {
    return typeof value === "string" && errorCodeValues.has(value);
  }

  private mapStatusToCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCodes.VALIDATION_ERROR;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCodes.UNAUTHORIZED;
      case HttpStatus.FORBIDDEN:
        return ErrorCodes.FORBIDDEN;
      case HttpStatus.NOT_FOUND:
        return ErrorCodes.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCodes.CONFLICT;
      case HttpStatus.TOO_MANY_REQUESTS:
        return ErrorCodes.RATE_LIMITED;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ErrorCodes.SERVICE_UNAVAILABLE;
      default:
        return ErrorCodes.INTERNAL_SERVER_ERROR;
    }
  }

  private mapStatusToHint(status: number) {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return "Check the request fields and try again.";
      case HttpStatus.UNAUTHORIZED:
        return "Please sign in again.";
      case HttpStatus.FORBIDDEN:
        return "You do not have access to this action.";
      case HttpStatus.NOT_FOUND:
        return "Check the link or refresh and try again.";
      case HttpStatus.CONFLICT:
        return "Refresh and retry. This may have already been processed.";
      case HttpStatus.TOO_MANY_REQUESTS:
        return "Slow down and retry shortly.";
      default:
        return "Please try again. If this keeps happening, contact support.";
    }
  }
}
