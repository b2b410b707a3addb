import { randomBytes, randomUUID } from "crypto";
import type { NextFunction, Request, Response } from "express";
import { RequestContext } from "./request-context";

const TRACEPARENT_VERSION = "00";
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i;

type Traceparent = { traceId: string; parentSpanId: string; traceFlags: string };

export function parseTraceparent(headerValue: string | undefined): Traceparent | null {
  if (!headerValue) {
    return null;
  }

  const match = TRACEPARENT_PATTERN.exec(headerValue.trim());
  if (!match) {
    return null;
  }

  const [, , traceId, parentSpanId, traceFlags] = match.map((part) => part.toLowerCase());
  if (/^0+$/.test(traceId) || /^0+$/.test(parentSpanId)) {
    return null;
  }

  return { traceId, parentSpanId, traceFlags };
}

function resolveClientIp(req: Request) {
  const forwardedFor = req.headers["x-forwarded-for"];
  const forwarded = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  const first = forwarded?.split(",")[0]?.trim();
  return first && first.length > 0 ? first : req.ip ?? req.socket?.remoteAddress;
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const headerId = req.header("x-request-id");
  const requestId = headerId && headerId.length > 0 ? headerId : randomUUID();
  res.setHeader("x-request-id", requestId);

  const incoming = parseTraceparent(req.header("traceparent"));
  const traceId = incoming?.traceId ?? randomBytes(16).toString("hex");
  const spanId = randomBytes(8).toString("hex");
  const traceFlags = incoming?.traceFlags ?? "01";
  res.setHeader("x-trace-id", traceId);
  res.setHeader("traceparent", `${TRACEPARENT_VERSION}-${traceId}-${spanId}-${traceFlags}`);

  const userAgent = req.get("user-agent") || undefined;

  RequestContext.run({ requestId, traceId, spanId, ip: resolveClientIp(req), userAgent }, () => {
    next();
  });
}
