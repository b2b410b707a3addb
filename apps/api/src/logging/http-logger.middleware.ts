import pinoHttp from "pino-http";
import type { Request, Response } from "express";
import { getApiEnv, isProductionEnvironment } from "../common/env";
import { rootLogger } from "./logger";
import { RequestContext } from "./request-context";

function resolveRouteLabel(req: Request) {
  const routePath = typeof req.route?.path === "string" ? req.route.path : undefined;
  if (routePath) {
    const base = typeof req.baseUrl === "string" ? req.baseUrl : "";
    return `${base}${routePath}`;
  }

  const rawPath = req.originalUrl?.split("?")[0] ?? req.url ?? "/";
  return rawPath.startsWith("/") ? rawPath : `/${rawPath}`;
}

export const httpLogger = pinoHttp<Request, Response>({
  logger: rootLogger,
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie"],
    censor: "[REDACTED]",
  },
  customAttributeKeys: {
    req: "request",
    res: "response",
    err: "error",
    responseTime: "durationMs",
  },
  autoLogging: {
    ignore: (req) => req.url?.startsWith("/health") ?? false,
  },
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) {
      return "error";
    }
    if (res.statusCode >= 400) {
      return "warn";
    }
    return isProductionEnvironment(getApiEnv().SENTRY_ENVIRONMENT) ? "silent" : "debug";
  },
  customProps: (req, res) => {
    const context = RequestContext.get();
    return {
      env: getApiEnv().SENTRY_ENVIRONMENT,
      requestId: context?.requestId,
      traceId: context?.traceId,
      spanId: context?.spanId,
      userId: context?.caller?.userId,
      role: context?.caller?.role,
      route: resolveRouteLabel(req),
      statusCode: res.statusCode,
    };
  },
});
