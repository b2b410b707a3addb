import pino, { type Logger } from "pino";
import { isProductionEnvironment } from "../common/env";
import { RequestContext } from "./request-context";

function resolveLevel() {
  const configured = process.env.LOG_LEVEL;
  if (configured) {
    return configured;
  }
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return isProductionEnvironment(process.env.SENTRY_ENVIRONMENT ?? "development") ? "info" : "debug";
}

export const rootLogger: Logger = pino({
  level: resolveLevel(),
  base: { service: "api" },
  mixin() {
    const context = RequestContext.get();
    if (!context) {
      return {};
    }
    return {
      requestId: context.requestId,
      traceId: context.traceId,
      userId: context.caller?.userId,
    };
  },
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
