import type { INestApplication } from "@nestjs/common";
import * as Sentry from "@sentry/node";
import cookieParser from "cookie-parser";
import type { NextFunction, Request, Response } from "express";
import helmet from "helmet";
import { getApiEnv } from "./common/env";
import { HttpErrorFilter } from "./common/http-exception.filter";
import { ResponseInterceptor } from "./common/response.interceptor";
import { httpLogger } from "./logging/http-logger.middleware";
import { RequestContext } from "./logging/request-context";
import { requestContextMiddleware } from "./logging/request-context.middleware";

/** Middleware, filters and interceptors shared by the server and the HTTP tests. */
export function configureApp(app: INestApplication) {
  const env = getApiEnv();

  app.use(cookieParser());
  app.use(requestContextMiddleware);
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const context = RequestContext.get();
    const scope = Sentry.getCurrentScope();
    scope.setTag("path", req.path);
    if (context?.requestId) {
      scope.setTag("requestId", context.requestId);
    }
    if (context?.traceId) {
      scope.setTag("traceId", context.traceId);
    }
    next();
  });
  app.use(httpLogger);
  app.use(helmet());
  app.useGlobalFilters(new HttpErrorFilter());
  app.useGlobalInterceptors(new ResponseInterceptor());
  app.enableCors({
    origin: env.API_CORS_ORIGIN,
    credentials: true,
  });
  return app;
}
