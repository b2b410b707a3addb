import "reflect-metadata";
import "dotenv/config";
import { NestFactory } from "@nestjs/core";
import * as Sentry from "@sentry/node";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { getApiEnv, isProductionEnvironment } from "./common/env";
import { rootLogger } from "./logging/logger";

function defaultSentryTraceSampleRate(environment: string) {
  if (isProductionEnvironment(environment)) {
    return 0.05;
  }
  const normalized = environment.trim().toLowerCase();
  if (normalized === "staging" || normalized === "stage") {
    return 0.2;
  }
  return 1;
}

async function bootstrap() {
  const env = getApiEnv();
  const sentryRelease = env.SENTRY_RELEASE || `api@${process.env.npm_package_version ?? "local-dev"}`;
  Sentry.init({
    dsn: env.SENTRY_DSN || undefined,
    environment: env.SENTRY_ENVIRONMENT,
    release: sentryRelease,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE ?? defaultSentryTraceSampleRate(env.SENTRY_ENVIRONMENT),
    initialScope: (scope) => {
      scope.setTag("service", "api");
      scope.setTag("release", sentryRelease);
      return scope;
    },
  });

  const app = await NestFactory.create(AppModule);
  configureApp(app);
  app.enableShutdownHooks();

  await app.listen(env.API_PORT);
  rootLogger.info({ port: env.API_PORT }, "API listening");
}

bootstrap().catch((err: unknown) => {
  rootLogger.fatal({ err }, "API failed to start");
  process.exit(1);
});
