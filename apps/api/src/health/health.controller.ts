import { Controller, Get, ServiceUnavailableException } from "@nestjs/common";
import { ErrorCodes } from "@rentledger/shared";
import { DatabaseService } from "../db/database.service";
import { createLogger } from "../logging/logger";

const logger = createLogger("health");

@Controller("health")
export class HealthController {
  constructor(private readonly database: DatabaseService) {}

  @Get()
  async health() {
    try {
      await this.database.ping();
    } catch (err) {
      logger.error({ err }, "Database ping failed");
      throw new ServiceUnavailableException({
        code: ErrorCodes.SERVICE_UNAVAILABLE,
        message: "Database unavailable",
        hint: "The service is starting or its database is down. Retry shortly.",
      });
    }
    return { status: "ok", database: "up" };
  }
}
