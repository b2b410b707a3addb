import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Request } from "express";
import type { CallerIdentity } from "@rentledger/shared";
import { authTokenPayloadSchema, toCallerIdentity } from "./auth.types";
import { RequestContext } from "../logging/request-context";
import { getApiEnv } from "../common/env";

export type AuthenticatedRequest = Request & { caller?: CallerIdentity };

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  canActivate(context: ExecutionContext) {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers?.authorization;
    if (!header) {
      throw new UnauthorizedException("Missing authorization header");
    }
    const token = header.replace(/^Bearer\s+/i, "").trim();
    if (!token) {
      throw new UnauthorizedException("Missing bearer token");
    }

    let claims: unknown;
    try {
      claims = this.jwtService.verify<Record<string, unknown>>(token, {
        secret: getApiEnv().API_JWT_SECRET,
      });
    } catch {
      throw new UnauthorizedException("Invalid token");
    }

    const parsed = authTokenPayloadSchema.safeParse(claims);
    if (!parsed.success) {
      throw new UnauthorizedException("Token is missing caller claims");
    }

    const caller = toCallerIdentity(parsed.data);
    request.caller = caller;
    RequestContext.setCaller(caller);
    return true;
  }
}
