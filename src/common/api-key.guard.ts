import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { timingSafeEqual } from 'crypto';
import { AppConfig } from '../config/configuration';

export const API_KEY_HEADER = 'x-api-key';

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Admin HTTP API access. With no ADMIN_API_KEY configured every request is refused. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.apiKey = configService.get('http', { infer: true }).adminApiKey;
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const given = request.headers[API_KEY_HEADER];

    if (!this.apiKey) {
      this.logger.warn(`Rejected ${request.method} ${request.url}: ADMIN_API_KEY is not configured`);
      throw new UnauthorizedException('Admin API is disabled');
    }
    if (typeof given !== 'string' || !sameKey(given, this.apiKey)) {
      throw new UnauthorizedException('Invalid API key');
    }
    return true;
  }
}
