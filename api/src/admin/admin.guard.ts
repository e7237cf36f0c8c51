import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import type { Request } from 'express';
import type { EnvConfig } from '../config/env.validation';

const BEARER_PREFIX = 'Bearer ';

/**
 * Admin routes are for organizers' tooling, not end users. Access is a
 * single shared token sent as `Authorization: Bearer <ADMIN_API_TOKEN>`.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers.authorization;

    if (!header?.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedException('Admin token required');
    }

    const expected = this.configService.get('ADMIN_API_TOKEN', { infer: true });
    if (!tokensMatch(header.slice(BEARER_PREFIX.length), expected)) {
      throw new UnauthorizedException('Invalid admin token');
    }

    return true;
  }
}

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  // timingSafeEqual throws on length mismatch
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
