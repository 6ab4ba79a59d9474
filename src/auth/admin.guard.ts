import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'node:crypto';

type HeaderBag = Record<string, string | string[] | undefined>;

/**
 * Admin commands carry the operator token, either as `x-admin-token` or as a
 * Bearer token. Who the operator is lives outside this service.
 */
@Injectable()
export class AdminGuard implements CanActivate {
  private readonly logger = new Logger(AdminGuard.name);

  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<{ headers?: HeaderBag }>();
    const token = this.extractToken(request.headers ?? {});

    if (!token) {
      this.logger.warn('Admin request missing token');
      throw new UnauthorizedException('Missing admin token');
    }

    const expected = this.config.get<string>('admin.token');
    if (!expected) {
      this.logger.error('ADMIN_TOKEN is not set in environment');
      throw new UnauthorizedException('Server auth configuration error');
    }

    if (!sameToken(token, expected)) {
      this.logger.warn('Admin request with wrong token');
      throw new UnauthorizedException('Invalid admin token');
    }
    return true;
  }

  private extractToken(headers: HeaderBag): string | null {
    const direct = first(headers['x-admin-token']);
    if (direct?.trim()) return direct.trim();

    const auth = first(headers['authorization']);
    if (!auth || !auth.startsWith('Bearer ')) return null;
    return auth.slice(7).trim() || null;
  }
}

function first(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}
