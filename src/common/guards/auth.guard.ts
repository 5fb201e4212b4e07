import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import {
  AuthenticatedRequest,
  CurrentUserData,
} from '../decorators/current-user.decorator';

/** Claims issued by the identity service */
interface AccessTokenClaims {
  sub: string;
  email?: string;
  role?: string;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Guards the customer-facing booking routes. A missing or unverifiable
 * bearer token is a 401 and a `[SECURITY]` warning.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private readonly logger = new Logger(AuthGuard.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers.authorization ?? '';

    if (!header.startsWith(BEARER_PREFIX)) {
      throw this.reject(request, 'TOKEN_MISSING', 'Authentication token is required');
    }

    const secret = this.configService.get<string>('JWT_SECRET');
    if (!secret) {
      this.logger.error('JWT_SECRET is not configured');
      throw this.reject(request, 'TOKEN_INVALID', 'Invalid or expired authentication token');
    }

    try {
      const claims = await this.jwtService.verifyAsync<AccessTokenClaims>(
        header.slice(BEARER_PREFIX.length).trim(),
        { secret },
      );
      request.user = this.toCaller(claims);
    } catch (error) {
      throw this.reject(
        request,
        'TOKEN_INVALID',
        'Invalid or expired authentication token',
        error instanceof Error ? error.message : String(error),
      );
    }

    return true;
  }

  private toCaller(claims: AccessTokenClaims): CurrentUserData {
    return { id: claims.sub, email: claims.email, role: claims.role ?? 'user' };
  }

  private reject(
    request: AuthenticatedRequest,
    errorCode: 'TOKEN_MISSING' | 'TOKEN_INVALID',
    message: string,
    reason?: string,
  ): UnauthorizedException {
    this.logger.warn(`[SECURITY] AUTH_${errorCode}`, {
      method: request.method,
      path: request.url,
      ip: request.ip ?? 'unknown',
      ...(reason ? { reason } : {}),
    });
    return new UnauthorizedException({
      statusCode: 401,
      errorCode,
      message,
      timestamp: new Date().toISOString(),
    });
  }
}
