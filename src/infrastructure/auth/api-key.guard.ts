import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from './public.decorator';

export const API_KEY_HEADER = 'x-api-key';

interface KeyedRequest {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

/**
 * Guard que valida el header x-api-key contra la variable API_KEY.
 *
 * Todos los endpoints son protegidos por defecto.
 * Usa @Public() para excluir un endpoint (ej: /health).
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(
    private readonly config: ConfigService,
    private readonly reflector: Reflector,
  ) {
    this.apiKey = this.config.get<string>('API_KEY', '');
    if (!this.apiKey) {
      this.logger.warn('⚠️  API_KEY no configurada — todos los requests protegidos serán rechazados.');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<KeyedRequest>();
    const header = request.headers[API_KEY_HEADER];
    const key = Array.isArray(header) ? header[0] : header;

    if (!this.apiKey) {
      throw new UnauthorizedException('API_KEY no configurada en el servidor');
    }

    if (!key) {
      throw new UnauthorizedException(`Header ${API_KEY_HEADER} requerido`);
    }

    if (key !== this.apiKey) {
      this.logger.warn(`🚫 API Key inválida desde ${request.ip ?? 'desconocido'}`);
      throw new UnauthorizedException('API Key inválida');
    }

    return true;
  }
}
