import { Injectable, Logger, NestMiddleware, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NextFunction, Request } from 'express';

type KeyedRequest = Pick<Request, 'headers' | 'query' | 'method' | 'originalUrl'>;

/**
 * Shared-secret check between the media server and this service. Disabled
 * when API_KEY is not configured.
 */
@Injectable()
export class AuthMiddleware implements NestMiddleware {
  private readonly logger = new Logger(AuthMiddleware.name);
  private readonly apiKey: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('API_KEY');
  }

  use(req: KeyedRequest, _res: unknown, next: NextFunction): void {
    if (!this.apiKey) {
      next();
      return;
    }

    const headerKey = req.headers['x-api-key'];
    const providedKey = typeof headerKey === 'string' ? headerKey : req.query['api_key'];

    if (providedKey !== this.apiKey) {
      this.logger.warn(`Rejected ${req.method} ${req.originalUrl}: missing or invalid API key`);
      throw new UnauthorizedException('Invalid API key');
    }

    next();
  }
}
