import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';

@Injectable()
export class HttpLoggerMiddleware implements NestMiddleware {
  private logger = new Logger('HTTP');

  use(request: Request, response: Response, next: NextFunction): void {
    const { ip, method, originalUrl } = request;
    const userAgent = request.get('user-agent') || '';
    const start = Date.now();

    response.on('finish', () => {
      const { statusCode } = response;
      const contentLength = response.get('content-length');
      const duration = Date.now() - start;

      const line = `${method} ${originalUrl} ${statusCode} ${contentLength ?? '-'} - ${userAgent} ${ip} +${duration}ms`;
      if (statusCode >= 500) this.logger.error(line);
      else this.logger.log(line);
    });

    next();
  }
}
