import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CORRELATION_ID_HEADER, firstHeaderValue } from './pino.config';

export interface RequestWithCorrelationId extends Request {
  correlationId?: string;
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: RequestWithCorrelationId, res: Response, next: NextFunction) {
    const correlationId =
      firstHeaderValue(req.headers[CORRELATION_ID_HEADER]) ?? uuidv4();

    req.correlationId = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    // Downstream handlers read it from the headers as well
    req.headers[CORRELATION_ID_HEADER] = correlationId;

    next();
  }
}
