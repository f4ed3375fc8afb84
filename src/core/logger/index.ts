export { LoggerModule } from './logger.module';
export { CorrelationIdMiddleware } from './correlation-id.middleware';
export type { RequestWithCorrelationId } from './correlation-id.middleware';
export {
  createPinoConfig,
  firstHeaderValue,
  CORRELATION_ID_HEADER,
  SERVICE_NAME,
} from './pino.config';
