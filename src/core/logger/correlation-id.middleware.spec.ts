import { Response } from 'express';
import {
  CorrelationIdMiddleware,
  RequestWithCorrelationId,
} from './correlation-id.middleware';

describe('CorrelationIdMiddleware', () => {
  const middleware = new CorrelationIdMiddleware();

  const run = (headers: Record<string, string | string[]>) => {
    const req = { headers } as unknown as RequestWithCorrelationId;
    const setHeader = jest.fn();
    const res = { setHeader } as unknown as Response;
    const next = jest.fn();

    middleware.use(req, res, next);

    return { req, setHeader, next };
  };

  it('should reuse the incoming correlation id', () => {
    const { req, setHeader, next } = run({
      'x-correlation-id': 'test-correlation-id',
    });

    expect(req.correlationId).toBe('test-correlation-id');
    expect(setHeader).toHaveBeenCalledWith(
      'x-correlation-id',
      'test-correlation-id',
    );
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should take the first value of a repeated header', () => {
    const { req } = run({ 'x-correlation-id': ['first-id', 'second-id'] });

    expect(req.correlationId).toBe('first-id');
  });

  it('should generate a uuid when none was sent', () => {
    const { req } = run({});

    expect(req.correlationId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
    expect(req.headers['x-correlation-id']).toBe(req.correlationId);
  });
});
