import { EventEmitter } from 'events';
import { NextFunction, Request, Response } from 'express';
import { asyncHandler, createErrorHandler, requestTiming } from './http';
import { RequestMetrics } from '../metrics/RequestMetrics';
import { createKeyNotFoundError } from '../../shared/errors';
import { Logger, LogLevel } from '../../shared/logger';

interface MockResponse {
  status: jest.Mock;
  json: jest.Mock;
}

function mockResponse(): MockResponse {
  const res: MockResponse = { status: jest.fn(), json: jest.fn() };
  res.status.mockReturnValue(res);
  return res;
}

const req = {} as Request;

describe('http middleware', () => {
  describe('asyncHandler', () => {
    it('should pass a rejection to next', async () => {
      const failure = new Error('boom');
      const next = jest.fn();
      const handler = asyncHandler(async () => {
        throw failure;
      });

      handler(req, {} as Response, next);
      await new Promise((resolve) => setImmediate(resolve));

      expect(next).toHaveBeenCalledWith(failure);
    });
  });

  describe('requestTiming', () => {
    it('should count the request and record its duration on finish', () => {
      const metrics = new RequestMetrics();
      const res = new EventEmitter();
      const next = jest.fn();

      requestTiming(metrics)(req, res as unknown as Response, next);
      res.emit('finish');

      expect(next).toHaveBeenCalledTimes(1);
      expect(metrics.snapshot(0, 0).totalRequests).toBe(1);
      expect(metrics.averageResponseTime()).toBeGreaterThanOrEqual(0);
    });
  });

  describe('createErrorHandler', () => {
    let logger: Logger;
    let metrics: RequestMetrics;
    let errorSpy: jest.SpyInstance;
    const next: NextFunction = jest.fn();

    beforeEach(() => {
      logger = new Logger('Test', LogLevel.ERROR);
      errorSpy = jest.spyOn(logger, 'error').mockImplementation();
      metrics = new RequestMetrics();
    });

    it('should answer a GameError with its status and body', () => {
      const res = mockResponse();
      const error = createKeyNotFoundError('abc');

      createErrorHandler(logger, metrics)(error, req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: error.toJSON() });
      expect(metrics.snapshot(0, 0).errorCount).toBe(0);
    });

    it('should answer malformed JSON with INVALID_INPUT', () => {
      const res = mockResponse();

      createErrorHandler(logger, metrics)(new SyntaxError('Unexpected token'), req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: expect.objectContaining({ code: 'INVALID_INPUT', message: 'Malformed JSON body' }),
      });
    });

    it('should log, count and hide unexpected errors', () => {
      const res = mockResponse();
      const failure = new Error('database on fire');

      createErrorHandler(logger, metrics)(failure, req, res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({
        error: expect.objectContaining({ code: 'INTERNAL_ERROR', message: 'Internal server error' }),
      });
      expect(errorSpy).toHaveBeenCalledWith('Unhandled request error', failure);
      expect(metrics.snapshot(0, 0).errorCount).toBe(1);
    });
  });
});
