import type { CallHandler, ExecutionContext } from '@nestjs/common';
import { NotFoundException } from '@nestjs/common';
import { lastValueFrom, of, throwError } from 'rxjs';
import { PerfLoggingInterceptor } from './perf-logging.interceptor';
import * as perfLogger from './perf-logger';

describe('PerfLoggingInterceptor', () => {
  const interceptor = new PerfLoggingInterceptor();
  let perfLogSpy: jest.SpyInstance;

  const makeContext = (statusCode = 200) =>
    ({
      getType: () => 'http',
      switchToHttp: () => ({
        getRequest: () => ({ method: 'GET', path: '/admin/events' }),
        getResponse: () => ({ statusCode }),
      }),
    }) as unknown as ExecutionContext;

  beforeEach(() => {
    perfLogSpy = jest.spyOn(perfLogger, 'perfLog').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass through untouched when DEBUG is off', async () => {
    jest.spyOn(perfLogger, 'isPerfEnabled').mockReturnValue(false);
    const handler: CallHandler = { handle: () => of('ok') };

    await expect(
      lastValueFrom(interceptor.intercept(makeContext(), handler)),
    ).resolves.toBe('ok');
    expect(perfLogSpy).not.toHaveBeenCalled();
  });

  it('should log method, path and status', async () => {
    jest.spyOn(perfLogger, 'isPerfEnabled').mockReturnValue(true);
    const handler: CallHandler = { handle: () => of('ok') };

    await lastValueFrom(interceptor.intercept(makeContext(201), handler));

    expect(perfLogSpy).toHaveBeenCalledWith(
      'HTTP',
      'GET /admin/events',
      expect.any(Number),
      { status: 201 },
    );
  });

  it('should log the status of a failed request', async () => {
    jest.spyOn(perfLogger, 'isPerfEnabled').mockReturnValue(true);
    const handler: CallHandler = {
      handle: () => throwError(() => new NotFoundException()),
    };

    await expect(
      lastValueFrom(interceptor.intercept(makeContext(), handler)),
    ).rejects.toBeInstanceOf(NotFoundException);
    expect(perfLogSpy).toHaveBeenCalledWith(
      'HTTP',
      'GET /admin/events',
      expect.any(Number),
      { status: 404 },
    );
  });
});
