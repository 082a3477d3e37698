import { type ArgumentsHost, BadRequestException, HttpException, NotFoundException } from '@nestjs/common';
import {
  AuthorizationError,
  ConfigurationError,
  DownstreamError,
  ValidationError
} from '../../../src/common/errors/catalog-errors';
import { describeException, HttpErrorFilter } from '../../../src/common/filters/http-error.filter';
import { fakeLogger } from '../../support/fixtures';

describe('describeException', () => {
  it('reports every validation violation', () => {
    const error = new ValidationError([
      { field: 'title', message: 'Title cannot be empty.' },
      { field: 'publicationYear', message: 'Publication year must be a whole number.' }
    ]);

    expect(describeException(error)).toEqual({
      statusCode: 400,
      errorCode: 'VALIDATION_FAILED',
      message: 'Validation failed',
      violations: [
        { field: 'title', message: 'Title cannot be empty.' },
        { field: 'publicationYear', message: 'Publication year must be a whole number.' }
      ]
    });
  });

  it('maps authorization reasons to 401 and 403', () => {
    expect(describeException(new AuthorizationError('unauthenticated', 'book:view'))).toEqual({
      statusCode: 401,
      errorCode: 'UNAUTHENTICATED',
      message: 'Unauthorized'
    });
    expect(describeException(new AuthorizationError('forbidden', 'book:delete'))).toEqual({
      statusCode: 403,
      errorCode: 'FORBIDDEN',
      message: 'Forbidden'
    });
  });

  it('passes configuration messages through', () => {
    expect(describeException(new ConfigurationError('Unknown role: Ghosts'))).toEqual({
      statusCode: 400,
      errorCode: 'INVALID_CONFIGURATION',
      message: 'Unknown role: Ghosts'
    });
  });

  it('hides downstream causes and unknown errors behind a 500', () => {
    const downstream = new DownstreamError('Book repository failed', { cause: new Error('connection string leaked') });

    expect(describeException(downstream)).toEqual({
      statusCode: 500,
      errorCode: 'INTERNAL',
      message: 'Internal Server Error'
    });
    expect(describeException('thrown string')).toEqual({
      statusCode: 500,
      errorCode: 'INTERNAL',
      message: 'Internal Server Error'
    });
  });

  it('replaces framework messages with generic ones', () => {
    expect(describeException(new BadRequestException('Unexpected token < in JSON'))).toEqual({
      statusCode: 400,
      errorCode: 'BAD_REQUEST',
      message: 'Bad Request'
    });
    expect(describeException(new NotFoundException('Cannot GET /secret'))).toEqual({
      statusCode: 404,
      errorCode: 'NOT_FOUND',
      message: 'Not Found'
    });
    expect(describeException(new HttpException('too large', 413))).toEqual({
      statusCode: 413,
      errorCode: 'BAD_REQUEST',
      message: 'Request Failed'
    });
  });
});

describe('HttpErrorFilter', () => {
  function httpHost(request: Record<string, unknown>) {
    const response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
    const host = {
      switchToHttp: () => ({ getResponse: () => response, getRequest: () => request })
    } as unknown as ArgumentsHost;
    return { host, response };
  }

  it('writes the error body without the query string', () => {
    const { logger, asLogger } = fakeLogger();
    const { host, response } = httpHost({ originalUrl: '/books/42?token=abc', url: '/books/42?token=abc', requestId: 'req-1' });

    new HttpErrorFilter(asLogger).catch(new AuthorizationError('forbidden', 'book:edit'), host);

    expect(response.status).toHaveBeenCalledWith(403);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 403,
      errorCode: 'FORBIDDEN',
      message: 'Forbidden',
      timestamp: expect.any(String),
      path: '/books/42',
      requestId: 'req-1'
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs server-side failures with the original error', () => {
    const { logger, asLogger } = fakeLogger();
    const { host, response } = httpHost({ originalUrl: '/books', url: '/books', requestId: 'req-2' });
    const failure = new Error('boom');

    new HttpErrorFilter(asLogger).catch(failure, host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(logger.error).toHaveBeenCalledWith('Unhandled exception', { requestId: 'req-2', path: '/books', error: failure });
  });
});
