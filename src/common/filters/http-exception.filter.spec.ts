import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';
import { HttpExceptionFilter } from './http-exception.filter';
import { UpstreamApiException } from '../exceptions/upstream-api.exception';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;

  beforeEach(() => {
    filter = new HttpExceptionFilter();
  });

  it('should render upstream failures as 502', () => {
    const body = filter.buildResponse(
      new UpstreamApiException('Hyperliquid userFills request failed with status 429: rate limited'),
      '/pnl?wallet=0xabc',
    );

    expect(body).toEqual({
      statusCode: HttpStatus.BAD_GATEWAY,
      message: 'Hyperliquid userFills request failed with status 429: rate limited',
      error: 'Upstream API error',
      timestamp: expect.any(String),
      path: '/pnl?wallet=0xabc',
    });
  });

  it('should keep validation messages as a list', () => {
    const body = filter.buildResponse(
      new BadRequestException(['wallet should not be empty', 'since must be an integer number']),
      '/timeline',
    );

    expect(body.statusCode).toBe(HttpStatus.BAD_REQUEST);
    expect(body.message).toEqual(['wallet should not be empty', 'since must be an integer number']);
    expect(body.error).toBe('Bad Request');
  });

  it('should handle exceptions created with a plain string', () => {
    const body = filter.buildResponse(new HttpException('Slow down', HttpStatus.TOO_MANY_REQUESTS), '/fills');

    expect(body).toEqual({
      statusCode: HttpStatus.TOO_MANY_REQUESTS,
      message: 'Slow down',
      timestamp: expect.any(String),
      path: '/fills',
    });
  });

  it('should hide unknown errors behind a 500', () => {
    const body = filter.buildResponse(new TypeError('cannot read properties of undefined'), '/pnl/daily');

    expect(body).toEqual({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
      timestamp: expect.any(String),
      path: '/pnl/daily',
    });
  });
});
