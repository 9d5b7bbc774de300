import { ArgumentsHost, BadRequestException } from '@nestjs/common';
import { UnknownMatchError } from '@/common/errors/game.errors';
import { LoggerService } from '@/shared/logger/logger.service';
import { HttpExceptionFilter } from './http-exception.filter';

function httpHost() {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const host = {
    switchToHttp: () => ({
      getResponse: () => ({ status }),
      getRequest: () => ({ method: 'GET', url: '/api/v1/matches/m1' }),
    }),
  } as unknown as ArgumentsHost;
  return { host, status, json };
}

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter(new LoggerService());

  it('maps game errors to HTTP statuses', () => {
    const { host, status, json } = httpHost();

    filter.catch(new UnknownMatchError('m1'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: false,
        statusCode: 404,
        message: 'Match m1 not found',
        path: '/api/v1/matches/m1',
      }),
    );
  });

  it('keeps validation messages from HTTP exceptions', () => {
    const { host, status, json } = httpHost();

    filter.catch(new BadRequestException(['code should not be empty']), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ message: ['code should not be empty'] }),
    );
  });

  it('hides unexpected errors behind a 500', () => {
    const { host, status, json } = httpHost();

    filter.catch(new Error('boom'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Internal server error' }),
    );
  });
});
