import { Logger, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Error as MongooseError } from 'mongoose';
import { duplicateKeyError } from '../../../test/fakes/duplicate-key';
import { MongoExceptionFilter } from './mongo-exception.filter';

describe('MongoExceptionFilter', () => {
  const filter = new MongoExceptionFilter();
  let res: { status: jest.Mock; json: jest.Mock };

  beforeEach(() => {
    res = { status: jest.fn(), json: jest.fn() };
    res.status.mockReturnValue(res);
  });

  const handle = (err: unknown) => filter.catch(err, new ExecutionContextHost([{}, res]));

  it('passes HttpExceptions through', () => {
    handle(new NotFoundException('Curso no encontrado'));
    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ statusCode: 404, message: 'Curso no encontrado', error: 'Not Found' });
  });

  it('maps duplicate keys to 409', () => {
    handle(duplicateKeyError());
    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({ statusCode: 409, message: 'Registro duplicado' });
  });

  it('maps cast errors to 400', () => {
    handle(new MongooseError.CastError('ObjectId', 'abc', '_id'));
    expect(res.status).toHaveBeenCalledWith(400);
  });

  it('hides unexpected errors behind a 500', () => {
    const log = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    handle(new Error('socket closed'));
    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ statusCode: 500, message: 'Error interno' });
    expect(log).toHaveBeenCalled();
    log.mockRestore();
  });
});
