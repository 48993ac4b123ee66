import { Logger } from '@nestjs/common';
import { QueryLogger } from '../../../src/core/exceptions/services/query-logger.service';

describe('QueryLogger', () => {
  let debug: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log a successful statement at debug level without its SQL', async () => {
    await expect(new QueryLogger().track('select', 'books', 'SELECT 1', async () => 3)).resolves.toBe(3);

    expect(error).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatchObject({
      message: 'Database Operation',
      data: { operation: 'select', table: 'books', success: true },
    });
    expect(debug.mock.calls[0][0].data).not.toHaveProperty('sql');
  });

  it('should include the SQL when enabled', async () => {
    await new QueryLogger(true).track('delete', 'books', 'DELETE FROM books', async () => 1);

    expect(debug.mock.calls[0][0].data).toHaveProperty('sql', 'DELETE FROM books');
  });

  it('should log a failure at error level and rethrow it unchanged', async () => {
    const failure = new Error('disk full');

    await expect(
      new QueryLogger().track('insert', 'books', 'INSERT', async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(debug).not.toHaveBeenCalled();
    expect(error.mock.calls[0][0]).toMatchObject({
      message: 'Database Operation Failed',
      data: { operation: 'insert', table: 'books', success: false, error: 'disk full' },
    });
  });
});
