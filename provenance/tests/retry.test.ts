import { retryWithBackoff } from '../src/retry';
import { StorageUnavailableError, ValidationError } from '../src/utils/errors';

describe('retryWithBackoff', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('returns the first successful result', async () => {
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new StorageUnavailableError('busy'))
      .mockResolvedValueOnce('ok');

    await expect(retryWithBackoff(operation, 'upload', 3, 0)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  test('rethrows the last error after exhausting attempts', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new StorageUnavailableError('still busy'));

    await expect(retryWithBackoff(operation, 'upload', 3, 0)).rejects.toThrow('still busy');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test('does not retry errors the predicate marks as permanent', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new ValidationError('bad cid'));

    await expect(
      retryWithBackoff(operation, 'pin', 3, 0, (error) => !(error instanceof ValidationError))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('doubles the delay after each failed attempt', async () => {
    const timeoutSpy = jest.spyOn(global, 'setTimeout');
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValueOnce('third time');

    await expect(retryWithBackoff(operation, 'cat', 3, 1)).resolves.toBe('third time');
    expect(timeoutSpy.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });
});
