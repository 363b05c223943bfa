/**
 * @fileoverview Unit tests for RetryDecorator
 */

import {
  RetryDecorator,
  CallbackException,
  ConfigurationException,
  ErrorCode,
  ICapability,
} from '../../../src';
import { mockLogger, rejectionOf } from '../../helpers/capabilities';

describe('RetryDecorator', () => {
  const flaky = (...outcomes: Array<Error | string>): ICapability<string, string> & {
    invoke: jest.Mock<Promise<string>, [string]>;
  } => {
    const invoke = jest.fn<Promise<string>, [string]>();
    for (const outcome of outcomes) {
      if (outcome instanceof Error) {
        invoke.mockRejectedValueOnce(outcome);
      } else {
        invoke.mockResolvedValueOnce(outcome);
      }
    }
    return { invoke };
  };

  it('should return the first success after failed attempts', async () => {
    const inner = flaky(new Error('first'), new Error('second'), 'third');
    const retry = new RetryDecorator(inner, { retries: 3 });

    await expect(retry.invoke('req')).resolves.toBe('third');
    expect(inner.invoke).toHaveBeenCalledTimes(3);
    expect(inner.invoke).toHaveBeenNthCalledWith(3, 'req');
  });

  it('should stop attempting after a success', async () => {
    const inner = flaky('ok');
    const retry = new RetryDecorator(inner, { retries: 3 });

    await expect(retry.invoke('req')).resolves.toBe('ok');
    expect(inner.invoke).toHaveBeenCalledTimes(1);
  });

  it('should return the error of the last attempt when all attempts fail', async () => {
    const second = new Error('second');
    const inner = flaky(new Error('first'), second, 'never reached');
    const retry = new RetryDecorator(inner, { retries: 2 });

    await expect(retry.invoke('req')).rejects.toBe(second);
    expect(inner.invoke).toHaveBeenCalledTimes(2);
  });

  it('should make a single attempt when configured with one retry', async () => {
    const only = new Error('only');
    const inner = flaky(only, 'never reached');

    await expect(new RetryDecorator(inner, { retries: 1 }).invoke('req')).rejects.toBe(only);
    expect(inner.invoke).toHaveBeenCalledTimes(1);
  });

  it('should re-throw at once when shouldRetry declines', async () => {
    const fatal = new Error('fatal');
    const inner = flaky(fatal, 'never reached');
    const shouldRetry = jest.fn(() => false);
    const retry = new RetryDecorator(inner, { retries: 5, shouldRetry });

    await expect(retry.invoke('req')).rejects.toBe(fatal);
    expect(inner.invoke).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledWith(fatal, 1);
  });

  it('should surface a throwing shouldRetry as CallbackException', async () => {
    const broken = new Error('predicate broke');
    const inner = flaky(new Error('first'), 'never reached');
    const retry = new RetryDecorator(inner, {
      retries: 3,
      shouldRetry: () => {
        throw broken;
      },
    });

    const error = await rejectionOf(retry.invoke('req'));

    expect(error).toBeInstanceOf(CallbackException);
    if (error instanceof CallbackException) {
      expect(error.code).toBe(ErrorCode.CALLBACK_FAILED);
      expect(error.callback).toBe('shouldRetry');
      expect(error.message).toBe('shouldRetry failed: predicate broke');
      expect(error.cause).toBe(broken);
    }
    expect(inner.invoke).toHaveBeenCalledTimes(1);
  });

  it('should wait between attempts when a delay is configured', async () => {
    const inner = flaky(new Error('first'), 'second');
    const retry = new RetryDecorator(inner, { retries: 2, delayMs: 10 });

    const started = Date.now();
    await expect(retry.invoke('req')).resolves.toBe('second');

    expect(Date.now() - started).toBeGreaterThanOrEqual(9);
  });

  it('should log failed attempts and exhaustion', async () => {
    const logger = mockLogger();
    const first = new Error('first');
    const second = new Error('second');
    const retry = new RetryDecorator(flaky(first, second), { retries: 2, logger });

    await expect(retry.invoke('req')).rejects.toBe(second);

    expect(logger.debug).toHaveBeenNthCalledWith(1, 'Attempt 1/2 failed', first);
    expect(logger.debug).toHaveBeenNthCalledWith(2, 'Attempt 2/2 failed', second);
    expect(logger.warn).toHaveBeenCalledWith('All 2 attempts failed');
  });

  describe('Configuration', () => {
    it.each([0, -3, 1.5])('should reject %p retries at construction', (retries) => {
      expect(() => new RetryDecorator(flaky(), { retries })).toThrowErrorType(
        ConfigurationException,
      );
    });

    it('should reject a negative delay', () => {
      expect(() => new RetryDecorator(flaky(), { retries: 2, delayMs: -1 })).toThrowErrorType(
        ConfigurationException,
      );
    });

    it('should expose the configured attempts', () => {
      expect(new RetryDecorator(flaky(), { retries: 4 }).attempts).toBe(4);
    });
  });
});
