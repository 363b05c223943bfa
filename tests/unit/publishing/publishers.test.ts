/**
 * @fileoverview Unit tests for publishers and publisher helpers
 */

import {
  ConsolePublisher,
  MockPublisher,
  ConfigurationException,
  batchPublisher,
  epochNanoseconds,
  multiPublisher,
  titleCase,
  transformPublisher,
} from '../../../src';
import { mockLogger } from '../../helpers/capabilities';

describe('Publishers', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ==========================================================================
  // LEAVES
  // ==========================================================================

  describe('ConsolePublisher', () => {
    it('should write the message with timestamp and destination', async () => {
      const logger = mockLogger();
      const publisher = new ConsolePublisher('dest-1', { logger, clock: () => 42n });

      await publisher.invoke('hello');

      expect(logger.info).toHaveBeenCalledWith('[42] Publishing message to dest-1: hello');
    });

    it('should default to the console logger', async () => {
      const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
      const publisher = new ConsolePublisher('dest-2', { clock: () => 7n });

      await publisher.invoke('hi');

      expect(info).toHaveBeenCalledWith('[INFO] [7] Publishing message to dest-2: hi');
    });

    it('should reject an empty destination', () => {
      expect(() => new ConsolePublisher('')).toThrowErrorType(ConfigurationException);
    });

    it('should report wall-clock time in nanoseconds', () => {
      const readingMs = Number(epochNanoseconds() / 1_000_000n);

      expect(Math.abs(readingMs - Date.now())).toBeLessThan(1000);
    });

    it('should advance with the high-resolution timer', () => {
      jest.spyOn(process.hrtime, 'bigint').mockReturnValueOnce(5_000n).mockReturnValueOnce(5_750n);

      const first = epochNanoseconds();
      const second = epochNanoseconds();

      expect(second - first).toBe(750n);
    });
  });

  describe('MockPublisher', () => {
    it('should delegate to the injected function', async () => {
      const publishFn = jest.fn();
      const publisher = new MockPublisher(publishFn);

      await publisher.invoke('this-will-not-go-anywhere');

      expect(publishFn).toHaveBeenCalledWith('this-will-not-go-anywhere');
    });

    it('should surface errors from the injected function', async () => {
      const publisher = new MockPublisher((msg) => {
        throw new Error(`failed to send msg: ${msg}`);
      });

      await expect(publisher.invoke('test')).rejects.toThrow('failed to send msg: test');
    });

    it('should allow swapping the behavior', async () => {
      const publisher = new MockPublisher(() => undefined);
      await expect(publisher.invoke('a')).resolves.toBeUndefined();

      publisher.publishFn = () => Promise.reject(new Error('now failing'));
      await expect(publisher.invoke('a')).rejects.toThrow('now failing');
    });
  });

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  describe('Helpers', () => {
    it('should title-case messages', () => {
      expect(titleCase('hello')).toBe('Hello');
      expect(titleCase('hello big world')).toBe('Hello Big World');
      expect(titleCase('msg-0')).toBe('Msg-0');
    });

    it('should title-case words in any script', () => {
      expect(titleCase('héllo wörld')).toBe('Héllo Wörld');
      expect(titleCase('élan')).toBe('Élan');
      expect(titleCase('straße 2nd')).toBe('Straße 2nd');
    });

    it('should transform before publishing', async () => {
      const publishFn = jest.fn();
      await transformPublisher(new MockPublisher(publishFn), titleCase).invoke('hello there');

      expect(publishFn).toHaveBeenCalledWith('Hello There');
    });

    it('should publish to every publisher until one fails', async () => {
      const first = jest.fn();
      const third = jest.fn();
      const failure = new Error('dest-2 down');
      const all = multiPublisher(
        new MockPublisher(first),
        new MockPublisher(() => Promise.reject(failure)),
        new MockPublisher(third),
      );

      await expect(all.invoke('test')).rejects.toBe(failure);
      expect(first).toHaveBeenCalledWith('test');
      expect(third).not.toHaveBeenCalled();
    });

    it('should publish batches as comma-joined messages', async () => {
      const publishFn = jest.fn();
      const batched = batchPublisher(new MockPublisher(publishFn), 3);

      for (let i = 0; i < 3; i++) {
        await batched.invoke(`msg-${i}`);
      }

      expect(publishFn).toHaveBeenCalledTimes(1);
      expect(publishFn).toHaveBeenCalledWith('msg-0,msg-1,msg-2');
    });

    it('should reject a zero batch size', () => {
      expect(() => batchPublisher(new MockPublisher(jest.fn()), 0)).toThrowErrorType(
        ConfigurationException,
      );
    });
  });
});
