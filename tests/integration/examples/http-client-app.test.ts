/**
 * @file HTTP client example integration test
 */

import { runHttpClientDemo } from '../../../examples/http-client-app';
import { MockHttpClient, fromString } from '../../../src';
import { mockLogger } from '../../helpers/capabilities';

describe('HTTP client example', () => {
  const url = 'http://www.example.com';

  it('should report the page length seen by each client variant', async () => {
    const logger = mockLogger();

    const lengths = await runHttpClientDemo(url, { logger, client: fromString('abc') });

    expect(lengths).toEqual({
      'mock-client': 13,
      'given-client': 3,
      'retry-client': 3,
      'rewrite-client': 18,
    });
    expect(logger.info).toHaveBeenCalledWith(
      'Fetched page http://www.example.com length using retry-client method: 3',
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should report failures of an unreachable client', async () => {
    const logger = mockLogger();
    let attempts = 0;
    const offline = new MockHttpClient(() => {
      attempts++;
      throw new Error('offline');
    });

    const lengths = await runHttpClientDemo(url, { logger, client: offline });

    expect(lengths['given-client']).toBeUndefined();
    expect(lengths['retry-client']).toBeUndefined();
    expect(lengths['mock-client']).toBe(13);
    // one plain attempt plus three retried ones
    expect(attempts).toBe(4);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to fetch page http://www.example.com length using given-client method: offline',
    );
  });
});
