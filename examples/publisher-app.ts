/**
 * layerline - Publisher Example
 *
 * Composition root wiring console publishers, a mock, and the transform,
 * multiplex and batching decorators.
 */

import {
  ConsolePublisher,
  MockPublisher,
  transformPublisher,
  multiPublisher,
  batchPublisher,
  titleCase,
  settle,
  consoleLogger,
  ILogger,
  EpochClock,
} from '../src/index';

export async function runPublisherDemo(
  logger: ILogger = consoleLogger,
  clock?: EpochClock,
): Promise<void> {
  // A regular publisher to dest-1
  const p = new ConsolePublisher('dest-1', { logger, clock });
  await p.invoke('hello');

  // A mock publisher sending messages nowhere
  const mp = new MockPublisher(() => undefined);
  await mp.invoke('this-will-not-go-anywhere');

  const tp = transformPublisher(p, titleCase);
  await tp.invoke('hello');

  // Fan out to every publisher built so far plus a second destination
  const p2 = new ConsolePublisher('dest-2', { logger, clock });
  const mulp = multiPublisher(p, mp, tp, p2);
  await mulp.invoke('test');

  const bp = batchPublisher(p, 3);
  for (let i = 0; i < 3; i++) {
    await bp.invoke(`msg-${i}`);
  }

  // A publisher that always fails
  const errp = new MockPublisher((msg) => {
    throw new Error(`failed to send msg: ${msg}`);
  });

  const result = await settle(errp, 'test');
  if (!result.isSuccess) {
    logger.info(`Received error as expected: ${result.error.message}`);
  }
}

if (require.main === module) {
  runPublisherDemo().catch((error: unknown) => {
    consoleLogger.error('Publisher demo failed', error);
    process.exitCode = 1;
  });
}
