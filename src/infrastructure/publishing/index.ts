/**
 * layerline - Publishing Sink Module
 */

export { ConsolePublisher, epochNanoseconds } from './ConsolePublisher';
export type { ConsolePublisherOptions, EpochClock } from './ConsolePublisher';
