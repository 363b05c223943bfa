/**
 * layerline - Publishing Module
 */

export {
  MockPublisher,
  transformPublisher,
  multiPublisher,
  batchPublisher,
  titleCase,
} from './IPublisher';

export type { IPublisher, PublishFunction } from './IPublisher';
