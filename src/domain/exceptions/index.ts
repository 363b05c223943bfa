/**
 * layerline - Exception Module
 *
 * Exceptions raised by the composition layer and its validation helpers
 */

export {
  ErrorCode,
  LayerlineException,
  ConfigurationException,
  TransformException,
  CallbackException,
  HttpTransportException,
  // Validation helpers
  requirePositiveInteger,
  requireNonNegative,
  requireNonEmpty,
} from './exceptions';
