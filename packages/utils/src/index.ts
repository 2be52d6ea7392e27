/**
 * @shiplog/utils
 *
 * Foundational helpers shared by every shiplog package.
 * This package has NO dependencies on other shiplog packages.
 *
 * @packageDocumentation
 */

// Error taxonomy
export {
  ShiplogError,
  ConfigurationError,
  ResolutionError,
  ParseError,
  ValidationError,
  isShiplogError,
  errorMessage,
  type ShiplogErrorCode,
} from './errors.js';

// Category logger (SHIPLOG_DEBUG=1)
export {
  logDebug,
  logWarning,
  logError,
  isDebugEnabled,
  type LogCategory,
} from './logger.js';

// Bounded, order-preserving concurrency
export { mapConcurrent, DEFAULT_CONCURRENCY } from './concurrency.js';
