/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('chunk_overlap must be smaller than chunk_size');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  DocumentProcessingError,
  TokenLimitExceededError,
  DispatchTimeoutError,
  CollaboratorUnavailableError,
  CancelledError,
} from './types.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  describeError,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
