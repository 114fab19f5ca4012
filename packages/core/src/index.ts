/**
 * @ytp-forge/core
 * 
 * Core package containing:
 * - Error handling
 * - Environment configuration
 * - External binary resolution
 */

// Errors
export {
  YtpForgeError,
  ValidationError,
  InvalidFragmentError,
  MissingInputError,
  ExecutableNotFoundError,
  ProcessStartError,
  ProcessExitError,
  StreamInterruptedError,
  type ErrorCode,
  type InputRole,
  type MissingInput,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  type AppConfig,
  type EnvConfig,
} from './config/env.js';

export {
  findExecutable,
  resolveBinaryPath,
  resolveFfmpeg,
  getBinaryFolders,
  type BinaryConfig,
  type BinarySource,
  type ResolveOptions,
} from './config/binaries.js';
