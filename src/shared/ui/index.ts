/**
 * UI utilities for terminal output — re-export hub.
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  warn,
  error,
} from './LogManager.js';
