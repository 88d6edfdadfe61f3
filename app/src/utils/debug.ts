/**
 * Debug Configuration
 *
 * Centralized debug flags for controlling console logging verbosity.
 * Set these to false in production or when specific logs are too noisy.
 */

export const DEBUG = {
  /**
   * Log all message bus activity (very noisy - includes pointer-move, etc.)
   * Recommended: false for normal development, true for debugging message flow
   */
  MESSAGE_BUS_VERBOSE: false,

  /**
   * Log slow message handlers
   * Recommended: true (helps identify performance issues)
   */
  PERFORMANCE: true,

  /** Threshold for PERFORMANCE warnings, in ms */
  SLOW_HANDLER_MS: 10,

  /**
   * Log draws, drops and deck exhaustion
   * Recommended: true (helps debug the table interactions)
   */
  TABLE_ACTIONS: true,
};

/**
 * Messages to always skip logging (even when MESSAGE_BUS_VERBOSE is true).
 * These are extremely high-frequency and provide little value.
 */
export const MESSAGE_BUS_SKIP_TYPES = new Set([
  'pointer-move', // Fires on every mouse move
  'tick', // Fires every frame
]);
