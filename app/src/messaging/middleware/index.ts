import type { Middleware } from '../MessageHandlerRegistry';
import { DEBUG, MESSAGE_BUS_SKIP_TYPES } from '../../utils/debug';

/**
 * Anything that can report a handler failure back to the UI thread
 */
interface ErrorSink {
  postResponse?: (message: {
    type: 'error';
    error: string;
    context?: string;
  }) => void;
}

/**
 * Logging middleware - logs all messages being handled
 *
 * Controlled by DEBUG.MESSAGE_BUS_VERBOSE flag.
 * High-frequency messages (pointer-move, tick) are always skipped.
 */
export const loggingMiddleware: Middleware<{ type: string }, unknown> = (
  message,
  _context,
  next,
) => {
  if (!MESSAGE_BUS_SKIP_TYPES.has(message.type) && DEBUG.MESSAGE_BUS_VERBOSE) {
    console.log(`[MessageBus] Handling: ${message.type}`);
  }
  next();
};

/**
 * Performance middleware - warns when a handler takes longer than
 * DEBUG.SLOW_HANDLER_MS. Controlled by DEBUG.PERFORMANCE.
 *
 * @example
 * ```typescript
 * registry.use(performanceMiddleware);
 * // Logs: "[MessageBus] Slow handler: pointer-up (23.45ms)"
 * ```
 */
export const performanceMiddleware: Middleware<{ type: string }, unknown> = (
  message,
  _context,
  next,
) => {
  if (!DEBUG.PERFORMANCE) {
    next();
    return;
  }

  const start = performance.now();
  next();
  const duration = performance.now() - start;

  if (duration > DEBUG.SLOW_HANDLER_MS) {
    console.warn(
      `[MessageBus] Slow handler: ${message.type} (${duration.toFixed(2)}ms)`,
    );
  }
};

/**
 * Error handling middleware - catches errors from handlers
 *
 * Logs the error and reports it through the context's postResponse, so one
 * bad message cannot stop the frame loop.
 */
export const errorHandlingMiddleware: Middleware<
  { type: string },
  ErrorSink
> = (message, context, next) => {
  try {
    next();
  } catch (error) {
    console.error(`[MessageBus] Handler error for ${message.type}:`, error);
    const detail = error instanceof Error ? error.message : String(error);
    context.postResponse?.({
      type: 'error',
      error: `Handler for ${message.type} failed: ${detail}`,
      context: message.type,
    });
  }
};
