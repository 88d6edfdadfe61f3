/**
 * Generic message handler with type-safe message routing
 *
 * Handlers run synchronously so a whole frame (input, tick, draw) settles
 * before the next one starts.
 */
export type MessageHandler<TMessage, TContext> = (
  message: TMessage,
  context: TContext,
) => void;

/**
 * Middleware for cross-cutting concerns (logging, performance, error handling)
 */
export type Middleware<TMessage, TContext> = (
  message: TMessage,
  context: TContext,
  next: () => void,
) => void;

/**
 * Registry for message handlers with middleware support
 *
 * @example
 * ```typescript
 * const registry = new MessageHandlerRegistry<MyMessage, MyContext>();
 *
 * registry.use(loggingMiddleware);
 * registry.register('resize', handleResize);
 *
 * registry.handle(message, context);
 * ```
 */
export class MessageHandlerRegistry<
  TMessage extends { type: string },
  TContext,
> {
  // Type erasure: Store handlers with specific message types as generic handlers
  // This is safe because we only retrieve handlers based on message.type
  private handlers = new Map<string, MessageHandler<TMessage, TContext>>();
  private middleware: Middleware<TMessage, TContext>[] = [];

  /**
   * Register a handler for a specific message type
   */
  register<T extends TMessage['type']>(
    type: T,
    handler: MessageHandler<Extract<TMessage, { type: T }>, TContext>,
  ): void {
    if (this.handlers.has(type)) {
      console.warn(
        `[MessageHandlerRegistry] Handler for "${type}" already registered, overwriting`,
      );
    }
    // Type assertion: handler for specific message type is safe to store as general handler
    // because we only retrieve and call it with the correct message type based on the key
    this.handlers.set(type, handler as MessageHandler<TMessage, TContext>);
  }

  /**
   * Register middleware to be executed for all messages, in registration order
   */
  use(middleware: Middleware<TMessage, TContext>): void {
    this.middleware.push(middleware);
  }

  /**
   * Run the middleware chain, then the handler for `message.type`.
   * Throws if no handler is registered for the message type.
   */
  handle(message: TMessage, context: TContext): void {
    const handler = this.handlers.get(message.type);
    if (!handler) {
      throw new Error(
        `[MessageHandlerRegistry] No handler registered for message type: ${message.type}`,
      );
    }

    let index = 0;
    const next = (): void => {
      if (index < this.middleware.length) {
        const middleware = this.middleware[index++];
        middleware(message, context, next);
      } else {
        handler(message, context);
      }
    };

    next();
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }
}
