import { describe, it, expect, vi } from 'vitest';
import { MessageHandlerRegistry, type Middleware } from './MessageHandlerRegistry';
import { errorHandlingMiddleware, loggingMiddleware } from './middleware';

type TestMessage =
  | { type: 'add'; amount: number }
  | { type: 'reset' }
  | { type: 'boom' };

interface TestContext {
  total: number;
  trace: string[];
  postResponse?: (message: { type: 'error'; error: string; context?: string }) => void;
}

function createRegistry() {
  const registry = new MessageHandlerRegistry<TestMessage, TestContext>();
  registry.register('add', (message, context) => {
    context.total += message.amount;
    context.trace.push('handler');
  });
  registry.register('reset', (_message, context) => {
    context.total = 0;
  });
  registry.register('boom', () => {
    throw new Error('kaput');
  });
  return registry;
}

describe('MessageHandlerRegistry', () => {
  it('routes by message type', () => {
    const registry = createRegistry();
    const context: TestContext = { total: 0, trace: [] };

    registry.handle({ type: 'add', amount: 3 }, context);
    registry.handle({ type: 'add', amount: 4 }, context);
    expect(context.total).toBe(7);

    registry.handle({ type: 'reset' }, context);
    expect(context.total).toBe(0);
  });

  it('runs middleware in registration order around the handler', () => {
    const registry = createRegistry();
    const tag =
      (name: string): Middleware<TestMessage, TestContext> =>
      (_message, context, next) => {
        context.trace.push(`${name}:before`);
        next();
        context.trace.push(`${name}:after`);
      };
    registry.use(tag('outer'));
    registry.use(tag('inner'));
    const context: TestContext = { total: 0, trace: [] };

    registry.handle({ type: 'add', amount: 1 }, context);

    expect(context.trace).toEqual([
      'outer:before',
      'inner:before',
      'handler',
      'inner:after',
      'outer:after',
    ]);
  });

  it('lets middleware stop a message', () => {
    const registry = createRegistry();
    registry.use(() => undefined);
    const context: TestContext = { total: 0, trace: [] };

    registry.handle({ type: 'add', amount: 1 }, context);

    expect(context.total).toBe(0);
  });

  it('throws for unregistered types', () => {
    const registry = new MessageHandlerRegistry<TestMessage, TestContext>();

    expect(() => registry.handle({ type: 'reset' }, { total: 0, trace: [] })).toThrow(
      '[MessageHandlerRegistry] No handler registered for message type: reset',
    );
  });

  it('warns when a handler is replaced', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = createRegistry();

    registry.register('reset', () => undefined);

    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('reports which types have a handler', () => {
    const registry = createRegistry();
    expect(registry.has('add')).toBe(true);
    expect(registry.has('missing')).toBe(false);
  });
});

describe('middleware', () => {
  it('reports handler errors instead of throwing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const registry = createRegistry();
    registry.use(errorHandlingMiddleware);
    registry.use(loggingMiddleware);
    const postResponse = vi.fn();

    registry.handle({ type: 'boom' }, { total: 0, trace: [], postResponse });

    expect(postResponse).toHaveBeenCalledWith({
      type: 'error',
      error: 'Handler for boom failed: kaput',
      context: 'boom',
    });
    error.mockRestore();
  });
});
