import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { errorMessage, log } from '../services/logging';

/**
 * Run a long operation behind an SSE response: `progress` events while it
 * works, then one `result` event, or one `error` event carrying the raw message.
 * The signal aborts when the client goes away.
 */
export function streamOperation<P, R>(
  c: Context,
  component: string,
  operation: (emit: (progress: P) => void, signal: AbortSignal) => Promise<R>
): Response {
  return streamSSE(c, async (stream) => {
    const controller = new AbortController();
    stream.onAbort(() => controller.abort());

    // Progress callbacks are synchronous; writes are chained to keep event order
    let pending: Promise<void> = Promise.resolve();
    const emit = (progress: P) => {
      pending = pending
        .then(() => stream.writeSSE({ event: 'progress', data: JSON.stringify(progress) }))
        .catch((error: unknown) => {
          log({ level: 'warn', component, message: `Dropped progress event: ${errorMessage(error)}` });
        });
    };

    try {
      const result = await operation(emit, controller.signal);
      await pending;
      await stream.writeSSE({ event: 'result', data: JSON.stringify(result) });
    } catch (error) {
      await pending;
      log({ level: 'error', component, message: errorMessage(error) });
      await stream.writeSSE({ event: 'error', data: JSON.stringify({ message: errorMessage(error) }) });
    }
  });
}
