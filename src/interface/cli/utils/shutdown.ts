/**
 * SIGINT / SIGTERM handling for long-running commands
 */

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Call `handler` once on the first shutdown signal. Returns a function that
 * removes the listeners.
 */
export function onShutdownSignal(handler: (signal: NodeJS.Signals) => void): () => void {
  let fired = false;
  const listener = (signal: NodeJS.Signals) => {
    if (fired) return;
    fired = true;
    process.stderr.write(`Received ${signal}. Shutting down...\n`);
    handler(signal);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, listener);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, listener);
    }
  };
}
