const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

/**
 * Run `handler` on the first SIGINT or SIGTERM. Later signals are ignored
 * so a double Ctrl-C does not start a second shutdown.
 */
export function onShutdownSignals(handler: (signal: NodeJS.Signals) => void): void {
  let fired = false
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      if (fired) return
      fired = true
      handler(signal)
    })
  }
}
