/**
 * Signal that aborts as soon as either input aborts.
 */
export function combineAbortSignals(primary: AbortSignal, secondary: AbortSignal): AbortSignal {
  const controller = new AbortController();
  if (primary.aborted || secondary.aborted) {
    controller.abort();
    return controller.signal;
  }
  const propagate = () => controller.abort();
  primary.addEventListener('abort', propagate, { once: true });
  secondary.addEventListener('abort', propagate, { once: true });
  return controller.signal;
}
