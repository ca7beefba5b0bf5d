// pause execution for x ms, waking early (without rejecting) when the signal aborts
const asyncTimeout = (ms: number, signal?: AbortSignal): Promise<void> => new Promise((resolve) => {
  if (signal?.aborted) {
    resolve();
    return;
  }
  let handleAbort = () => {};
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', handleAbort);
    resolve();
  }, ms);
  handleAbort = () => {
    clearTimeout(timer);
    resolve();
  };
  signal?.addEventListener('abort', handleAbort, { once: true });
});

export default asyncTimeout;
