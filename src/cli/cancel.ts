export type CancelSignal = 'SIGINT' | 'SIGTERM';
export type CancelSource = 'signal' | 'keypress';

export interface CancelInfo {
  signal: CancelSignal;
  source: CancelSource;
}

export interface InstalledCliCancellation {
  /** Flips on the first Ctrl+C / SIGTERM. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen. */
  count: number;
  dispose(): void;
}

export interface CliCancellationOptions {
  /** First trigger: start a graceful stop (e.g. abort the running job). */
  onCancel?: (info: CancelInfo) => void | Promise<void>;
  /** Second trigger; defaults to exiting with 130 (SIGINT) or 143 (SIGTERM). */
  onForceExit?: (info: CancelInfo & { count: number }) => void;
  /** Reports a failure inside `onCancel`, which runs detached from the command. */
  onError?: (err: unknown) => void;
}

let _activeCancelSignal: AbortSignal | null = null;

/** Signal of the cancellation installed by the running command, used to abort prompts. */
export function getActiveCancelSignal(): AbortSignal | null {
  return _activeCancelSignal;
}

/**
 * Ctrl+C handling for long-running commands: the first press cancels gracefully,
 * a second press exits immediately.
 */
export function installCliCancellation(opts: CliCancellationOptions = {}): InstalledCliCancellation {
  const controller = new AbortController();
  _activeCancelSignal = controller.signal;

  let count = 0;
  let disposed = false;
  let resumedStdin = false;

  const forceExit =
    opts.onForceExit ??
    ((info: CancelInfo & { count: number }) => {
      process.exit(info.signal === 'SIGTERM' ? 143 : 130);
    });

  const trigger = (info: CancelInfo) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      if (opts.onCancel) {
        void Promise.resolve()
          .then(() => opts.onCancel?.(info))
          .catch((err: unknown) => opts.onError?.(err))
          .finally(() => controller.abort(info));
      } else {
        controller.abort(info);
      }
      return;
    }
    forceExit({ ...info, count });
  };

  const onSigint = () => trigger({ signal: 'SIGINT', source: 'signal' });
  const onSigterm = () => trigger({ signal: 'SIGTERM', source: 'signal' });

  // `on`, not `once`: the second press must be seen too.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  // Raw-mode TTY input (interactive prompts) delivers Ctrl+C as byte 0x03 instead of SIGINT.
  const wantsStdin = Boolean(process.stdin.isTTY);
  const onStdinData = (chunk: Buffer | string) => {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (buf.includes(3)) trigger({ signal: 'SIGINT', source: 'keypress' });
  };
  if (wantsStdin) {
    process.stdin.on('data', onStdinData);
    if (process.stdin.isPaused()) {
      process.stdin.resume();
      resumedStdin = true;
    }
  }

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (wantsStdin) {
      process.stdin.off('data', onStdinData);
      // Leave stdin as found, or it keeps the process alive.
      if (resumedStdin) process.stdin.pause();
    }
    if (_activeCancelSignal === controller.signal) _activeCancelSignal = null;
  };

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose
  };
}
