import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora`; non-TTY contexts (CI, piped output) get static lines. Writes to stderr.

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

export const noopSpinner: SpinnerHandle = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  warn: () => {},
  stop: () => {}
};

export function startSpinner(text: string, write: (line: string) => void): SpinnerHandle {
  if (!process.stderr.isTTY) {
    write(`  ${text}\n`);
    return {
      update: (t) => write(`  ${t}\n`),
      succeed: (t) => t && write(`  ✔ ${t}\n`),
      fail: (t) => t && write(`  ✖ ${t}\n`),
      warn: (t) => t && write(`  ⚠ ${t}\n`),
      stop: () => {}
    };
  }

  // `ora` turns itself off under CI=1; stderr is a TTY here, so force it on.
  const spinner: Ora = ora({ text, stream: process.stderr, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    update(t) {
      spinner.text = t;
    },
    succeed(t) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t) {
      spinner.fail(t ?? spinner.text);
    },
    warn(t) {
      spinner.warn(t ?? spinner.text);
    },
    stop() {
      spinner.stop();
    }
  };
}
