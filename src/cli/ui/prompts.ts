import { input } from '@inquirer/prompts';

import { getActiveCancelSignal } from '../cancel.js';

/** Free-text prompt; Ctrl+C through the CLI cancellation aborts it. */
export async function promptInput(opts: { message: string; default?: string }): Promise<string> {
  const signal = getActiveCancelSignal();
  return await input(opts, signal ? { signal } : undefined);
}
