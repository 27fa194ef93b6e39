/**
 * Interactive confirmations, skipped when stdin is not a terminal
 */

import { confirm } from '@inquirer/prompts';

let interactive = process.stdin.isTTY === true && process.env.CI !== 'true';

export function isInteractive(): boolean {
  return interactive;
}

export function setInteractiveMode(enabled: boolean): void {
  interactive = enabled;
}

/**
 * Ask before replacing an existing file.
 * Non-interactive sessions never overwrite unless forced.
 */
export async function promptOverwrite(path: string): Promise<boolean> {
  if (!interactive) return false;
  return confirm({ message: `${path} already exists. Overwrite it?`, default: false });
}

/**
 * Ask before clearing stored presentation preferences
 */
export async function confirmResetPreferences(): Promise<boolean> {
  if (!interactive) return true;
  return confirm({ message: 'Clear stored presentation preferences?', default: true });
}
