import { confirm, isCancel } from '@clack/prompts';
import type { ConfirmFn } from './updater';

/**
 * Asks on the terminal; declines when there is no terminal to ask on
 */
export const confirmOnTerminal: ConfirmFn = async (message) => {
  if (!process.stdin.isTTY) {
    return false;
  }
  const answer = await confirm({ message, initialValue: false });
  return !isCancel(answer) && answer;
};
