/**
 * Menu selection decoding
 */

import type { SelectionAction } from '../schemas/index.js';

export const MEET_BASE_URL = 'https://meet.google.com';

/** Meet code (xxx-xxxx-xxx) at the very end of the line */
const CONFERENCE_CODE_REGEX = /(\w{3}-\w{4}-\w{3})\n?$/;

export type OpenUrl = (url: string) => Promise<unknown>;

export function parseSelection(input: string): SelectionAction {
  if (!input) {
    return { kind: 'display' };
  }

  const match = CONFERENCE_CODE_REGEX.exec(input);
  if (!match) {
    return { kind: 'display' };
  }

  const code = match[1];
  return { kind: 'open-meeting', code, url: `${MEET_BASE_URL}/${code}` };
}

/**
 * Open the meeting named by a selected line, if any
 *
 * @returns The decoded action
 */
export async function handleSelection(input: string, openUrl: OpenUrl): Promise<SelectionAction> {
  const action = parseSelection(input);
  if (action.kind === 'open-meeting') {
    await openUrl(action.url);
  }
  return action;
}
