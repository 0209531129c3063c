import { containsElement } from './contains.js';
import { resource, waitLoad } from './resource.js';
import { select } from './select.js';
import { inputEvent, selectAllText, selectText, text } from './text.js';
import { invisible, visible } from './visibility.js';

/**
 * Every helper installed into a frame, keyed by the name the driver calls
 * it by.
 */
export const helpers = {
  visible,
  invisible,
  containsElement,
  text,
  inputEvent,
  selectText,
  selectAllText,
  select,
  resource,
  waitLoad,
} as const;

export type HelperName = keyof typeof helpers;

/**
 * Source of an object literal holding every helper. The driver evaluates it
 * once per frame and keeps the resulting remote object.
 */
export function helpersSource(): string {
  const entries = Object.entries(helpers).map(
    ([name, fn]) => `  ${JSON.stringify(name)}: ${fn.toString()}`
  );
  return `({\n${entries.join(',\n')}\n})`;
}

export { containsElement, inputEvent, invisible, resource, select, selectAllText, selectText, text, visible, waitLoad };
