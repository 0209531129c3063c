/**
 * Options for evaluating a function inside a page.
 */

import type { HelperName } from '@handrail/core';

/**
 * Reference to a remote object passed as a call argument.
 */
export interface ObjectRef {
  readonly objectId: string;
}

export interface EvalOptions {
  /** A function declaration, called with `args`. */
  js: string;
  /** JSON-serializable values, or remote object references. */
  args: Array<unknown>;
  /** Object bound to `this`. Defaults to the frame's window. */
  thisObjectId?: string;
  /** Return the result by value rather than as a remote object. */
  byValue: boolean;
  /** Treat the call as a user gesture (e.g. allows `focus()` to open a keyboard). */
  userGesture: boolean;
  /** Await the returned promise before returning. */
  awaitPromise: boolean;
  /** Set when `js` calls an in-page helper; the page passes the helper object first. */
  helper?: HelperName;
}

export function evalOptions(js: string, args: Array<unknown> = []): EvalOptions {
  return { js, args, byValue: true, userGesture: false, awaitPromise: true };
}

/**
 * Evaluation options that call one of the installed helpers.
 */
export function helperCall(name: HelperName, args: Array<unknown> = []): EvalOptions {
  return {
    ...evalOptions(`function (helpers, ...args) { return helpers.${name}.apply(this, args); }`, args),
    helper: name,
  };
}

export function isObjectRef(value: unknown): value is ObjectRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'objectId' in value &&
    typeof value.objectId === 'string'
  );
}
