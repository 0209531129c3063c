/**
 * Error types raised by the driver.
 */

import type { Protocol } from 'devtools-protocol';
import type { ElementHandle } from './element.js';

/**
 * Base class for failures tied to one element.
 */
export class ElementError extends Error {
  constructor(
    message: string,
    readonly element?: ElementHandle
  ) {
    super(message);
    this.name = 'ElementError';
  }
}

/**
 * The element cannot receive pointer input: it has no visible shape, or
 * another element sits on top of its center point. In the latter case
 * `element` is the obstructing element.
 */
export class NotInteractableError extends ElementError {
  constructor(message: string, element?: ElementHandle) {
    super(message, element);
    this.name = 'NotInteractableError';
  }
}

/**
 * Error response from the remote browser, or a transport failure on the way
 * to it. Never retried by the driver.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly method: string,
    readonly code?: number,
    readonly data?: string
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A script evaluated in the page threw.
 */
export class EvaluationError extends Error {
  constructor(readonly details: Protocol.Runtime.ExceptionDetails) {
    super(details.exception?.description ?? details.text);
    this.name = 'EvaluationError';
  }
}

/**
 * A wait was canceled or ran out of time before its condition held.
 * `cause` is the abort reason of the signal.
 */
export class WaitCanceledError extends Error {
  constructor(reason: unknown) {
    const detail = reason instanceof Error ? reason.message : String(reason);
    super(`Wait canceled: ${detail}`, { cause: reason });
    this.name = 'WaitCanceledError';
  }
}
