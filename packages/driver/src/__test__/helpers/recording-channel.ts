/**
 * Input channel that records dispatched events.
 */

import type { InputChannel } from '../../input/channel.js';

export interface DispatchedEvent {
  method: string;
  params: Record<string, unknown>;
}

export class RecordingChannel implements InputChannel {
  readonly events: DispatchedEvent[] = [];
  /** Make the next call whose event type matches reject. */
  failOn: string | undefined;

  async call<T = unknown>(method: string, params: object = {}): Promise<T> {
    const p: Record<string, unknown> = Object.fromEntries(Object.entries(params));
    await Promise.resolve();
    if (this.failOn !== undefined && p.type === this.failOn) {
      this.failOn = undefined;
      throw new Error(`${String(p.type)} failed`);
    }
    this.events.push({ method, params: p });
    return undefined as T;
  }

  /** Event types in dispatch order. */
  types(): unknown[] {
    return this.events.map((e) => e.params.type);
  }
}
