/**
 * Touch input for one page.
 */

import type { InputChannel, ModifierSource } from './channel.js';

export class Touch {
  constructor(
    private readonly channel: InputChannel,
    private readonly keyboard: ModifierSource
  ) {}

  /**
   * A single-finger tap at (x, y).
   */
  async tap(x: number, y: number): Promise<void> {
    const point = { x, y, radiusX: 1, radiusY: 1, force: 1 };

    await this.channel.call('Input.dispatchTouchEvent', {
      type: 'touchStart',
      touchPoints: [point],
      modifiers: this.keyboard.modifiers,
    });

    await this.channel.call('Input.dispatchTouchEvent', {
      type: 'touchEnd',
      touchPoints: [],
      modifiers: this.keyboard.modifiers,
    });
  }
}
