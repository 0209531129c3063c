/**
 * Mouse input for one page.
 *
 * The mouse always belongs to the main frame; frame pages share their root's
 * instance. Every gesture runs under the mouse's own lock, so gestures from
 * concurrent callers never interleave.
 */

import type { InputChannel, ModifierSource } from './channel.js';

export type MouseButton = 'none' | 'left' | 'middle' | 'right' | 'back' | 'forward';

/**
 * Button mask for the `buttons` field of a dispatched mouse event.
 */
const BUTTON_MASKS: Record<MouseButton, number> = {
  none: 0,
  left: 1,
  right: 2,
  middle: 4,
  back: 8,
  forward: 16,
};

export const DEFAULT_BUTTON: MouseButton = 'left';

/**
 * Encode a pressed-button sequence: the first pressed button, and the OR of
 * every button's mask.
 */
export function encodeMouseButtons(pressed: readonly MouseButton[]): {
  button: MouseButton;
  buttons: number;
} {
  let buttons = 0;
  for (const button of pressed) {
    buttons |= BUTTON_MASKS[button];
  }
  return { button: pressed[0] ?? 'none', buttons };
}

export class Mouse {
  private x = 0;
  private y = 0;
  // press order matters: the first entry is reported as the event's button
  private buttons: MouseButton[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly channel: InputChannel,
    private readonly keyboard: ModifierSource
  ) {}

  position(): { x: number; y: number } {
    return { x: this.x, y: this.y };
  }

  /**
   * Currently pressed buttons, in press order.
   */
  pressed(): MouseButton[] {
    return [...this.buttons];
  }

  /**
   * Move to (x, y) in `steps` equal strides. The stride is computed once, so
   * a delta that does not divide evenly stops short of the target by less
   * than `steps` units per axis.
   */
  move(x: number, y: number, steps = 1): Promise<void> {
    return this.exclusive(async () => {
      const count = Math.max(1, Math.trunc(steps));
      const strideX = Math.trunc((x - this.x) / count);
      const strideY = Math.trunc((y - this.y) / count);
      const { button, buttons } = encodeMouseButtons(this.buttons);

      for (let i = 0; i < count; i++) {
        const toX = this.x + strideX;
        const toY = this.y + strideY;

        await this.channel.call('Input.dispatchMouseEvent', {
          type: 'mouseMoved',
          x: toX,
          y: toY,
          button,
          buttons,
          modifiers: this.keyboard.modifiers,
        });

        // only after the browser accepted the step
        this.x = toX;
        this.y = toY;
      }
    });
  }

  /**
   * Press a button. Pressing a button that is already down records it twice.
   */
  down(button: MouseButton = DEFAULT_BUTTON, clickCount = 1): Promise<void> {
    return this.exclusive(() => this.press(button, clickCount));
  }

  /**
   * Release a button, dropping every recorded press of it.
   */
  up(button: MouseButton = DEFAULT_BUTTON, clickCount = 1): Promise<void> {
    return this.exclusive(() => this.release(button, clickCount));
  }

  /**
   * Press and release at the current position. A failed release leaves the
   * button pressed in the browser and here.
   */
  click(button: MouseButton = DEFAULT_BUTTON): Promise<void> {
    return this.exclusive(async () => {
      await this.press(button, 1);
      await this.release(button, 1);
    });
  }

  private async press(button: MouseButton, clickCount: number): Promise<void> {
    const next = [...this.buttons, button];
    const { buttons } = encodeMouseButtons(next);

    await this.channel.call('Input.dispatchMouseEvent', {
      type: 'mousePressed',
      button,
      buttons,
      clickCount,
      modifiers: this.keyboard.modifiers,
      x: this.x,
      y: this.y,
    });

    this.buttons = next;
  }

  private async release(button: MouseButton, clickCount: number): Promise<void> {
    const next = this.buttons.filter((b) => b !== button);
    const { buttons } = encodeMouseButtons(next);

    await this.channel.call('Input.dispatchMouseEvent', {
      type: 'mouseReleased',
      button,
      buttons,
      clickCount,
      modifiers: this.keyboard.modifiers,
      x: this.x,
      y: this.y,
    });

    this.buttons = next;
  }

  private exclusive<T>(gesture: () => Promise<T>): Promise<T> {
    const run = this.queue.then(gesture);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
