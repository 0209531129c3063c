/**
 * Keyboard input for one page.
 */

import type { InputChannel, Modifier } from './channel.js';
import { Modifiers } from './channel.js';

function isModifier(key: string): key is Modifier {
  return key === 'Alt' || key === 'Control' || key === 'Meta' || key === 'Shift';
}

/**
 * Text a key produces when pressed, if any.
 */
function keyText(key: string): string | undefined {
  if (key === 'Enter') return '\r';
  if (key === 'Tab') return '\t';
  // a single code point is a printable key
  if ([...key].length === 1) return key;
  return undefined;
}

export class Keyboard {
  private mask: number = Modifiers.None;

  constructor(private readonly channel: InputChannel) {}

  /**
   * Bit mask of the modifier keys currently held.
   */
  get modifiers(): number {
    return this.mask;
  }

  /**
   * Hold a key down. `key` is a `KeyboardEvent.key` value.
   */
  async down(key: string): Promise<void> {
    const text = keyText(key);
    await this.channel.call('Input.dispatchKeyEvent', {
      type: text === undefined ? 'rawKeyDown' : 'keyDown',
      key,
      text,
      unmodifiedText: text,
      modifiers: this.mask,
    });

    if (isModifier(key)) {
      this.mask |= Modifiers[key];
    }
  }

  async up(key: string): Promise<void> {
    await this.channel.call('Input.dispatchKeyEvent', {
      type: 'keyUp',
      key,
      modifiers: this.mask,
    });

    if (isModifier(key)) {
      this.mask &= ~Modifiers[key];
    }
  }

  async press(key: string): Promise<void> {
    await this.down(key);
    await this.up(key);
  }

  /**
   * Insert text as an IME would, without key events.
   */
  async insertText(text: string): Promise<void> {
    await this.channel.call('Input.insertText', { text });
  }
}
