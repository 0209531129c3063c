/**
 * The part of a page session input controllers dispatch through.
 */
export interface InputChannel {
  call<T = unknown>(method: string, params?: object): Promise<T>;
}

/**
 * Modifier bit mask as `Input.dispatch*Event` expects it.
 */
export const Modifiers = {
  None: 0,
  Alt: 1,
  Control: 2,
  Meta: 4,
  Shift: 8,
} as const;

export type Modifier = Exclude<keyof typeof Modifiers, 'None'>;

export interface ModifierSource {
  readonly modifiers: number;
}
