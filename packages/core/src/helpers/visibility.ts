/**
 * Visibility predicates polled by the driver's wait loops.
 *
 * Like every helper in this package these run inside the page with `this`
 * bound to the element, and are serialized on their own: they must not
 * reference anything outside their own body.
 */

/**
 * An element is visible when it is attached, not hidden by `display` or
 * `visibility`, and has a non-empty bounding box.
 */
export function visible(this: Element): boolean {
  if (!this.isConnected) return false;

  const style = getComputedStyle(this);
  if (style.display === 'none') return false;
  if (style.visibility === 'hidden' || style.visibility === 'collapse') return false;

  const box = this.getBoundingClientRect();
  return box.width > 0 && box.height > 0;
}

/**
 * Inverse of {@link visible}. Detached elements count as invisible.
 */
export function invisible(this: Element): boolean {
  if (!this.isConnected) return true;

  const style = getComputedStyle(this);
  if (style.display === 'none') return true;
  if (style.visibility === 'hidden' || style.visibility === 'collapse') return true;

  const box = this.getBoundingClientRect();
  return box.width === 0 || box.height === 0;
}
