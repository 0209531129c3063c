/**
 * Check whether `target` is this node or one of its descendants, crossing
 * shadow root boundaries on the way up.
 */
export function containsElement(this: Node, target: Node): boolean {
  let node: Node | null = target;
  while (node) {
    if (node === this) return true;
    node = node instanceof ShadowRoot ? node.host : node.parentNode;
  }
  return false;
}
