/**
 * Relocating an element reference into the frame that now owns its node.
 *
 * After an iframe is detached and reattached, or its document replaced, a
 * remote object id can belong to a context the handle's page no longer
 * evaluates in. The node id survives, so the frame tree is searched for the
 * frame that can resolve it.
 */

import type { ElementHandle } from './element.js';
import type { Page } from './page.js';

export type FrameSearchResult =
  | { kind: 'not-found' }
  | { kind: 'found'; page: Page; objectId: string };

/**
 * Depth-first search of the iframes below `page`, in document order. Each
 * iframe's own document is tried before its nested iframes, and those before
 * the next sibling. The first frame that resolves the node wins.
 */
export async function findOwningFrame(page: Page, nodeId: number): Promise<FrameSearchResult> {
  const iframes = await page.elements('iframe');

  for (const iframe of iframes) {
    const child = await iframe.frame();

    const objectId = await child.resolveNode(nodeId);
    if (objectId !== undefined) {
      return { kind: 'found', page: child, objectId };
    }

    const nested = await findOwningFrame(child, nodeId);
    if (nested.kind === 'found') return nested;
  }

  return { kind: 'not-found' };
}

/**
 * Rebind `element` to the frame that owns `nodeId` when its page does not
 * recognize `objectId`. Leaves the handle as is when no frame does.
 */
export async function ensureOwningPage(
  element: ElementHandle,
  nodeId: number,
  objectId: string
): Promise<FrameSearchResult> {
  const page = element.scopedPage();
  if (await page.hasObject(objectId)) {
    return { kind: 'found', page: element.page, objectId };
  }

  const result = await findOwningFrame(page, nodeId);
  if (result.kind === 'found') {
    element.rebind(result.page, result.objectId);
  }
  return result;
}
