/**
 * Pages over a FakeBrowser, and scripted layouts for pointer actions.
 */

import type { DriverOptions } from '../../config.js';
import type { Quad } from '../../geometry.js';
import { CdpPage } from '../../page.js';
import type { FakeBrowser } from './fake-browser.js';
import { remoteNode, remoteValue } from './fake-browser.js';

/**
 * Main-frame page with tracing off and waits that poll without sleeping.
 */
export function createTestPage(browser: FakeBrowser, options: DriverOptions = {}): CdpPage {
  return CdpPage.create({
    client: browser,
    sessionId: 'session-1',
    frameId: 'main',
    slowMotion: 0,
    trace: false,
    sleeper: () => async () => undefined,
    ...options,
  });
}

export interface Layout {
  /** Content quads of the element. Default: one 20x10 box at (10, 10). */
  quads?: Quad[];
  /** Scroll offset of the main frame. */
  scroll?: { x: number; y: number };
  /** Object id of whatever is found at the hit-test point. */
  hitObjectId?: string;
  /** Whether the element contains the hit element. */
  contains?: boolean;
}

export const BOX: Quad = [10, 10, 30, 10, 30, 20, 10, 20];

/**
 * Answer everything a pointer action asks the browser: visibility, scrolling,
 * the element's shape, the hit test and input dispatch. The hit element is
 * always owned by the page that asked.
 */
export function scriptLayout(browser: FakeBrowser, layout: Layout = {}): void {
  browser
    .onHelper('visible', () => remoteValue(true))
    .onFunction('this.scrollX', () => remoteValue(layout.scroll ?? { x: 0, y: 0 }))
    .onHelper('containsElement', () => remoteValue(layout.contains ?? true))
    .on('DOM.scrollIntoViewIfNeeded', () => ({}))
    .on('DOM.getContentQuads', () => ({ quads: layout.quads ?? [BOX] }))
    .on('DOM.getNodeForLocation', () => ({ backendNodeId: 7, frameId: 'main' }))
    .on('DOM.resolveNode', (params) => {
      if (params.backendNodeId !== 7) throw new Error(`unexpected node: ${String(params.backendNodeId)}`);
      return { object: remoteNode(layout.hitObjectId ?? 'node:hit') };
    })
    .on('DOM.getDocument', () => ({ root: {} }))
    .on('DOM.requestNode', () => ({ nodeId: 70 }))
    .onFunction('object !== undefined', () => remoteValue(true))
    .on('Input.dispatchMouseEvent', () => ({}))
    .on('Input.dispatchTouchEvent', () => ({}))
    .on('Input.dispatchKeyEvent', () => ({}))
    .on('Input.insertText', () => ({}));
}
