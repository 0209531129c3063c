/**
 * Element handles.
 *
 * A handle wraps a remote object id for a DOM element. The id is only
 * meaningful in the execution context that issued it; when the element's
 * frame is re-created, `ensureOwningPage` finds the frame that now holds the
 * node and rebinds the handle.
 *
 * Pointer actions follow a fixed pipeline: wait until visible, scroll into
 * view, verify the center point hits the element, then dispatch.
 */

import * as path from 'node:path';
import type { Protocol } from 'devtools-protocol';
import { z } from 'zod';
import { parseDataUri } from './data-uri.js';
import { ElementError } from './errors.js';
import type { EvalOptions, ObjectRef } from './eval.js';
import { evalOptions, helperCall } from './eval.js';
import type { FrameSearchResult } from './frames.js';
import { ensureOwningPage } from './frames.js';
import type { Quad } from './geometry.js';
import { quadBounds, quadCenter, shapesEqual } from './geometry.js';
import type { MouseButton } from './input/mouse.js';
import { interactable } from './interactable.js';
import type { Page } from './page.js';
import type { SleeperFactory } from './sleeper.js';
import { intervalSleeper } from './sleeper.js';
import { retry, settle } from './wait.js';

export interface ElementInit {
  /** Cancels waits and in-flight calls made through this handle. */
  signal?: AbortSignal;
  /** Sleeper for wait loops. Defaults to the page's. */
  sleeper?: SleeperFactory;
}

export type ImageFormat = 'png' | 'jpeg' | 'webp';

export class ElementHandle implements ObjectRef {
  readonly signal: AbortSignal | undefined;
  private readonly sleeper: SleeperFactory;
  // Non-owning: the page lives as long as its session, not its elements.
  private currentPage: Page;
  private currentObjectId: string;

  constructor(page: Page, objectId: string, init: ElementInit = {}) {
    this.currentPage = page;
    this.currentObjectId = objectId;
    this.signal = init.signal;
    this.sleeper = init.sleeper ?? page.options.sleeper;
  }

  get page(): Page {
    return this.currentPage;
  }

  get objectId(): string {
    return this.currentObjectId;
  }

  /**
   * The same remote object, with calls and waits bound to `signal`.
   */
  withSignal(signal: AbortSignal | undefined): ElementHandle {
    return new ElementHandle(this.currentPage, this.currentObjectId, {
      signal,
      sleeper: this.sleeper,
    });
  }

  /**
   * The element's page, bound to this handle's signal.
   */
  scopedPage(): Page {
    return this.currentPage.withSignal(this.signal);
  }

  /**
   * Point the handle at another page and object. Used when the element's
   * node turns out to live in a different frame.
   */
  rebind(page: Page, objectId: string): void {
    this.currentPage = page;
    this.currentObjectId = objectId;
  }

  // ========== Actions ==========

  async focus(): Promise<void> {
    await this.scrollIntoView();
    await this.evalWithOptions({ ...evalOptions('function () { this.focus(); }'), userGesture: true });
  }

  /**
   * Scroll the element into the visible area, if it isn't already.
   */
  async scrollIntoView(): Promise<void> {
    await this.traced('scroll into view', () =>
      this.call('DOM.scrollIntoViewIfNeeded', {
        objectId: this.objectId,
      } satisfies Protocol.DOM.ScrollIntoViewIfNeededRequest)
    );
  }

  /**
   * Move the mouse over the center of the element.
   */
  async hover(): Promise<void> {
    const center = await this.actionPoint();
    await this.currentPage.mouse.move(Math.trunc(center.x), Math.trunc(center.y), 1);
  }

  /**
   * Hover, then press and release `button`.
   */
  async click(button: MouseButton = 'left'): Promise<void> {
    await this.hover();
    await this.traced(`${button} click`, () => this.currentPage.mouse.click(button));
  }

  async tap(): Promise<void> {
    const center = await this.actionPoint();
    await this.traced('tap', () => this.currentPage.touch.tap(center.x, center.y));
  }

  /**
   * Focus the element and press `key`, a `KeyboardEvent.key` value.
   */
  async press(key: string): Promise<void> {
    await this.waitVisible();
    await this.focus();
    await this.traced(`press ${key}`, () => this.currentPage.keyboard.press(key));
  }

  /**
   * Select the first match of the regular expression in an input or textarea.
   * Resolves false when nothing matches.
   */
  async selectText(regex: string): Promise<boolean> {
    await this.focus();
    return this.traced(`select text: ${regex}`, () =>
      this.evalValue({ ...helperCall('selectText', [regex]), userGesture: true }, z.boolean())
    );
  }

  async selectAllText(): Promise<void> {
    await this.focus();
    await this.traced('select all text', () =>
      this.evalWithOptions({ ...helperCall('selectAllText'), userGesture: true })
    );
  }

  /**
   * Focus the element and insert `text`, then fire `input` and `change`.
   * To clear an input first, call `selectAllText()` then `input('')`.
   */
  async input(text: string): Promise<void> {
    await this.waitVisible();
    await this.focus();
    await this.traced(`input ${text}`, async () => {
      await this.currentPage.keyboard.insertText(text);
      await this.evalWithOptions({ ...helperCall('inputEvent'), userGesture: true });
    });
  }

  async blur(): Promise<void> {
    await this.evalWithOptions({ ...evalOptions('function () { this.blur(); }'), userGesture: true });
  }

  /**
   * Select the `<option>`s matching each selector, by text or CSS. Resolves
   * with how many selectors matched an option.
   */
  async select(selectors: string[]): Promise<number> {
    await this.waitVisible();
    return this.traced(`select "${selectors.join('; ')}"`, () =>
      this.evalValue({ ...helperCall('select', [selectors]), userGesture: true }, z.number())
    );
  }

  /**
   * Set the files of an `<input type="file">`. Relative paths resolve
   * against the working directory.
   */
  async setFiles(paths: string[]): Promise<void> {
    const files = paths.map((p) => path.resolve(p));
    await this.traced(`set files: ${files.join(', ')}`, () =>
      this.call('DOM.setFileInputFiles', {
        files,
        objectId: this.objectId,
      } satisfies Protocol.DOM.SetFileInputFilesRequest)
    );
  }

  // ========== Reads ==========

  async matches(selector: string): Promise<boolean> {
    return this.evalValue(evalOptions('function (s) { return this.matches(s); }', [selector]), z.boolean());
  }

  /**
   * Attribute value, or null when the attribute is absent.
   */
  async attribute(name: string): Promise<string | null> {
    return this.evalValue(
      evalOptions('function (n) { return this.getAttribute(n); }', [name]),
      z.string().nullable()
    );
  }

  /**
   * JSON value of a DOM property.
   */
  async property(name: string): Promise<unknown> {
    const res = await this.eval('function (n) { return this[n]; }', name);
    return res.value;
  }

  async text(): Promise<string> {
    return this.evalValue(helperCall('text'), z.string());
  }

  async html(): Promise<string> {
    return this.evalValue(evalOptions('function () { return this.outerHTML; }'), z.string());
  }

  async visible(): Promise<boolean> {
    return this.evalValue(helperCall('visible'), z.boolean());
  }

  /**
   * Whether `target` is this element or inside it.
   */
  async containsElement(target: ElementHandle): Promise<boolean> {
    return this.evalValue(helperCall('containsElement', [target]), z.boolean());
  }

  /**
   * The element's on-screen footprint, one quad per rectangle of a possibly
   * non-rectangular region. Empty when the element is not rendered.
   */
  async shape(): Promise<Quad[]> {
    const res = await this.call<Protocol.DOM.GetContentQuadsResponse>('DOM.getContentQuads', {
      objectId: this.objectId,
    } satisfies Protocol.DOM.GetContentQuadsRequest);
    return res.quads;
  }

  async box(): Promise<Protocol.DOM.BoxModel> {
    const res = await this.call<Protocol.DOM.GetBoxModelResponse>('DOM.getBoxModel', {
      objectId: this.objectId,
    } satisfies Protocol.DOM.GetBoxModelRequest);
    return res.model;
  }

  async describe(depth = 1, pierce = false): Promise<Protocol.DOM.Node> {
    const res = await this.call<Protocol.DOM.DescribeNodeResponse>('DOM.describeNode', {
      objectId: this.objectId,
      depth,
      pierce,
    } satisfies Protocol.DOM.DescribeNodeRequest);
    return res.node;
  }

  async nodeId(): Promise<number> {
    await this.scopedPage().enableNodeQuery();
    const res = await this.call<Protocol.DOM.RequestNodeResponse>('DOM.requestNode', {
      objectId: this.objectId,
    } satisfies Protocol.DOM.RequestNodeRequest);
    return res.nodeId;
  }

  // ========== Structure ==========

  async shadowRoot(): Promise<ElementHandle> {
    const node = await this.describe(1, false);

    // an array on the wire, though an element has at most one shadow root
    const root = node.shadowRoots?.[0];
    if (!root) {
      throw new ElementError('element has no shadow root', this);
    }

    const res = await this.call<Protocol.DOM.ResolveNodeResponse>('DOM.resolveNode', {
      backendNodeId: root.backendNodeId,
    } satisfies Protocol.DOM.ResolveNodeRequest);
    if (res.object.objectId === undefined) {
      throw new ElementError('shadow root did not resolve to an object', this);
    }
    return this.scopedPage().elementFromObject(res.object.objectId);
  }

  /**
   * The page of this iframe's content document.
   */
  async frame(): Promise<Page> {
    const node = await this.describe(1, false);
    if (!node.frameId) {
      throw new ElementError(`<${node.localName}> has no content frame`, this);
    }
    return this.currentPage.forFrame(node.frameId, this);
  }

  /**
   * Make sure the handle evaluates in the frame that owns `nodeId`.
   */
  async ensureOwningPage(nodeId: number, objectId = this.objectId): Promise<FrameSearchResult> {
    return ensureOwningPage(this, nodeId, objectId);
  }

  // ========== Waits ==========

  /**
   * Poll until the function `js` returns a truthy value.
   */
  async wait(js: string, ...args: unknown[]): Promise<void> {
    await this.waitFor(evalOptions(js, args));
  }

  async waitVisible(): Promise<void> {
    await this.waitFor(helperCall('visible'));
  }

  async waitInvisible(): Promise<void> {
    await this.waitFor(helperCall('invisible'));
  }

  /**
   * Wait for an image to finish loading.
   */
  async waitLoad(): Promise<void> {
    await this.evalWithOptions(helperCall('waitLoad'));
  }

  /**
   * Wait until the element is visible and its shape stays the same across
   * one `interval` (ms).
   */
  async waitStable(interval: number): Promise<void> {
    await this.waitVisible();
    const sampler = this.withSignal(undefined);
    await settle(this.signal, intervalSleeper(interval), () => sampler.shape(), shapesEqual);
  }

  // ========== Resources ==========

  /**
   * Content of the resource the element loaded, e.g. the image of an `<img>`.
   */
  async resource(): Promise<Buffer> {
    const url = await this.evalValue(helperCall('resource'), z.string());

    const res = await this.call<Protocol.Page.GetResourceContentResponse>('Page.getResourceContent', {
      frameId: this.currentPage.frameId,
      url,
    } satisfies Protocol.Page.GetResourceContentRequest);

    return res.base64Encoded ? Buffer.from(res.content, 'base64') : Buffer.from(res.content);
  }

  /**
   * Image data of a `<canvas>`.
   * @see https://developer.mozilla.org/en-US/docs/Web/API/HTMLCanvasElement/toDataURL
   */
  async canvasToImage(format = 'image/png', quality = 0.92): Promise<Buffer> {
    const uri = await this.evalValue(
      evalOptions('function (format, quality) { return this.toDataURL(format, quality); }', [
        format,
        quality,
      ]),
      z.string()
    );
    return parseDataUri(uri).data;
  }

  /**
   * Screenshot clipped to the element's content box.
   */
  async screenshot(format: ImageFormat = 'png', quality?: number): Promise<Buffer> {
    await this.waitVisible();
    await this.scrollIntoView();

    const box = await this.box();
    const bounds = quadBounds(box.content);

    return this.scopedPage()
      .root()
      .screenshot({
        format,
        quality,
        clip: { ...bounds, scale: 1 },
      });
  }

  // ========== Lifecycle ==========

  /**
   * Let the browser reclaim the remote object. The handle is unusable after.
   */
  async release(): Promise<void> {
    await this.scopedPage().release(this.objectId);
  }

  /**
   * Detach the element from the document, then release it.
   */
  async remove(): Promise<void> {
    await this.eval('function () { this.remove(); }');
    await this.release();
  }

  // ========== Evaluation ==========

  async eval(js: string, ...args: unknown[]): Promise<Protocol.Runtime.RemoteObject> {
    return this.evalWithOptions(evalOptions(js, args));
  }

  /**
   * Evaluate with `this` bound to the element.
   */
  async evalWithOptions(opts: EvalOptions): Promise<Protocol.Runtime.RemoteObject> {
    return this.scopedPage().evaluate({ ...opts, thisObjectId: this.objectId });
  }

  private async evalValue<T>(opts: EvalOptions, schema: z.ZodType<T>): Promise<T> {
    const res = await this.evalWithOptions(opts);
    return schema.parse(res.value);
  }

  private call<T = unknown>(method: string, params: object): Promise<T> {
    return this.scopedPage().call<T>(method, params);
  }

  /**
   * Checks run unbound from the signal; cancellation is observed between
   * ticks only.
   */
  private async waitFor(opts: EvalOptions): Promise<void> {
    const checker = this.withSignal(undefined);
    await retry(this.signal, this.sleeper(), async () => {
      const res = await checker.evalWithOptions(opts);
      return Boolean(res.value);
    });
  }

  /**
   * Wait visible, scroll into view and hit-test; resolves with the center of
   * the element's first quad.
   */
  private async actionPoint(): Promise<{ x: number; y: number }> {
    await this.waitVisible();
    await this.scrollIntoView();
    const shape = await interactable(this);
    return quadCenter(shape[0]);
  }

  private async traced<T>(label: string, action: () => Promise<T>): Promise<T> {
    const done = await this.scopedPage().traceInput(label);
    try {
      return await action();
    } finally {
      done();
    }
  }
}
