/**
 * Pages: one frame's document, addressed through a protocol session.
 *
 * A page evaluates with `this` bound to its frame's window, and keeps two
 * remote objects per frame: the window itself and the installed helper
 * object from @handrail/core. A child page derived for an iframe shares the
 * root's session and input devices but resolves its own window and helpers.
 */

import type { Protocol } from 'devtools-protocol';
import { helpersSource } from '@handrail/core';
import type { ProtocolClient } from './cdp/client.js';
import type { DriverOptions, ResolvedDriverOptions } from './config.js';
import { resolveDriverOptions } from './config.js';
import { ElementHandle } from './element.js';
import { EvaluationError, ProtocolError } from './errors.js';
import type { EvalOptions } from './eval.js';
import { evalOptions, isObjectRef } from './eval.js';
import type { InputChannel } from './input/channel.js';
import { Keyboard } from './input/keyboard.js';
import { Mouse } from './input/mouse.js';
import { Touch } from './input/touch.js';
import { sleep } from './sleeper.js';

export interface ScreenshotOptions {
  format?: 'png' | 'jpeg' | 'webp';
  quality?: number;
  clip?: Protocol.Page.Viewport;
  captureBeyondViewport?: boolean;
}

export interface Page {
  /** Frame whose document this page represents. */
  readonly frameId: string;
  /** Protocol session commands are sent on. */
  readonly sessionId: string | undefined;
  /** The iframe element this page was derived from; undefined for a root page. */
  readonly frameElement: ElementHandle | undefined;
  readonly options: ResolvedDriverOptions;
  readonly mouse: Mouse;
  readonly keyboard: Keyboard;
  readonly touch: Touch;

  /** Send a command on this page's session. */
  call<T = unknown>(method: string, params?: object): Promise<T>;

  /** A view of this page whose calls are bound to `signal`. */
  withSignal(signal: AbortSignal | undefined): Page;

  evaluate(opts: EvalOptions): Promise<Protocol.Runtime.RemoteObject>;

  elementFromObject(objectId: string): ElementHandle;
  /** The element at a point, bound to the frame that owns its node. */
  elementFromPoint(x: number, y: number): Promise<ElementHandle>;
  element(selector: string): Promise<ElementHandle | undefined>;
  elements(selector: string): Promise<ElementHandle[]>;

  /** The top-level page of this page's frame tree. */
  root(): Page;

  /**
   * Resolve a DOM node id into a remote object in this frame. Undefined when
   * the node does not live here.
   */
  resolveNode(nodeId: number): Promise<string | undefined>;

  /** Whether `objectId` belongs to this frame's execution context. */
  hasObject(objectId: string): Promise<boolean>;

  /** Make node ids available (`DOM.requestNode` needs a requested document). */
  enableNodeQuery(): Promise<void>;

  release(objectId: string): Promise<void>;

  screenshot(opts?: ScreenshotOptions): Promise<Buffer>;

  /** Derive the page for the document of iframe `owner`. */
  forFrame(frameId: string, owner: ElementHandle): Page;

  /**
   * Pace and log an input. Resolves, after the slow-motion delay, with a
   * function to call once the input is done.
   */
  traceInput(label: string): Promise<() => void>;
}

/**
 * The request timeout is the connection's; see `ConnectionOptions`.
 */
export interface CdpPageInit extends Omit<DriverOptions, 'timeout'> {
  client: ProtocolClient;
  sessionId?: string;
  frameId: string;
}

/**
 * Shared by a root page and every page derived from it.
 */
interface PageTree {
  client: ProtocolClient;
  sessionId: string | undefined;
  options: ResolvedDriverOptions;
  mouse: Mouse;
  keyboard: Keyboard;
  touch: Touch;
  nodeQueryEnabled: boolean;
}

/**
 * Per-frame remote objects, dropped whenever a frame page is derived.
 */
interface FrameObjects {
  contextId?: number;
  windowObjectId?: string;
  helperObjectId?: string;
}

const WORLD_NAME = 'handrail';

// Protocol error messages that mean "not in this context" rather than failure.
const FOREIGN_OBJECT_ERRORS = [
  'Could not find object with given id',
  'Argument should belong to the same JavaScript world as target object',
  'Cannot find context with specified id',
];
const FOREIGN_NODE_ERRORS = [
  'No node with given id found',
  'Node with given id does not belong to the document',
];

function matchesAny(err: unknown, messages: string[]): boolean {
  return err instanceof ProtocolError && messages.some((m) => err.message.includes(m));
}

export class CdpPage implements Page {
  readonly frameId: string;

  private constructor(
    private readonly tree: PageTree,
    frameId: string,
    private readonly parent: CdpPage | undefined,
    readonly frameElement: ElementHandle | undefined,
    private readonly objects: FrameObjects,
    private readonly signal: AbortSignal | undefined
  ) {
    this.frameId = frameId;
  }

  /**
   * Create the page for a session's main frame.
   */
  static create(init: CdpPageInit): CdpPage {
    const { client, sessionId, frameId, ...options } = init;
    const channel: InputChannel = {
      call: (method, params) => client.call(method, params, sessionId),
    };
    const keyboard = new Keyboard(channel);

    const tree: PageTree = {
      client,
      sessionId,
      options: resolveDriverOptions(options),
      mouse: new Mouse(channel, keyboard),
      keyboard,
      touch: new Touch(channel, keyboard),
      nodeQueryEnabled: false,
    };
    return new CdpPage(tree, frameId, undefined, undefined, {}, undefined);
  }

  get sessionId(): string | undefined {
    return this.tree.sessionId;
  }

  get options(): ResolvedDriverOptions {
    return this.tree.options;
  }

  get mouse(): Mouse {
    return this.tree.mouse;
  }

  get keyboard(): Keyboard {
    return this.tree.keyboard;
  }

  get touch(): Touch {
    return this.tree.touch;
  }

  call<T = unknown>(method: string, params?: object): Promise<T> {
    return this.tree.client.call<T>(method, params, this.tree.sessionId, this.signal);
  }

  withSignal(signal: AbortSignal | undefined): CdpPage {
    if (signal === this.signal) return this;
    return new CdpPage(this.tree, this.frameId, this.parent, this.frameElement, this.objects, signal);
  }

  root(): CdpPage {
    let page: CdpPage = this;
    while (page.parent) {
      page = page.parent;
    }
    return page.withSignal(this.signal);
  }

  forFrame(frameId: string, owner: ElementHandle): CdpPage {
    return new CdpPage(this.tree, frameId, this, owner, {}, this.signal);
  }

  async evaluate(opts: EvalOptions): Promise<Protocol.Runtime.RemoteObject> {
    const objectId = opts.thisObjectId ?? (await this.windowObjectId());

    const args: Protocol.Runtime.CallArgument[] = opts.args.map((arg) =>
      isObjectRef(arg) ? { objectId: arg.objectId } : { value: arg }
    );
    if (opts.helper) {
      args.unshift({ objectId: await this.helperObjectId() });
    }

    const res = await this.call<Protocol.Runtime.CallFunctionOnResponse>('Runtime.callFunctionOn', {
      objectId,
      functionDeclaration: opts.js,
      arguments: args,
      returnByValue: opts.byValue,
      awaitPromise: opts.awaitPromise,
      userGesture: opts.userGesture,
    } satisfies Protocol.Runtime.CallFunctionOnRequest);

    if (res.exceptionDetails) {
      throw new EvaluationError(res.exceptionDetails);
    }
    return res.result;
  }

  elementFromObject(objectId: string): ElementHandle {
    return new ElementHandle(this, objectId, { signal: this.signal });
  }

  async elementFromPoint(x: number, y: number): Promise<ElementHandle> {
    const located = await this.call<Protocol.DOM.GetNodeForLocationResponse>('DOM.getNodeForLocation', {
      x,
      y,
      includeUserAgentShadowDOM: true,
    } satisfies Protocol.DOM.GetNodeForLocationRequest);

    const resolved = await this.call<Protocol.DOM.ResolveNodeResponse>('DOM.resolveNode', {
      backendNodeId: located.backendNodeId,
      executionContextId: await this.contextId(),
    } satisfies Protocol.DOM.ResolveNodeRequest);

    // the hit node may sit in a frame other than this one
    const el = this.elementFromObject(requireObjectId(resolved.object, 'DOM.resolveNode'));
    await el.ensureOwningPage(await el.nodeId());
    return el;
  }

  async element(selector: string): Promise<ElementHandle | undefined> {
    const res = await this.evaluate({
      ...evalOptions('function (selector) { return this.document.querySelector(selector); }', [selector]),
      byValue: false,
    });
    if (res.subtype === 'null' || res.objectId === undefined) return undefined;
    return this.elementFromObject(res.objectId);
  }

  async elements(selector: string): Promise<ElementHandle[]> {
    const list = await this.evaluate({
      ...evalOptions('function (selector) { return this.document.querySelectorAll(selector); }', [selector]),
      byValue: false,
    });
    const listId = requireObjectId(list, 'querySelectorAll');

    try {
      const props = await this.call<Protocol.Runtime.GetPropertiesResponse>('Runtime.getProperties', {
        objectId: listId,
        ownProperties: true,
      } satisfies Protocol.Runtime.GetPropertiesRequest);

      const handles: ElementHandle[] = [];
      for (const prop of props.result) {
        // indexed entries only; `length` and friends are skipped
        if (!/^\d+$/.test(prop.name) || prop.value?.objectId === undefined) continue;
        handles.push(this.elementFromObject(prop.value.objectId));
      }
      return handles;
    } finally {
      await this.release(listId);
    }
  }

  async resolveNode(nodeId: number): Promise<string | undefined> {
    try {
      const res = await this.call<Protocol.DOM.ResolveNodeResponse>('DOM.resolveNode', {
        nodeId,
        executionContextId: await this.contextId(),
      } satisfies Protocol.DOM.ResolveNodeRequest);
      return res.object.objectId;
    } catch (err) {
      if (matchesAny(err, FOREIGN_NODE_ERRORS)) return undefined;
      throw err;
    }
  }

  async hasObject(objectId: string): Promise<boolean> {
    try {
      const res = await this.evaluate(
        evalOptions('function (object) { return object !== undefined; }', [{ objectId }])
      );
      return res.value === true;
    } catch (err) {
      if (matchesAny(err, FOREIGN_OBJECT_ERRORS)) return false;
      throw err;
    }
  }

  async enableNodeQuery(): Promise<void> {
    if (this.tree.nodeQueryEnabled) return;
    await this.call('DOM.getDocument', { depth: 0 } satisfies Protocol.DOM.GetDocumentRequest);
    this.tree.nodeQueryEnabled = true;
  }

  async release(objectId: string): Promise<void> {
    await this.call('Runtime.releaseObject', { objectId } satisfies Protocol.Runtime.ReleaseObjectRequest);
  }

  async screenshot(opts: ScreenshotOptions = {}): Promise<Buffer> {
    const res = await this.call<Protocol.Page.CaptureScreenshotResponse>('Page.captureScreenshot', {
      format: opts.format ?? 'png',
      quality: opts.quality,
      clip: opts.clip,
      captureBeyondViewport: opts.captureBeyondViewport,
    } satisfies Protocol.Page.CaptureScreenshotRequest);
    return Buffer.from(res.data, 'base64');
  }

  async traceInput(label: string): Promise<() => void> {
    const { slowMotion, trace } = this.tree.options;
    if (slowMotion > 0) {
      await sleep(slowMotion, this.signal);
    }
    if (!trace) return () => undefined;

    console.error(`[handrail] ${label}`);
    const started = Date.now();
    return () => {
      console.error(`[handrail] ${label} done in ${Date.now() - started}ms`);
    };
  }

  /**
   * Execution context to evaluate in. The main frame uses the page's main
   * world; frames get an isolated world of their own.
   */
  private async contextId(): Promise<number | undefined> {
    if (!this.parent) return undefined;
    if (this.objects.contextId !== undefined) return this.objects.contextId;

    const world = await this.call<Protocol.Page.CreateIsolatedWorldResponse>('Page.createIsolatedWorld', {
      frameId: this.frameId,
      worldName: WORLD_NAME,
    } satisfies Protocol.Page.CreateIsolatedWorldRequest);
    this.objects.contextId = world.executionContextId;
    return world.executionContextId;
  }

  private async windowObjectId(): Promise<string> {
    if (this.objects.windowObjectId) return this.objects.windowObjectId;

    const res = await this.call<Protocol.Runtime.EvaluateResponse>('Runtime.evaluate', {
      expression: 'window',
      contextId: await this.contextId(),
    } satisfies Protocol.Runtime.EvaluateRequest);
    if (res.exceptionDetails) {
      throw new EvaluationError(res.exceptionDetails);
    }

    const id = requireObjectId(res.result, 'window');
    this.objects.windowObjectId = id;
    return id;
  }

  private async helperObjectId(): Promise<string> {
    if (this.objects.helperObjectId) return this.objects.helperObjectId;

    const res = await this.evaluate({
      ...evalOptions(`function installHelpers() { return ${helpersSource()}; }`),
      byValue: false,
    });

    const id = requireObjectId(res, 'helpers');
    this.objects.helperObjectId = id;
    return id;
  }
}

function requireObjectId(object: Protocol.Runtime.RemoteObject, what: string): string {
  if (object.objectId === undefined) {
    throw new ProtocolError(`${what} returned no remote object`, 'Runtime.callFunctionOn');
  }
  return object.objectId;
}
