/**
 * Scripted protocol client standing in for a browser.
 *
 * Methods answer from handlers registered per method; `Runtime.callFunctionOn`
 * answers from handlers matched against the function declaration. A few
 * commands every page issues have built-in answers: the frame window, the
 * isolated world, helper installation and object release.
 */

import type { Protocol } from 'devtools-protocol';
import type { ProtocolClient } from '../../cdp/client.js';
import { ProtocolError } from '../../errors.js';

export type Params = Record<string, unknown>;

export interface RecordedCall {
  method: string;
  params: Params;
  sessionId?: string;
  signal?: AbortSignal;
}

export type MethodHandler = (params: Params) => unknown;

export interface FunctionCall {
  /** Object bound to `this`. */
  objectId: string;
  declaration: string;
  args: Protocol.Runtime.CallArgument[];
  params: Params;
}

export type FunctionHandler = (call: FunctionCall) => Protocol.Runtime.RemoteObject | Promise<Protocol.Runtime.RemoteObject>;

/**
 * A by-value remote object.
 */
export function remoteValue(value: unknown): Protocol.Runtime.RemoteObject {
  return { type: typeof value, value };
}

/**
 * A remote DOM node reference.
 */
export function remoteNode(objectId: string): Protocol.Runtime.RemoteObject {
  return { type: 'object', subtype: 'node', objectId };
}

export class FakeBrowser implements ProtocolClient {
  readonly calls: RecordedCall[] = [];
  private handlers = new Map<string, MethodHandler>();
  private functions: Array<{ match: string; handler: FunctionHandler }> = [];
  private released = new Set<string>();
  private contextFrames = new Map<number, string>();
  private nextContextId = 0;

  on(method: string, handler: MethodHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /**
   * Answer `Runtime.callFunctionOn` calls whose declaration contains `match`.
   * Later registrations take precedence.
   */
  onFunction(match: string, handler: FunctionHandler): this {
    this.functions.unshift({ match, handler });
    return this;
  }

  onHelper(name: string, handler: FunctionHandler): this {
    return this.onFunction(`helpers.${name}.apply`, handler);
  }

  /**
   * Make `objectId` unknown to every context, as if released or collected.
   */
  forget(objectId: string): void {
    this.released.add(objectId);
  }

  isReleased(objectId: string): boolean {
    return this.released.has(objectId);
  }

  /** Frame an isolated world was created for. */
  frameOfContext(contextId: number): string | undefined {
    return this.contextFrames.get(contextId);
  }

  paramsOf(method: string): Params[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.params);
  }

  methods(): string[] {
    return this.calls.map((c) => c.method);
  }

  /** Declarations passed to `Runtime.callFunctionOn`, in call order. */
  declarations(): string[] {
    return this.paramsOf('Runtime.callFunctionOn').map((p) => String(p.functionDeclaration));
  }

  helperCalls(name: string): Params[] {
    return this.paramsOf('Runtime.callFunctionOn').filter((p) =>
      String(p.functionDeclaration).includes(`helpers.${name}.apply`)
    );
  }

  async call<T = unknown>(
    method: string,
    params: object = {},
    sessionId?: string,
    signal?: AbortSignal
  ): Promise<T> {
    const p: Params = Object.fromEntries(Object.entries(params));
    this.calls.push({ method, params: p, sessionId, signal });

    const result = await this.answer(method, p);
    // Tests script results to match the response type the caller asks for.
    return result as T;
  }

  private async answer(method: string, params: Params): Promise<unknown> {
    if (method !== 'Runtime.releaseObject' && this.referencesReleased(params)) {
      throw new ProtocolError('Could not find object with given id', method, -32000);
    }

    const handler = this.handlers.get(method);
    if (handler) return handler(params);

    switch (method) {
      case 'Runtime.evaluate':
        return this.evaluate(params);
      case 'Page.createIsolatedWorld': {
        const id = ++this.nextContextId;
        this.contextFrames.set(id, String(params.frameId));
        return { executionContextId: id };
      }
      case 'Runtime.callFunctionOn':
        return this.callFunctionOn(params);
      case 'Runtime.releaseObject':
        if (typeof params.objectId === 'string') this.released.add(params.objectId);
        return {};
      default:
        throw new Error(`unexpected call: ${method}`);
    }
  }

  private evaluate(params: Params): Protocol.Runtime.EvaluateResponse {
    if (params.expression !== 'window') {
      throw new Error(`unexpected expression: ${String(params.expression)}`);
    }
    const frame =
      typeof params.contextId === 'number' ? this.contextFrames.get(params.contextId) : 'main';
    return { result: { type: 'object', objectId: `window:${frame}` } };
  }

  private async callFunctionOn(params: Params): Promise<Protocol.Runtime.CallFunctionOnResponse> {
    const declaration = String(params.functionDeclaration);
    const objectId = String(params.objectId);

    if (declaration.includes('installHelpers')) {
      return { result: { type: 'object', objectId: `helpers:${objectId}` } };
    }

    const entry = this.functions.find((f) => declaration.includes(f.match));
    if (!entry) {
      throw new Error(`unexpected function: ${declaration}`);
    }

    const args: Protocol.Runtime.CallArgument[] = Array.isArray(params.arguments) ? params.arguments : [];
    return { result: await entry.handler({ objectId, declaration, args, params }) };
  }

  private referencesReleased(params: Params): boolean {
    if (typeof params.objectId === 'string' && this.released.has(params.objectId)) return true;
    if (!Array.isArray(params.arguments)) return false;
    return params.arguments.some(
      (arg: Protocol.Runtime.CallArgument) => arg.objectId !== undefined && this.released.has(arg.objectId)
    );
  }
}
