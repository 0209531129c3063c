/**
 * Tests for ElementHandle.
 */

import * as path from 'node:path';
import type { Protocol } from 'devtools-protocol';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BOX, FakeBrowser, createTestPage, remoteNode, remoteValue, scriptLayout } from './__test__/helpers/index.js';
import type { ElementHandle } from './element.js';
import { ElementError, NotInteractableError, ProtocolError, WaitCanceledError } from './errors.js';
import type { CdpPage } from './page.js';

describe('ElementHandle', () => {
  let browser: FakeBrowser;
  let page: CdpPage;
  let el: ElementHandle;

  beforeEach(() => {
    browser = new FakeBrowser();
    page = createTestPage(browser);
    el = page.elementFromObject('node:el');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('click', () => {
    it('should wait, scroll, hit-test, move and click in order', async () => {
      scriptLayout(browser);

      await el.click();

      const steps = browser.methods().filter((m) => m !== 'Runtime.evaluate');
      expect(steps).toEqual([
        'Runtime.callFunctionOn', // install helpers
        'Runtime.callFunctionOn', // visible
        'DOM.scrollIntoViewIfNeeded',
        'DOM.getContentQuads',
        'Runtime.callFunctionOn', // scroll offset
        'DOM.getNodeForLocation',
        'DOM.resolveNode',
        'DOM.getDocument',
        'DOM.requestNode',
        'Runtime.callFunctionOn', // hasObject
        'Runtime.callFunctionOn', // containsElement
        'Input.dispatchMouseEvent',
        'Input.dispatchMouseEvent',
        'Input.dispatchMouseEvent',
      ]);
      expect(browser.paramsOf('Input.dispatchMouseEvent')).toEqual([
        { type: 'mouseMoved', x: 20, y: 15, button: 'none', buttons: 0, modifiers: 0 },
        { type: 'mousePressed', button: 'left', buttons: 1, clickCount: 1, modifiers: 0, x: 20, y: 15 },
        { type: 'mouseReleased', button: 'left', buttons: 0, clickCount: 1, modifiers: 0, x: 20, y: 15 },
      ]);
    });

    it('should click with the given button', async () => {
      scriptLayout(browser);

      await el.click('right');

      expect(browser.paramsOf('Input.dispatchMouseEvent')[1]).toMatchObject({ type: 'mousePressed', button: 'right', buttons: 2 });
    });

    it('should not press when another element covers it', async () => {
      scriptLayout(browser, { contains: false });

      await expect(el.click()).rejects.toBeInstanceOf(NotInteractableError);
      expect(browser.paramsOf('Input.dispatchMouseEvent')).toEqual([]);
    });

    it('should poll until the element is visible', async () => {
      scriptLayout(browser);
      let polls = 0;
      browser.onHelper('visible', () => remoteValue(++polls >= 3));

      await el.click();

      expect(polls).toBe(3);
    });

    it('should trace the click', async () => {
      const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const traced = createTestPage(browser, { trace: true });
      scriptLayout(browser);

      await traced.elementFromObject('node:el').click();

      expect(log.mock.calls.map((c) => String(c[0]).replace(/\d+ms$/, 'Nms'))).toEqual([
        '[handrail] scroll into view',
        '[handrail] scroll into view done in Nms',
        '[handrail] left click',
        '[handrail] left click done in Nms',
      ]);
      log.mockRestore();
    });
  });

  describe('hover and tap', () => {
    it('should hover the truncated center in one step', async () => {
      scriptLayout(browser, { quads: [[0, 0, 9, 0, 9, 5, 0, 5]] });

      await el.hover();

      expect(browser.paramsOf('Input.dispatchMouseEvent')).toEqual([
        { type: 'mouseMoved', x: 4, y: 2, button: 'none', buttons: 0, modifiers: 0 },
      ]);
      expect(page.mouse.position()).toEqual({ x: 4, y: 2 });
    });

    it('should tap the center', async () => {
      scriptLayout(browser);

      await el.tap();

      expect(browser.paramsOf('Input.dispatchTouchEvent').map((p) => p.touchPoints)).toEqual([
        [{ x: 20, y: 15, radiusX: 1, radiusY: 1, force: 1 }],
        [],
      ]);
    });
  });

  describe('keyboard input', () => {
    beforeEach(() => {
      scriptLayout(browser);
      browser
        .onFunction('this.focus()', () => remoteValue(undefined))
        .onHelper('inputEvent', () => remoteValue(undefined));
    });

    it('should focus, insert text and fire input events', async () => {
      await el.input('hello');

      expect(browser.paramsOf('Input.insertText')).toEqual([{ text: 'hello' }]);
      const focus = browser.paramsOf('Runtime.callFunctionOn').find((p) => String(p.functionDeclaration).includes('this.focus()'));
      expect(focus).toMatchObject({ objectId: 'node:el', userGesture: true });
      expect(browser.helperCalls('inputEvent')).toEqual([expect.objectContaining({ objectId: 'node:el', userGesture: true })]);

      const methods = browser.methods();
      expect(methods.indexOf('Input.insertText')).toBeGreaterThan(methods.indexOf('DOM.scrollIntoViewIfNeeded'));
    });

    it('should press a key on the focused element', async () => {
      await el.press('Enter');

      expect(browser.paramsOf('Input.dispatchKeyEvent').map((p) => p.type)).toEqual(['keyDown', 'keyUp']);
    });

    it('should select text matching a pattern', async () => {
      browser.onHelper('selectText', ({ args }) => remoteValue(args[1].value === 'wor.d'));

      await expect(el.selectText('wor.d')).resolves.toBe(true);
      await expect(el.selectText('nope')).resolves.toBe(false);
    });

    it('should select all text', async () => {
      browser.onHelper('selectAllText', () => remoteValue(undefined));

      await el.selectAllText();

      expect(browser.helperCalls('selectAllText')).toHaveLength(1);
    });

    it('should blur', async () => {
      browser.onFunction('this.blur()', () => remoteValue(undefined));

      await el.blur();

      expect(browser.declarations()).toContain('function () { this.blur(); }');
    });
  });

  describe('select', () => {
    it('should pass the selectors and resolve the match count', async () => {
      scriptLayout(browser);
      browser.onHelper('select', () => remoteValue(2));

      await expect(el.select(['Red', 'option[value="b"]'])).resolves.toBe(2);
      expect(browser.helperCalls('select')[0].arguments).toEqual([
        { objectId: 'helpers:window:main' },
        { value: ['Red', 'option[value="b"]'] },
      ]);
    });

    it('should surface the in-page error for a non-select element', async () => {
      scriptLayout(browser);
      browser.on('Runtime.callFunctionOn', (params) => {
        if (String(params.functionDeclaration).includes('helpers.select.apply')) {
          return {
            result: { type: 'object', subtype: 'error' },
            exceptionDetails: {
              exceptionId: 1,
              text: 'Uncaught',
              lineNumber: 0,
              columnNumber: 0,
              exception: { type: 'object', subtype: 'error', description: 'Error: cannot select options of <div>' },
            },
          };
        }
        const isInstall = String(params.functionDeclaration).includes('installHelpers');
        return { result: isInstall ? { type: 'object', objectId: 'helpers:window:main' } : remoteValue(true) };
      });

      await expect(el.select(['Red'])).rejects.toThrow('Error: cannot select options of <div>');
    });
  });

  it('should set files by absolute path', async () => {
    browser.on('DOM.setFileInputFiles', () => ({}));

    await el.setFiles(['fixtures/report.pdf', '/tmp/photo.png']);

    expect(browser.paramsOf('DOM.setFileInputFiles')).toEqual([
      { files: [path.resolve('fixtures/report.pdf'), '/tmp/photo.png'], objectId: 'node:el' },
    ]);
  });

  describe('reads', () => {
    it('should read an attribute or null', async () => {
      browser.onFunction('getAttribute', ({ args }) => remoteValue(args[0].value === 'href' ? '/home' : null));

      await expect(el.attribute('href')).resolves.toBe('/home');
      await expect(el.attribute('target')).resolves.toBeNull();
    });

    it('should read a property', async () => {
      browser.onFunction('this[n]', () => remoteValue(true));

      await expect(el.property('checked')).resolves.toBe(true);
    });

    it('should read text, html and visibility', async () => {
      browser
        .onHelper('text', () => remoteValue('Save'))
        .onHelper('visible', () => remoteValue(false))
        .onFunction('outerHTML', () => remoteValue('<button>Save</button>'));

      await expect(el.text()).resolves.toBe('Save');
      await expect(el.html()).resolves.toBe('<button>Save</button>');
      await expect(el.visible()).resolves.toBe(false);
    });

    it('should test a selector', async () => {
      browser.onFunction('this.matches(s)', ({ args }) => remoteValue(args[0].value === 'button'));

      await expect(el.matches('button')).resolves.toBe(true);
      await expect(el.matches('a')).resolves.toBe(false);
    });

    it('should reject a value of the wrong type', async () => {
      browser.onHelper('text', () => remoteValue(42));

      await expect(el.text()).rejects.toThrow();
    });

    it('should return the content quads as the shape', async () => {
      browser.on('DOM.getContentQuads', () => ({ quads: [BOX] }));

      await expect(el.shape()).resolves.toEqual([BOX]);
      expect(browser.paramsOf('DOM.getContentQuads')).toEqual([{ objectId: 'node:el' }]);
    });

    it('should request the node id after enabling node queries', async () => {
      browser.on('DOM.getDocument', () => ({ root: {} })).on('DOM.requestNode', () => ({ nodeId: 17 }));

      await expect(el.nodeId()).resolves.toBe(17);
      expect(browser.methods()).toEqual(['DOM.getDocument', 'DOM.requestNode']);
    });

    it('should check containment', async () => {
      browser.onHelper('containsElement', ({ args }) => remoteValue(args[1].objectId === 'node:child'));

      await expect(el.containsElement(page.elementFromObject('node:child'))).resolves.toBe(true);
      await expect(el.containsElement(page.elementFromObject('node:other'))).resolves.toBe(false);
    });
  });

  describe('structure', () => {
    const node = {
      nodeId: 0,
      backendNodeId: 5,
      nodeType: 1,
      nodeName: 'DIV',
      localName: 'div',
      nodeValue: '',
    };

    it('should resolve the shadow root', async () => {
      browser
        .on('DOM.describeNode', () => ({
          node: { ...node, shadowRoots: [{ ...node, backendNodeId: 99, nodeType: 11, nodeName: '#document-fragment' }] },
        }))
        .on('DOM.resolveNode', () => ({ object: remoteNode('node:shadow') }));

      const root = await el.shadowRoot();

      expect(root.objectId).toBe('node:shadow');
      expect(browser.paramsOf('DOM.describeNode')).toEqual([{ objectId: 'node:el', depth: 1, pierce: false }]);
      expect(browser.paramsOf('DOM.resolveNode')).toEqual([{ backendNodeId: 99 }]);
    });

    it('should reject an element without a shadow root', async () => {
      browser.on('DOM.describeNode', () => ({ node }));

      const err = await el.shadowRoot().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ElementError);
      expect(err).toMatchObject({ message: 'element has no shadow root', element: el });
    });

    it('should derive the page of an iframe', async () => {
      browser.on('DOM.describeNode', () => ({ node: { ...node, nodeName: 'IFRAME', localName: 'iframe', frameId: 'frame-7' } }));

      const frame = await el.frame();

      expect(frame.frameId).toBe('frame-7');
      expect(frame.frameElement).toBe(el);
      expect(frame.root()).toBe(page);
    });

    it('should reject frame() on an element that is not a frame', async () => {
      browser.on('DOM.describeNode', () => ({ node }));

      await expect(el.frame()).rejects.toThrow('<div> has no content frame');
    });
  });

  describe('waits', () => {
    it('should wait until a function returns a truthy value', async () => {
      let n = 0;
      browser.onFunction('this.value', () => remoteValue(++n === 2 ? 'ready' : ''));

      await el.wait('function (v) { return this.value === v; }', 'ready');

      expect(n).toBe(2);
      expect(browser.paramsOf('Runtime.callFunctionOn').at(-1)?.arguments).toEqual([{ value: 'ready' }]);
    });

    it('should wait until invisible', async () => {
      let n = 0;
      browser.onHelper('invisible', () => remoteValue(++n > 1));

      await el.waitInvisible();

      expect(n).toBe(2);
    });

    it('should stop waiting when its signal aborts', async () => {
      browser.onHelper('visible', () => remoteValue(false));
      const controller = new AbortController();
      controller.abort('navigated away');

      const err = await el.withSignal(controller.signal).waitVisible().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(WaitCanceledError);
      expect(err).toHaveProperty('message', 'Wait canceled: navigated away');
    });

    it('should let a pending check finish before reporting cancellation', async () => {
      let answer: (value: Protocol.Runtime.RemoteObject) => void = () => undefined;
      browser.onHelper(
        'visible',
        () =>
          new Promise((resolve) => {
            answer = resolve;
          })
      );
      const controller = new AbortController();

      const pending = el.withSignal(controller.signal).waitVisible().catch((e: unknown) => e);
      await vi.waitFor(() => expect(browser.helperCalls('visible')).toHaveLength(1));

      controller.abort(new Error('user canceled'));
      answer(remoteValue(false));
      const err = await pending;

      expect(err).toBeInstanceOf(WaitCanceledError);
      expect(err).toHaveProperty('message', 'Wait canceled: user canceled');
      expect(browser.helperCalls('visible')).toHaveLength(1);
      const check = browser.calls.find((c) => String(c.params.functionDeclaration).includes('helpers.visible.apply'));
      expect(check?.signal).toBeUndefined();
    });

    it('should wait until the shape holds still for one interval', async () => {
      vi.useFakeTimers();
      const shapes = [[0, 0, 10, 0, 10, 10, 0, 10], BOX, BOX];
      let samples = 0;
      browser
        .onHelper('visible', () => remoteValue(true))
        .on('DOM.getContentQuads', () => ({ quads: [shapes[Math.min(samples++, shapes.length - 1)]] }));

      const done = vi.fn();
      const pending = el.waitStable(100).then(done);

      await vi.advanceTimersByTimeAsync(100);
      expect(done).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(100);
      await pending;
      expect(done).toHaveBeenCalledTimes(1);
      expect(samples).toBe(3);
    });

    it('should stop a stable wait when canceled', async () => {
      vi.useFakeTimers();
      let width = 0;
      browser
        .onHelper('visible', () => remoteValue(true))
        .on('DOM.getContentQuads', () => {
          width += 10;
          return { quads: [[0, 0, width, 0, width, 10, 0, 10]] };
        });
      const controller = new AbortController();

      const pending = el.withSignal(controller.signal).waitStable(100).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(250);
      controller.abort('timeout');

      await expect(pending).resolves.toBeInstanceOf(WaitCanceledError);
    });

    it('should wait for the load helper', async () => {
      browser.onHelper('waitLoad', () => remoteValue(undefined));

      await el.waitLoad();

      expect(browser.helperCalls('waitLoad')[0]).toMatchObject({ awaitPromise: true });
    });
  });

  describe('resources', () => {
    it('should fetch the loaded resource of the frame', async () => {
      browser
        .onHelper('resource', () => remoteValue('https://example.test/cat.png'))
        .on('Page.getResourceContent', () => ({ content: Buffer.from('meow').toString('base64'), base64Encoded: true }));

      const data = await el.resource();

      expect(data.toString()).toBe('meow');
      expect(browser.paramsOf('Page.getResourceContent')).toEqual([{ frameId: 'main', url: 'https://example.test/cat.png' }]);
    });

    it('should return text resources as is', async () => {
      browser
        .onHelper('resource', () => remoteValue('https://example.test/a.svg'))
        .on('Page.getResourceContent', () => ({ content: '<svg/>', base64Encoded: false }));

      await expect(el.resource()).resolves.toEqual(Buffer.from('<svg/>'));
    });

    it('should decode a canvas data URL', async () => {
      const uri = `data:image/png;base64,${Buffer.from('pixels').toString('base64')}`;
      browser.onFunction('toDataURL', () => remoteValue(uri));

      const image = await el.canvasToImage();

      expect(image.toString()).toBe('pixels');
      expect(browser.paramsOf('Runtime.callFunctionOn')[0].arguments).toEqual([{ value: 'image/png' }, { value: 0.92 }]);
    });

    it('should screenshot the content box', async () => {
      scriptLayout(browser);
      browser
        .on('DOM.getBoxModel', () => ({
          model: {
            content: [10, 20, 110, 20, 110, 70, 10, 70],
            padding: [10, 20, 110, 20, 110, 70, 10, 70],
            border: [10, 20, 110, 20, 110, 70, 10, 70],
            margin: [10, 20, 110, 20, 110, 70, 10, 70],
            width: 100,
            height: 50,
          },
        }))
        .on('Page.captureScreenshot', () => ({ data: Buffer.from('png-bytes').toString('base64') }));

      const png = await el.screenshot();

      expect(png.toString()).toBe('png-bytes');
      expect(browser.paramsOf('Page.captureScreenshot')[0]).toMatchObject({
        format: 'png',
        clip: { x: 10, y: 20, width: 100, height: 50, scale: 1 },
      });
    });
  });

  describe('lifecycle', () => {
    it('should release the remote object', async () => {
      await el.release();

      expect(browser.paramsOf('Runtime.releaseObject')).toEqual([{ objectId: 'node:el' }]);
    });

    it('should be unusable after remove', async () => {
      browser.onFunction('this.remove()', () => remoteValue(undefined)).onHelper('text', () => remoteValue('gone'));

      await el.remove();

      const err = await el.text().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toHaveProperty('message', 'Could not find object with given id');
    });
  });
});
