/**
 * Test helpers for the driver package.
 */

export { FakeBrowser, remoteNode, remoteValue } from './fake-browser.js';
export type { FunctionCall, FunctionHandler, MethodHandler, Params, RecordedCall } from './fake-browser.js';

export { FakeWebSocket } from './mock-websocket.js';

export { RecordingChannel } from './recording-channel.js';

export { BOX, createTestPage, scriptLayout } from './page-fixture.js';
export type { Layout } from './page-fixture.js';
