export { CdpConnection, resolveCdpWebSocketUrl } from './cdp/client.js';
export type { ConnectionOptions, EventListener, ProtocolClient } from './cdp/client.js';
export { DEFAULT_TIMEOUT, resolveDriverOptions, resolveTimeout } from './config.js';
export type { DriverOptions, ResolvedDriverOptions } from './config.js';
export { parseDataUri } from './data-uri.js';
export type { DataUri } from './data-uri.js';
export { ElementHandle } from './element.js';
export type { ElementInit, ImageFormat } from './element.js';
export { ElementError, EvaluationError, NotInteractableError, ProtocolError, WaitCanceledError } from './errors.js';
export { evalOptions, helperCall, isObjectRef } from './eval.js';
export type { EvalOptions, ObjectRef } from './eval.js';
export { ensureOwningPage, findOwningFrame } from './frames.js';
export type { FrameSearchResult } from './frames.js';
export { quadBounds, quadCenter, shapesEqual } from './geometry.js';
export type { Point, Quad, Rect } from './geometry.js';
export * from './input/index.js';
export { interactable } from './interactable.js';
export { CdpPage } from './page.js';
export type { CdpPageInit, Page, ScreenshotOptions } from './page.js';
export { backoffSleeper, intervalSleeper, sleep, throwIfCanceled } from './sleeper.js';
export type { BackoffOptions, Sleeper, SleeperFactory } from './sleeper.js';
export { retry, settle } from './wait.js';
