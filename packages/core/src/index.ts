/**
 * @handrail/core
 *
 * Helper functions the driver installs into every frame it evaluates in.
 * Each runs with `this` bound to an element.
 */

export * from './helpers/index.js';
