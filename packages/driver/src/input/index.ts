export * from './channel.js';
export * from './mouse.js';
export * from './keyboard.js';
export * from './touch.js';
