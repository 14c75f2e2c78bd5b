export * from './constants.js';
export * from './frame.js';
export * from './temperature.js';
export * from './messages.js';
export * from './responses.js';
export * from './commands.js';
export * from './catalog.js';
export * from './auth.js';
