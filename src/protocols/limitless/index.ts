/**
 * LimitlessLED protocol exports.
 * @module limitless
 */
export * from './constants';
export * from './errors';
export * from './commands';
export * from './color';
export * from './packet';
export * from './transport';
