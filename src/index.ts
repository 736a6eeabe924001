/**
 * Public API.
 * @module milight-udp
 */
export * from './protocols';
export * from './core/config';
export * from './core/pacing';
export * from './core/router';
export * from './core/LedController';
export * from './core/ControllerPool';
export * from './core/batch';
