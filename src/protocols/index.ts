/**
 * Protocol exports (LimitlessLED / MiLight).
 * @module protocols
 */
export * from './limitless';
