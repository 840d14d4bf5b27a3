/**
 * Model validation engine
 *
 * Declares model schemas, coerces untyped input to the declared attribute
 * types and runs custom validators over the result.
 *
 * @module
 */

export * from './orm/mod.ts';
export * from './config/mod.ts';
export * from './telemetry/mod.ts';
export { bootstrap, configure, type BootstrapOptions } from './app.ts';
