/**
 * Domain model exports.
 */

export * from './artifact';
export * from './checksum';
export * from './errors';
export * from './matrix';
export * from './run';
export * from './toolchain';
