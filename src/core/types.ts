/**
 * Core Types
 *
 * Primitive aliases shared by every module.
 */

/** Transport-defined device identifier, opaque to this library */
export type DeviceAddress = string;

/** Epoch milliseconds */
export type Timestamp = number;

/** Source of the current time; injectable so scheduling can be driven deterministically */
export type Clock = () => Timestamp;

/** Source of uniform random numbers in [0, 1) */
export type RandomSource = () => number;

export const systemClock: Clock = () => Date.now();
