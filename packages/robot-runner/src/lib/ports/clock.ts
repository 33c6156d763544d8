/**
 * Source of the download timestamps recorded in the jar manifest.
 */
export interface Clock {
  now(): Date;
}
