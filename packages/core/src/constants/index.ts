/**
 * Constants module for @gpufleet/core.
 */

export * from "./fleet-defaults";
