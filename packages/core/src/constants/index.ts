/**
 * Constants module for @vmforge/core.
 *
 * Re-exports all constants from sub-modules for convenient access.
 */

export * from "./defaults";
export * from "./regions";
export * from "./pricing";
