/**
 * Runtime detection and Effect platform layer selection
 *
 * File I/O goes through Effect's FileSystem service; this module supplies the
 * Node.js platform layer that backs it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Supported JavaScript runtimes
 */
export type Runtime = "node" | "bun" | "deno";

/**
 * Detect the current JavaScript runtime
 *
 * Used in error context when a file operation fails.
 *
 * @example
 * ```typescript
 * const runtime = detectRuntime();
 * console.log(`Running on ${runtime}`);
 * ```
 */
export const detectRuntime = (): Runtime => {
  if ("Bun" in globalThis) return "bun";
  if ("Deno" in globalThis) return "deno";
  return "node";
};

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * Bun and Deno both run the Node.js layer through their compatibility APIs.
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
