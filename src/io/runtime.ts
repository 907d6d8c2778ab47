/**
 * Effect platform layer for file I/O
 *
 * Node.js is the only supported runtime, so this is always the Node layer;
 * callers go through {@link getPlatform} so the choice stays in one place.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Layer that provides FileSystem, Path and the other platform services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
