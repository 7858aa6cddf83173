/**
 * Effect platform layer selection
 *
 * Returns the Effect platform layer that provides FileSystem, Path and the
 * other platform services to the file reader.
 */

import * as NodeContext from "@effect/platform-node/NodeContext";

/**
 * Get the Effect platform layer for file I/O
 *
 * @returns Layer providing the Node.js FileSystem and Path services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
