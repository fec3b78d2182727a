import { createHash } from "node:crypto";
import { canonicalJson } from "../utils/canonical-json.js";

/**
 * Cache key for a tool call. Depends only on the tool id and the argument
 * mapping's contents, never on key order.
 */
export function computeFingerprint(toolId: string, args: Record<string, unknown>): string {
  return createHash("sha256").update(`${toolId}:${canonicalJson(args)}`).digest("hex");
}
