import { PayloadTooLargeError } from "../errors.js";
import type { PayloadDirection } from "../errors.js";

export type Payload = string | Uint8Array;

/** Byte-size limit for file content travelling in either direction. */
export class PayloadGuard {
  constructor(readonly maxBytes: number) {}

  /** Size in bytes; strings are measured as UTF-8. */
  measure(payload: Payload): number {
    return typeof payload === "string" ? Buffer.byteLength(payload, "utf8") : payload.byteLength;
  }

  check(payload: Payload, direction: PayloadDirection = "request"): void {
    const size = this.measure(payload);
    if (size > this.maxBytes) {
      throw new PayloadTooLargeError(size, this.maxBytes, direction);
    }
  }
}
