import { createHash } from "crypto";

/** SHA-256 of the raw source bytes; identifies which data file a view was computed from. */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}
