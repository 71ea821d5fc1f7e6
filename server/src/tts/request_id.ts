import { randomBytes } from "crypto";

// req_<epoch ms>_<8 hex>; the random tail keeps ids unique within one millisecond
export function newRequestId(now: number = Date.now()): string {
  return `req_${now}_${randomBytes(4).toString("hex")}`;
}
