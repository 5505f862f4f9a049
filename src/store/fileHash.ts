import crypto from "node:crypto";
import fs from "node:fs";

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return hash.digest("hex");
}

export function sha256Buffer(data: Uint8Array | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}
