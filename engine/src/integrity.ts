/**
 * otakeeper Engine — SHA-256 Integrity Verification
 *
 * Computes and compares content digests of package binaries and of the
 * live executable. Both the in-memory and the on-disk variants hash in
 * fixed-size chunks, so the result never depends on the chunk size.
 */

import * as fs from "fs";
import * as crypto from "crypto";

export const DIGEST_CHUNK_SIZE = 4096;

const DIGEST_PATTERN = /^[a-f0-9]{64}$/;

/**
 * Compute the SHA-256 digest of an in-memory buffer, chunk by chunk.
 */
export function computeDigest(
  data: Buffer,
  chunkSize: number = DIGEST_CHUNK_SIZE,
): string {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Invalid digest chunk size: ${chunkSize}`);
  }

  const hash = crypto.createHash("sha256");
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    hash.update(data.subarray(offset, offset + chunkSize));
  }
  return hash.digest("hex");
}

/**
 * Compute the SHA-256 digest of a file.
 *
 * Streams the file so memory use does not grow with its size.
 */
export async function computeFileDigest(
  filePath: string,
  chunkSize: number = DIGEST_CHUNK_SIZE,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

/**
 * Trim and lowercase a digest read from a text file.
 */
export function normalizeDigest(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Whether a normalized string looks like a hex SHA-256 digest.
 */
export function isDigest(text: string): boolean {
  return DIGEST_PATTERN.test(text);
}

export function digestsEqual(a: string, b: string): boolean {
  return normalizeDigest(a) === normalizeDigest(b);
}
