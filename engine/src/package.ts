/**
 * otakeeper Engine — Update Package Format
 *
 * An update package is a ZIP archive with four root-level entries, all
 * named after the managed executable:
 *
 *   <name>           the executable
 *   <name>.sha256    hex SHA-256 of the executable, one line
 *   <name>.version   opaque version label
 *   <name>.sig       detached signature over the raw executable bytes
 *
 * Packages are read entirely in memory; nothing is extracted to disk, and
 * no entry may inflate past `maxEntryBytes`.
 */

import JSZip from "jszip";
import { CandidatePackage, PackageSpec } from "./types";
import { PackageFormatError } from "./errors";
import { computeDigest, normalizeDigest } from "./integrity";

/** Default ceiling on the uncompressed size of a single entry */
export const DEFAULT_MAX_ENTRY_BYTES = 256 * 1024 * 1024;

export interface ArtifactNames {
  binary: string;
  digest: string;
  version: string;
  signature: string;
}

export function artifactNames(artifactName: string): ArtifactNames {
  return {
    binary: artifactName,
    digest: `${artifactName}.sha256`,
    version: `${artifactName}.version`,
    signature: `${artifactName}.sig`,
  };
}

/**
 * Read and split an uploaded archive into its four artifacts.
 *
 * @throws PackageFormatError if the archive cannot be read, an artifact is
 *   missing or an entry inflates past `maxEntryBytes`
 */
export async function readPackage(
  archive: Buffer,
  artifactName: string,
  maxEntryBytes: number = DEFAULT_MAX_ENTRY_BYTES,
): Promise<CandidatePackage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(archive);
  } catch (err: unknown) {
    throw new PackageFormatError("Invalid ZIP file", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const names = artifactNames(artifactName);
  const required = [names.binary, names.digest, names.version, names.signature];

  for (const name of required) {
    if (!zip.file(name)) {
      throw new PackageFormatError(`Missing ${name} in update package`, {
        missing: name,
        entries: Object.keys(zip.files),
      });
    }
  }

  const [binary, digestText, versionText, signature] = await Promise.all([
    readEntry(zip, names.binary, maxEntryBytes),
    readEntry(zip, names.digest, maxEntryBytes),
    readEntry(zip, names.version, maxEntryBytes),
    readEntry(zip, names.signature, maxEntryBytes),
  ]);

  const version = versionText.toString("utf-8").trim();
  if (version === "") {
    throw new PackageFormatError(`Empty version label in ${names.version}`);
  }

  return {
    binary,
    claimed_digest: normalizeDigest(digestText.toString("utf-8")),
    version,
    signature,
  };
}

function readEntry(zip: JSZip, name: string, maxBytes: number): Promise<Buffer> {
  const entry = zip.file(name);
  if (!entry) {
    return Promise.reject(new PackageFormatError(`Missing ${name} in update package`));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    const stream = entry.nodeStream("nodebuffer");

    stream.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total > maxBytes) {
        stream.pause();
        stream.removeAllListeners("data");
        reject(
          new PackageFormatError(`${name} in update package is too large`, {
            limit: maxBytes,
          }),
        );
        return;
      }
      chunks.push(chunk);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks, total)));
    stream.on("error", (err: Error) =>
      reject(
        new PackageFormatError(`Unreadable ${name} in update package`, {
          reason: err.message,
        }),
      ),
    );
  });
}

/**
 * Build an update package. The digest file is computed from the binary.
 */
export async function buildPackage(spec: PackageSpec): Promise<Buffer> {
  const names = artifactNames(spec.artifact_name);
  const zip = new JSZip();

  zip.file(names.binary, spec.binary, { unixPermissions: 0o755 });
  zip.file(names.version, spec.version);
  zip.file(names.digest, computeDigest(spec.binary));
  if (spec.signature) {
    zip.file(names.signature, spec.signature);
  }

  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    platform: "UNIX",
  });
}
