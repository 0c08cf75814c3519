/**
 * otakeeper CLI -- Inspect Command
 *
 * Checks an update package locally, the same way an agent would before
 * installing it: entries present, digest matching, and (given the public
 * key) signature valid.
 *
 * Usage:
 *   otakeeper inspect deploy/commd-ota.zip
 *   otakeeper inspect deploy/commd-ota.zip --key ota.pub.pem
 */

import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import {
  computeDigest,
  createLogger,
  digestsEqual,
  parseTrustedKey,
  readPackage,
  verifySignature,
} from "@otakeeper/engine";
import { printSuccess, printError, printDetail, formatBytes, colors } from "../output";

export type SignatureCheck = "valid" | "invalid" | "unchecked";

export interface InspectReport {
  name: string;
  version: string;
  claimedDigest: string;
  actualDigest: string;
  digestOk: boolean;
  signature: SignatureCheck;
  binaryBytes: number;
}

/**
 * `deploy/commd-ota.zip` → `commd`
 */
export function inferArtifactName(packagePath: string): string {
  return path.basename(packagePath).replace(/(-ota)?\.zip$/i, "");
}

/**
 * @throws PackageFormatError when the archive is unreadable or incomplete
 */
export async function inspectPackage(
  archive: Buffer,
  name: string,
  publicKeyPem?: string | Buffer,
): Promise<InspectReport> {
  const candidate = await readPackage(archive, name);
  const actualDigest = computeDigest(candidate.binary);

  let signature: SignatureCheck = "unchecked";
  if (publicKeyPem !== undefined) {
    const valid = verifySignature(
      parseTrustedKey(publicKeyPem),
      candidate.binary,
      candidate.signature,
      createLogger({ level: "silent" }),
    );
    signature = valid ? "valid" : "invalid";
  }

  return {
    name,
    version: candidate.version,
    claimedDigest: candidate.claimed_digest,
    actualDigest,
    digestOk: digestsEqual(candidate.claimed_digest, actualDigest),
    signature,
    binaryBytes: candidate.binary.length,
  };
}

export function registerInspectCommand(program: Command): void {
  program
    .command("inspect <package>")
    .description("Check an update package's contents, digest and signature")
    .option("--name <name>", "Artifact name (default: derived from the file name)")
    .option("--key <pem>", "Public key to verify the signature against")
    .action(async (packagePath: string, opts: { name?: string; key?: string }) => {
      let report: InspectReport;
      try {
        const archive = fs.readFileSync(packagePath);
        const key = opts.key ? fs.readFileSync(opts.key) : undefined;
        report = await inspectPackage(archive, opts.name ?? inferArtifactName(packagePath), key);
      } catch (err: unknown) {
        printError(`Cannot inspect ${packagePath}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }

      console.log();
      printDetail("Artifact", colors.bold(report.name));
      printDetail("Version", colors.version(report.version));
      printDetail("Binary", formatBytes(report.binaryBytes));
      printDetail("Claimed digest", colors.digest(report.claimedDigest));
      printDetail("Actual digest", colors.digest(report.actualDigest));
      printDetail("Signature", report.signature);
      console.log();

      if (!report.digestOk) {
        printError("Digest does not match the binary");
        process.exit(1);
      }
      if (report.signature === "invalid") {
        printError("Signature does not verify against the given key");
        process.exit(1);
      }
      printSuccess("Package is consistent");
    });
}
