/**
 * otakeeper CLI -- Pack Command
 *
 * Builds an update package from a compiled binary.
 *
 * Usage:
 *   otakeeper pack ./build/commd --sign-key release.pem
 *   otakeeper pack ./build/commd --version v1.4.0 --output-dir ./out
 *
 * Output:
 *   ✔ Packed commd v1.4.0-3-g1a2b3c4
 *     Package:   deploy/commd-ota.zip
 *     Digest:    5f1e...
 *     Signature: verified against the derived public key
 */

import { Command } from "commander";
import { execFileSync } from "child_process";
import * as fs from "fs";
import * as path from "path";
import {
  Logger,
  buildPackage,
  computeDigest,
  createLogger,
  parseTrustedKey,
  publicKeyFromPrivate,
  signMessage,
  verifySignature,
} from "@otakeeper/engine";
import {
  printSuccess,
  printError,
  printWarn,
  printDetail,
  formatBytes,
  colors,
} from "../output";

/** Used when the build is not inside a tagged git checkout */
export const FALLBACK_VERSION = "v0.0.0";

export interface PackOptions {
  binaryPath: string;
  /** Defaults to `git describe --tags --long` */
  version?: string;
  /** Defaults to the binary's file name */
  name?: string;
  outputDir: string;
  signKeyPath?: string;
  logger?: Logger;
}

export interface PackResult {
  outputPath: string;
  name: string;
  version: string;
  digest: string;
  bytes: number;
  signed: boolean;
}

export function resolveVersion(explicit: string | undefined, cwd?: string): string {
  if (explicit) return explicit;
  try {
    const described = execFileSync("git", ["describe", "--tags", "--long"], {
      cwd,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();
    return described || FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

/**
 * Build `<name>-ota.zip` in the output directory. With a signing key the
 * signature is checked against the key's own public half before the
 * package is written, so a broken key never produces a package.
 */
export async function packBinary(options: PackOptions): Promise<PackResult> {
  const logger = options.logger ?? createLogger({ level: "silent" });
  const binary = fs.readFileSync(options.binaryPath);
  const name = options.name ?? path.basename(options.binaryPath);
  const version = resolveVersion(options.version, path.dirname(options.binaryPath));

  let signature: Buffer | undefined;
  if (options.signKeyPath) {
    const keyPem = fs.readFileSync(options.signKeyPath);
    signature = signMessage(keyPem, binary);
    const trusted = parseTrustedKey(publicKeyFromPrivate(keyPem));
    if (!verifySignature(trusted, binary, signature, logger)) {
      throw new Error("Signature does not verify against the signing key's public key");
    }
  }

  const archive = await buildPackage({ artifact_name: name, binary, version, signature });

  fs.mkdirSync(options.outputDir, { recursive: true });
  const outputPath = path.join(options.outputDir, `${name}-ota.zip`);
  fs.writeFileSync(outputPath, archive);

  return {
    outputPath,
    name,
    version,
    digest: computeDigest(binary),
    bytes: archive.length,
    signed: signature !== undefined,
  };
}

export function registerPackCommand(program: Command): void {
  program
    .command("pack <binary>")
    .description("Build an update package from a compiled binary")
    .option("--version <label>", "Version label (default: git describe --tags --long)")
    .option("--name <name>", "Artifact name (default: binary file name)")
    .option("--output-dir <dir>", "Where to write the package", "./deploy")
    .option("--sign-key <pem>", "Private key (RSA or Ed25519) to sign the binary with")
    .action(
      async (
        binary: string,
        opts: { version?: string; name?: string; outputDir: string; signKey?: string },
      ) => {
        let result: PackResult;
        try {
          result = await packBinary({
            binaryPath: binary,
            version: opts.version,
            name: opts.name,
            outputDir: opts.outputDir,
            signKeyPath: opts.signKey,
          });
        } catch (err: unknown) {
          printError(`Packing failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        }

        printSuccess(`Packed ${colors.bold(result.name)} ${colors.version(result.version)}`);
        printDetail("Package", `${result.outputPath} (${formatBytes(result.bytes)})`);
        printDetail("Digest", colors.digest(result.digest));
        if (result.signed) {
          printDetail("Signature", "verified against the derived public key");
        } else {
          printWarn("Package is unsigned; agents will reject it until it is signed.");
        }
      },
    );
}
