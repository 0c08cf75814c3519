/**
 * Shared fixtures for engine tests: throwaway device directories, an
 * in-process supervisor and signed packages.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import JSZip from "jszip";
import { Supervisor } from "../src/service/supervisor";
import { EngineOptions } from "../src/types";
import { buildPackage } from "../src/package";
import { signMessage } from "../src/signature";
import { createLogger } from "../src/utils/logger";

export const ARTIFACT = "commd";
export const SERVICE = "commd.service";

export const silentLogger = createLogger({ level: "silent" });

export interface KeyPair {
  publicKey: string;
  privateKey: string;
}

export function ed25519KeyPair(): KeyPair {
  return crypto.generateKeyPairSync("ed25519", {
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
}

export function rsaKeyPair(): KeyPair {
  return crypto.generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
}

export interface TestDevice {
  root: string;
  options: EngineOptions;
  binaryPath: string;
  metadataDir: string;
}

/**
 * A fresh device layout under the OS temp dir. The metadata directory is
 * only created when `withMetadataDir` is set.
 */
export function createDevice(withMetadataDir: boolean = true): TestDevice {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "otakeeper-test-"));
  const binaryPath = path.join(root, "bin", ARTIFACT);
  const metadataDir = path.join(root, "meta");
  fs.mkdirSync(path.dirname(binaryPath), { recursive: true });
  if (withMetadataDir) {
    fs.mkdirSync(metadataDir, { recursive: true });
  }

  return {
    root,
    binaryPath,
    metadataDir,
    options: {
      binary_path: binaryPath,
      metadata_dir: metadataDir,
      service_name: SERVICE,
      health: { attempts: 3, interval_ms: 1 },
      verbose: false,
    },
  };
}

export function removeDevice(device: TestDevice): void {
  fs.rmSync(device.root, { recursive: true, force: true });
}

/**
 * Supervisor stand-in. A started unit is active unless the binary on disk
 * is missing or contains the marker "crash".
 */
export class FakeSupervisor implements Supervisor {
  readonly calls: string[] = [];
  private running = false;

  constructor(private readonly binaryPath: string) {}

  async stop(unit: string): Promise<void> {
    this.calls.push(`stop ${unit}`);
    this.running = false;
  }

  async start(unit: string): Promise<void> {
    this.calls.push(`start ${unit}`);
    this.running =
      fs.existsSync(this.binaryPath) &&
      !fs.readFileSync(this.binaryPath).includes("crash");
  }

  async isActive(unit: string): Promise<boolean> {
    this.calls.push(`is-active ${unit}`);
    return this.running;
  }

  /** Calls that changed the unit's state, ignoring status polls */
  controlCalls(): string[] {
    return this.calls.filter((call) => !call.startsWith("is-active"));
  }
}

export async function signedPackage(
  keys: KeyPair,
  binary: Buffer,
  version: string,
): Promise<Buffer> {
  return buildPackage({
    artifact_name: ARTIFACT,
    binary,
    version,
    signature: signMessage(keys.privateKey, binary),
  });
}

/**
 * Build an archive from raw entries, for packages that buildPackage
 * would refuse to produce.
 */
export async function rawArchive(entries: Record<string, string | Buffer>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}
