/**
 * otakeeper CLI — Tests
 *
 * Tests for host parsing, packaging, package inspection, the agent client
 * (against a stubbed fetch) and output formatting.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import * as crypto from "crypto";
import JSZip from "jszip";
import { computeDigest, readPackage } from "@otakeeper/engine";
import { DEFAULT_AGENT_PORT, DEFAULT_TIMEOUT_MS, loadSettings, parseHost } from "../src/config";
import { FALLBACK_VERSION, packBinary, resolveVersion } from "../src/commands/pack";
import { inferArtifactName, inspectPackage } from "../src/commands/inspect";
import { deployToHost } from "../src/commands/upload";
import { queryHost } from "../src/commands/status";
import { createProgram } from "../src/program";
import {
  formatBytes,
  formatDuration,
  formatErrorCategory,
  shortDigest,
} from "../src/output";

const BINARY = Buffer.from("#!/bin/sh\necho commd\n");
const SETTINGS = { defaultPort: DEFAULT_AGENT_PORT, timeoutMs: 1000 };

let testDir: string;
let binaryPath: string;
let privateKeyPath: string;
let publicKey: string;

beforeEach(() => {
  testDir = fs.mkdtempSync(path.join(os.tmpdir(), "otakeeper-cli-test-"));
  binaryPath = path.join(testDir, "commd");
  fs.writeFileSync(binaryPath, BINARY);

  const pair = crypto.generateKeyPairSync("ed25519", {
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
  privateKeyPath = path.join(testDir, "release.pem");
  fs.writeFileSync(privateKeyPath, pair.privateKey);
  publicKey = pair.publicKey;
});

afterEach(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

// ─── Configuration ───────────────────────────────────────────

describe("parseHost", () => {
  it("uses the default port for a bare host", () => {
    expect(parseHost("10.0.0.7")).toEqual({
      host: "10.0.0.7",
      port: 8682,
      baseUrl: "http://10.0.0.7:8682",
      label: "10.0.0.7",
    });
  });

  it("takes an explicit port", () => {
    const target = parseHost("gateway.local:9000");
    expect(target.host).toBe("gateway.local");
    expect(target.port).toBe(9000);
    expect(target.baseUrl).toBe("http://gateway.local:9000");
  });

  it("honors a different default port", () => {
    expect(parseHost("gateway.local", 7000).port).toBe(7000);
  });

  it("handles IPv6 addresses", () => {
    expect(parseHost("[fe80::1]:9001").baseUrl).toBe("http://[fe80::1]:9001");
    expect(parseHost("[::1]").port).toBe(8682);
    expect(parseHost("::1").baseUrl).toBe("http://[::1]:8682");
  });

  it("rejects an empty host", () => {
    expect(() => parseHost(":9000")).toThrow('Invalid host ":9000": host name is empty');
  });

  it("rejects a bad port", () => {
    expect(() => parseHost("dev:0")).toThrow("port must be between 1 and 65535");
    expect(() => parseHost("dev:70000")).toThrow("port must be between 1 and 65535");
    expect(() => parseHost("dev:http")).toThrow("port must be between 1 and 65535");
  });
});

describe("loadSettings", () => {
  it("falls back to defaults", () => {
    expect(loadSettings({})).toEqual({
      defaultPort: DEFAULT_AGENT_PORT,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it("reads overrides from the environment", () => {
    expect(loadSettings({ OTAKEEPER_PORT: "9100", OTAKEEPER_TIMEOUT_MS: "5000" })).toEqual({
      defaultPort: 9100,
      timeoutMs: 5000,
    });
  });

  it("ignores values that are not positive integers", () => {
    expect(loadSettings({ OTAKEEPER_PORT: "abc" }).defaultPort).toBe(DEFAULT_AGENT_PORT);
  });
});

// ─── Pack ────────────────────────────────────────────────────

describe("packBinary", () => {
  it("writes a signed package the agent can read", async () => {
    const outputDir = path.join(testDir, "deploy");
    const result = await packBinary({
      binaryPath,
      version: "v3.1.0",
      outputDir,
      signKeyPath: privateKeyPath,
    });

    expect(result.outputPath).toBe(path.join(outputDir, "commd-ota.zip"));
    expect(result.name).toBe("commd");
    expect(result.signed).toBe(true);
    expect(result.digest).toBe(computeDigest(BINARY));

    const candidate = await readPackage(fs.readFileSync(result.outputPath), "commd");
    expect(candidate.version).toBe("v3.1.0");
    expect(candidate.binary.equals(BINARY)).toBe(true);
    expect(crypto.verify(null, BINARY, publicKey, candidate.signature)).toBe(true);
  });

  it("uses the given artifact name for entries and file", async () => {
    const result = await packBinary({
      binaryPath,
      version: "v1",
      name: "agentd",
      outputDir: testDir,
      signKeyPath: privateKeyPath,
    });

    expect(path.basename(result.outputPath)).toBe("agentd-ota.zip");
    const zip = await JSZip.loadAsync(fs.readFileSync(result.outputPath));
    expect(Object.keys(zip.files).sort()).toEqual([
      "agentd",
      "agentd.sha256",
      "agentd.sig",
      "agentd.version",
    ]);
  });

  it("leaves the signature out without a key", async () => {
    const result = await packBinary({ binaryPath, version: "v1", outputDir: testDir });
    expect(result.signed).toBe(false);

    const zip = await JSZip.loadAsync(fs.readFileSync(result.outputPath));
    expect(zip.file("commd.sig")).toBeNull();
  });

  it("fails for a key type that cannot sign packages", async () => {
    const { privateKey } = crypto.generateKeyPairSync("ec", {
      namedCurve: "prime256v1",
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
      publicKeyEncoding: { type: "spki", format: "pem" },
    });
    const ecKeyPath = path.join(testDir, "ec.pem");
    fs.writeFileSync(ecKeyPath, privateKey);

    await expect(
      packBinary({ binaryPath, version: "v1", outputDir: testDir, signKeyPath: ecKeyPath }),
    ).rejects.toThrow("Unsupported signing key type: ec");
    expect(fs.existsSync(path.join(testDir, "commd-ota.zip"))).toBe(false);
  });
});

describe("resolveVersion", () => {
  it("prefers an explicit label", () => {
    expect(resolveVersion("v2.0.0", testDir)).toBe("v2.0.0");
  });

  it("falls back outside a tagged checkout", () => {
    expect(resolveVersion(undefined, testDir)).toBe(FALLBACK_VERSION);
  });
});

describe("pack command", () => {
  it("passes --version to the package instead of printing the CLI version", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const outputDir = path.join(testDir, "out");

    await createProgram()
      .exitOverride()
      .parseAsync(["node", "otakeeper", "pack", binaryPath, "--version", "v9.9.9", "--output-dir", outputDir]);

    const candidate = await readPackage(
      fs.readFileSync(path.join(outputDir, "commd-ota.zip")),
      "commd",
    ).catch((err: unknown) => err);
    // unsigned, so only the missing signature is reported
    expect(candidate).toMatchObject({ message: "Missing commd.sig in update package" });

    const zip = await JSZip.loadAsync(fs.readFileSync(path.join(outputDir, "commd-ota.zip")));
    expect(await zip.file("commd.version")?.async("string")).toBe("v9.9.9");
  });
});

// ─── Inspect ─────────────────────────────────────────────────

describe("inferArtifactName", () => {
  it("strips the package suffix", () => {
    expect(inferArtifactName("deploy/commd-ota.zip")).toBe("commd");
    expect(inferArtifactName("/tmp/agentd.zip")).toBe("agentd");
  });
});

describe("inspectPackage", () => {
  async function packed(): Promise<Buffer> {
    const result = await packBinary({
      binaryPath,
      version: "v1.0.0",
      outputDir: testDir,
      signKeyPath: privateKeyPath,
    });
    return fs.readFileSync(result.outputPath);
  }

  it("reports a consistent package", async () => {
    const report = await inspectPackage(await packed(), "commd", publicKey);
    expect(report).toEqual({
      name: "commd",
      version: "v1.0.0",
      claimedDigest: computeDigest(BINARY),
      actualDigest: computeDigest(BINARY),
      digestOk: true,
      signature: "valid",
      binaryBytes: BINARY.length,
    });
  });

  it("skips the signature without a key", async () => {
    expect((await inspectPackage(await packed(), "commd")).signature).toBe("unchecked");
  });

  it("flags a signature from another key", async () => {
    const other = crypto.generateKeyPairSync("ed25519", {
      publicKeyEncoding: { type: "spki", format: "pem" },
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
    });
    expect((await inspectPackage(await packed(), "commd", other.publicKey)).signature).toBe(
      "invalid",
    );
  });

  it("flags a digest that does not match the binary", async () => {
    const zip = await JSZip.loadAsync(await packed());
    zip.file("commd", Buffer.from("#!/bin/sh\necho swapped\n"));
    const tampered = await zip.generateAsync({ type: "nodebuffer" });

    const report = await inspectPackage(tampered, "commd", publicKey);
    expect(report.digestOk).toBe(false);
    expect(report.signature).toBe("invalid");
  });
});

// ─── Agent Client ────────────────────────────────────────────

describe("deployToHost", () => {
  it("reports a committed update", async () => {
    const fetchMock = vi.fn(async (_url: string) =>
      jsonResponse(200, {
        detail: "Update successful",
        version: "v1.0.0",
        digest: computeDigest(BINARY),
        transaction_id: "tx-1",
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await deployToHost("gateway.local:9000", BINARY, "commd-ota.zip", SETTINGS);

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://gateway.local:9000/api/ota/upload");
    expect(result).toMatchObject({
      host: "gateway.local:9000",
      ok: true,
      detail: "Update successful",
      version: "v1.0.0",
    });
  });

  it("reports an agent rejection with its category", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string) =>
        jsonResponse(500, {
          detail: "Failed to start new binary, rollback done",
          category: "INSTALL_FAILURE",
        }),
      ),
    );

    const result = await deployToHost("10.0.0.7", BINARY, "commd-ota.zip", SETTINGS);
    expect(result).toMatchObject({
      ok: false,
      detail: "Failed to start new binary, rollback done",
      category: "INSTALL_FAILURE",
    });
  });

  it("reports a non-JSON reply", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string) => new Response("<html>Bad Gateway</html>", { status: 502 })),
    );

    const result = await deployToHost("10.0.0.7", BINARY, "commd-ota.zip", SETTINGS);
    expect(result.ok).toBe(false);
    expect(result.detail).toBe("Unexpected reply (HTTP 502)");
  });

  it("reports network errors without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string) => {
        throw new Error("connect ECONNREFUSED 10.0.0.7:8682");
      }),
    );

    const result = await deployToHost("10.0.0.7", BINARY, "commd-ota.zip", SETTINGS);
    expect(result.ok).toBe(false);
    expect(result.detail).toBe("connect ECONNREFUSED 10.0.0.7:8682");
  });

  it("reports a malformed host without contacting anything", async () => {
    const fetchMock = vi.fn(async (_url: string) => jsonResponse(200, {}));
    vi.stubGlobal("fetch", fetchMock);

    const result = await deployToHost("dev:0", BINARY, "commd-ota.zip", SETTINGS);
    expect(result.ok).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("queryHost", () => {
  it("returns the committed version", async () => {
    const fetchMock = vi.fn(async (_url: string) =>
      jsonResponse(200, { version: "v1.0.0", hash: computeDigest(BINARY) }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const status = await queryHost("10.0.0.7", SETTINGS);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://10.0.0.7:8682/api/ota/version");
    expect(status).toEqual({
      host: "10.0.0.7",
      reachable: true,
      version: "v1.0.0",
      digest: computeDigest(BINARY),
    });
  });

  it("passes through a device with nothing committed", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string) => jsonResponse(200, { version: null, hash: null })),
    );

    const status = await queryHost("10.0.0.7", SETTINGS);
    expect(status.reachable).toBe(true);
    expect(status.version).toBeNull();
  });

  it("reports HTTP errors as unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string) => jsonResponse(500, { error: "Internal server error" })),
    );

    const status = await queryHost("10.0.0.7", SETTINGS);
    expect(status).toMatchObject({ reachable: false, error: "Agent answered HTTP 500" });
  });
});

// ─── Program ─────────────────────────────────────────────────

describe("createProgram", () => {
  it("registers every command", () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(["pack", "inspect", "upload", "status"]);
  });
});

// ─── Output Formatting ───────────────────────────────────────

describe("Output Formatting", () => {
  describe("formatBytes", () => {
    it("formats bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(512)).toBe("512.0 B");
      expect(formatBytes(1536)).toBe("1.5 KB");
      expect(formatBytes(64 * 1024 * 1024)).toBe("64.0 MB");
    });
  });

  describe("formatDuration", () => {
    it("formats durations", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(4200)).toBe("4.2s");
      expect(formatDuration(125_000)).toBe("2m 5s");
    });
  });

  describe("formatErrorCategory", () => {
    it("labels known categories and passes unknown ones through", () => {
      expect(formatErrorCategory("BUSY_ERROR")).toBe("Another update is in progress");
      expect(formatErrorCategory("SOMETHING_NEW")).toBe("SOMETHING_NEW");
    });
  });

  describe("shortDigest", () => {
    it("keeps the first 12 characters", () => {
      const digest = computeDigest(BINARY);
      const short = shortDigest(digest);
      expect(short).toContain(digest.slice(0, 12));
      expect(short).not.toContain(digest.slice(0, 13));
    });
  });
});
