/**
 * otakeeper Engine — Startup Reconciler Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import { reconcile } from "../src/reconciler";
import { MetadataStore, resolvePaths } from "../src/metadata-store";
import { computeDigest } from "../src/integrity";
import {
  FakeSupervisor,
  SERVICE,
  TestDevice,
  createDevice,
  removeDevice,
  silentLogger,
} from "./helpers";

const GOOD = Buffer.from("#!/bin/sh\n# commd v1\n");
const HALF_WRITTEN = Buffer.from("#!/bin/sh\n# com");

describe("reconcile", () => {
  let device: TestDevice;

  afterEach(() => {
    removeDevice(device);
  });

  function setup(withMetadataDir: boolean = true) {
    device = createDevice(withMetadataDir);
    const supervisor = new FakeSupervisor(device.binaryPath);
    const store = new MetadataStore(resolvePaths(device.options), silentLogger);
    const run = () => reconcile(device.options, { supervisor, logger: silentLogger });
    return { supervisor, store, run };
  }

  function recordCommitted(store: MetadataStore, binary: Buffer): void {
    store.writeRecorded({
      version: "v1.0.0",
      digest: computeDigest(binary),
      committed_at: "2026-01-01T00:00:00.000Z",
    });
  }

  it("creates a missing metadata directory and stops there", async () => {
    const { supervisor, run } = setup(false);
    fs.writeFileSync(device.binaryPath, GOOD);

    const result = await run();

    expect(result.action).toBe("INITIALIZED");
    expect(fs.statSync(device.metadataDir).isDirectory()).toBe(true);
    expect(supervisor.calls).toEqual([]);
  });

  it("does nothing on a device with no binary and no backup", async () => {
    const { supervisor, run } = setup();

    const result = await run();

    expect(result).toEqual({
      action: "NOTHING_INSTALLED",
      expected_digest: null,
      actual_digest: null,
      residuals_removed: [],
    });
    expect(supervisor.calls).toEqual([]);
  });

  it("leaves a binary that matches the recorded digest alone", async () => {
    const { supervisor, store, run } = setup();
    fs.writeFileSync(device.binaryPath, GOOD);
    fs.writeFileSync(store.paths.backup, "older build");
    recordCommitted(store, GOOD);

    const result = await run();

    expect(result.action).toBe("CONSISTENT");
    expect(result.actual_digest).toBe(computeDigest(GOOD));
    expect(fs.readFileSync(device.binaryPath).equals(GOOD)).toBe(true);
    expect(supervisor.calls).toEqual([]);
  });

  it("restores the backup over a binary that does not match", async () => {
    const { supervisor, store, run } = setup();
    fs.writeFileSync(device.binaryPath, HALF_WRITTEN);
    fs.writeFileSync(store.paths.backup, GOOD);
    recordCommitted(store, GOOD);

    const result = await run();

    expect(result).toEqual({
      action: "RESTORED",
      expected_digest: computeDigest(GOOD),
      actual_digest: computeDigest(HALF_WRITTEN),
      residuals_removed: [],
    });
    expect(fs.readFileSync(device.binaryPath).equals(GOOD)).toBe(true);
    expect(supervisor.controlCalls()).toEqual([`stop ${SERVICE}`, `start ${SERVICE}`]);
  });

  it("treats a binary with nothing recorded as untrusted", async () => {
    const { store, run } = setup();
    fs.writeFileSync(device.binaryPath, HALF_WRITTEN);
    fs.writeFileSync(store.paths.backup, GOOD);

    const result = await run();

    expect(result.action).toBe("RESTORED");
    expect(result.expected_digest).toBeNull();
    expect(fs.readFileSync(device.binaryPath).equals(GOOD)).toBe(true);
  });

  it("puts the backup back when the live binary is missing", async () => {
    const { store, run } = setup();
    fs.writeFileSync(store.paths.backup, GOOD);
    recordCommitted(store, GOOD);

    const result = await run();

    expect(result.action).toBe("RESTORED");
    expect(result.actual_digest).toBeNull();
    expect(fs.readFileSync(device.binaryPath).equals(GOOD)).toBe(true);
  });

  it("reports an untrusted binary it cannot repair", async () => {
    const { supervisor, store, run } = setup();
    fs.writeFileSync(device.binaryPath, HALF_WRITTEN);
    recordCommitted(store, GOOD);

    const result = await run();

    expect(result.action).toBe("UNRECOVERABLE");
    expect(fs.readFileSync(device.binaryPath).equals(HALF_WRITTEN)).toBe(true);
    expect(supervisor.controlCalls()).toEqual([`stop ${SERVICE}`, `start ${SERVICE}`]);
  });

  it("removes staging files left by an interrupted update", async () => {
    const { store, run } = setup();
    fs.writeFileSync(store.paths.staging, HALF_WRITTEN);

    const result = await run();

    expect(result.action).toBe("NOTHING_INSTALLED");
    expect(result.residuals_removed).toEqual([store.paths.staging]);
    expect(fs.existsSync(store.paths.staging)).toBe(false);
  });
});
