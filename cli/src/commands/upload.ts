/**
 * otakeeper CLI -- Upload Command
 *
 * Deploys one package to one or more devices, one at a time. A failing
 * device does not stop the rollout; the exit code reports whether every
 * device took the update.
 *
 * Usage:
 *   otakeeper upload deploy/commd-ota.zip 10.0.0.7 10.0.0.8:9000
 */

import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import { uploadPackage } from "../agent-client";
import { CliSettings, loadSettings, parseHost } from "../config";
import {
  printSuccess,
  printError,
  printInfo,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";

export interface DeployResult {
  host: string;
  ok: boolean;
  /** What the agent (or the network) said */
  detail: string;
  version?: string;
  category?: string;
  durationMs: number;
}

/**
 * Upload to a single host. Never throws: bad host syntax, network errors
 * and agent rejections all come back as `ok: false`.
 */
export async function deployToHost(
  hostSpec: string,
  archive: Buffer,
  filename: string,
  settings: CliSettings,
): Promise<DeployResult> {
  const started = Date.now();
  const done = (fields: Omit<DeployResult, "host" | "durationMs">): DeployResult => ({
    host: hostSpec,
    durationMs: Date.now() - started,
    ...fields,
  });

  try {
    const target = parseHost(hostSpec, settings.defaultPort);
    const outcome = await uploadPackage(target, archive, filename, settings.timeoutMs);
    return done({
      ok: outcome.ok,
      detail: outcome.detail,
      version: outcome.version,
      category: outcome.category,
    });
  } catch (err: unknown) {
    return done({ ok: false, detail: err instanceof Error ? err.message : String(err) });
  }
}

export function registerUploadCommand(program: Command): void {
  program
    .command("upload <package> <hosts...>")
    .description("Upload an update package to one or more agents")
    .option("--timeout <ms>", "Per-host request timeout in milliseconds")
    .action(async (packagePath: string, hosts: string[], opts: { timeout?: string }) => {
      const settings = loadSettings();
      if (opts.timeout) {
        settings.timeoutMs = parseInt(opts.timeout, 10) || settings.timeoutMs;
      }

      let archive: Buffer;
      try {
        archive = fs.readFileSync(packagePath);
      } catch (err: unknown) {
        printError(`Cannot read ${packagePath}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
      const filename = path.basename(packagePath);

      const failed: string[] = [];
      for (const host of hosts) {
        const spinner = createSpinner(`Updating ${colors.host(host)}...`);
        spinner.start();
        const result = await deployToHost(host, archive, filename, settings);

        if (result.ok) {
          spinner.succeed(
            `${colors.host(host)} now runs ${colors.version(result.version ?? "?")} ` +
              colors.dim(`(${formatDuration(result.durationMs)})`),
          );
        } else {
          failed.push(host);
          const reason = result.category
            ? `${result.detail} ${colors.dim(`[${formatErrorCategory(result.category)}]`)}`
            : result.detail;
          spinner.fail(`${colors.host(host)}: ${reason}`);
        }
      }

      console.log();
      if (failed.length > 0) {
        printError(`${failed.length} of ${hosts.length} host(s) failed: ${failed.join(", ")}`);
        process.exit(1);
      }
      printSuccess(`All ${hosts.length} host(s) updated`);
      printInfo(`Check with ${colors.bold(`otakeeper status ${hosts.join(" ")}`)}`);
    });
}
