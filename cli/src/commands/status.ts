/**
 * otakeeper CLI — Status Command
 *
 * Shows which version each device is running.
 *
 * Usage:
 *   otakeeper status 10.0.0.7 10.0.0.8:9000
 */

import { Command } from 'commander';
import { fetchVersion } from '../agent-client';
import { CliSettings, loadSettings, parseHost } from '../config';
import { printTable, shortDigest, colors } from '../output';

export interface HostStatus {
  host: string;
  reachable: boolean;
  version: string | null;
  digest: string | null;
  error?: string;
}

/**
 * Never throws; an unreachable or misbehaving agent is reported in `error`.
 */
export async function queryHost(hostSpec: string, settings: CliSettings): Promise<HostStatus> {
  try {
    const target = parseHost(hostSpec, settings.defaultPort);
    const installed = await fetchVersion(target, settings.timeoutMs);
    return { host: hostSpec, reachable: true, ...installed };
  } catch (err: unknown) {
    return {
      host: hostSpec,
      reachable: false,
      version: null,
      digest: null,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status <hosts...>')
    .description('Show the committed version on each agent')
    .action(async (hosts: string[]) => {
      const settings = loadSettings();
      const statuses = await Promise.all(hosts.map((host) => queryHost(host, settings)));

      printTable({
        head: ['Host', 'Version', 'Digest', 'Status'],
        rows: statuses.map((s) => [
          colors.host(s.host),
          s.version ? colors.version(s.version) : colors.dim('(none)'),
          shortDigest(s.digest),
          s.reachable ? colors.success('ok') : colors.error(s.error ?? 'unreachable'),
        ]),
      });

      if (statuses.some((s) => !s.reachable)) {
        process.exit(1);
      }
    });
}
