/**
 * otakeeper Engine — Process Supervisor
 *
 * The engine never starts or stops the managed executable itself; it asks
 * the OS supervisor to. Tests substitute an in-process implementation.
 */

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface Supervisor {
  stop(unit: string): Promise<void>;
  start(unit: string): Promise<void>;
  /** Resolves true only when the unit reports a clean "active" state */
  isActive(unit: string): Promise<boolean>;
}

/**
 * Supervisor backed by systemd's `systemctl`.
 */
export class SystemctlSupervisor implements Supervisor {
  constructor(private readonly systemctl: string = "systemctl") {}

  async stop(unit: string): Promise<void> {
    await execFileAsync(this.systemctl, ["stop", unit]);
  }

  async start(unit: string): Promise<void> {
    await execFileAsync(this.systemctl, ["start", unit]);
  }

  async isActive(unit: string): Promise<boolean> {
    try {
      await execFileAsync(this.systemctl, ["is-active", "--quiet", unit]);
      return true;
    } catch {
      // Non-zero exit: inactive, failed, activating or unknown unit
      return false;
    }
  }
}
