/**
 * otakeeper Engine — Service Controller
 *
 * Thin shim between the update engine and the supervisor. Stop and start
 * are best effort: a unit that is already stopped, or missing entirely,
 * must not abort an update or a rollback, so failures are logged and
 * swallowed here.
 *
 * Health is judged only by "does the supervisor report the unit active".
 * A service that stays up but does not do its job passes the probe.
 */

import { Logger } from "../utils/logger";
import { HealthPolicy } from "../types";
import { Supervisor } from "./supervisor";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ServiceController {
  constructor(
    readonly serviceName: string,
    private readonly supervisor: Supervisor,
    private readonly logger: Logger,
  ) {}

  async stop(): Promise<void> {
    this.logger.info({ service: this.serviceName }, "Stopping service");
    try {
      await this.supervisor.stop(this.serviceName);
    } catch (err: unknown) {
      this.logger.warn(
        { service: this.serviceName, error: errorMessage(err) },
        "Service stop reported an error, continuing",
      );
    }
  }

  async start(): Promise<void> {
    this.logger.info({ service: this.serviceName }, "Starting service");
    try {
      await this.supervisor.start(this.serviceName);
    } catch (err: unknown) {
      this.logger.warn(
        { service: this.serviceName, error: errorMessage(err) },
        "Service start reported an error, continuing",
      );
    }
  }

  async isRunning(): Promise<boolean> {
    try {
      return await this.supervisor.isActive(this.serviceName);
    } catch (err: unknown) {
      this.logger.warn(
        { service: this.serviceName, error: errorMessage(err) },
        "Service status query failed",
      );
      return false;
    }
  }

  /**
   * Poll up to `maxAttempts` times, `intervalMs` apart.
   * Healthy on the first poll that reports the service active.
   */
  async probeHealthy(maxAttempts: number, intervalMs: number): Promise<boolean> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (await this.isRunning()) {
        this.logger.info(
          { service: this.serviceName, attempt },
          "Service reported active",
        );
        return true;
      }
      if (attempt < maxAttempts) await sleep(intervalMs);
    }

    this.logger.error(
      { service: this.serviceName, attempts: maxAttempts },
      "Service never reported active",
    );
    return false;
  }

  /**
   * Poll up to `maxAttempts` times, `intervalMs` apart.
   * Healthy only if every poll reports the service active, so a binary
   * that starts and then crashes within the window is caught.
   */
  async probeStable(maxAttempts: number, intervalMs: number): Promise<boolean> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (!(await this.isRunning())) {
        this.logger.error(
          { service: this.serviceName, attempt },
          "Service stopped reporting active",
        );
        return false;
      }
      if (attempt < maxAttempts) await sleep(intervalMs);
    }

    this.logger.info(
      { service: this.serviceName, attempts: maxAttempts },
      "Service stayed active for the whole probe window",
    );
    return true;
  }

  /**
   * Run the probe selected by a health policy.
   */
  async probe(policy: HealthPolicy): Promise<boolean> {
    return policy.strategy === "stay-active"
      ? this.probeStable(policy.attempts, policy.interval_ms)
      : this.probeHealthy(policy.attempts, policy.interval_ms);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
