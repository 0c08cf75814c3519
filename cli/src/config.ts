/**
 * otakeeper CLI — Configuration
 *
 * Agent defaults and host parsing. Both defaults can be overridden from
 * the environment:
 *
 *   OTAKEEPER_PORT        agent port used when a host omits one (8682)
 *   OTAKEEPER_TIMEOUT_MS  per-request timeout in milliseconds (120000)
 */

/** Port the agent listens on unless told otherwise */
export const DEFAULT_AGENT_PORT = 8682;

/**
 * Uploads wait for the whole health probe on the device, so the default
 * timeout is generous.
 */
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface CliSettings {
  defaultPort: number;
  timeoutMs: number;
}

export interface AgentTarget {
  host: string;
  port: number;
  /** e.g. "http://10.0.0.7:8682" */
  baseUrl: string;
  /** The host as the user typed it, for display */
  label: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): CliSettings {
  return {
    defaultPort: parsePositive(env.OTAKEEPER_PORT, DEFAULT_AGENT_PORT),
    timeoutMs: parsePositive(env.OTAKEEPER_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  };
}

/**
 * Parse `host`, `host:port`, `[v6addr]` or `[v6addr]:port`.
 *
 * @throws if the host is empty or the port is not in 1..65535
 */
export function parseHost(spec: string, defaultPort: number = DEFAULT_AGENT_PORT): AgentTarget {
  const trimmed = spec.trim();
  let host: string;
  let portText: string | undefined;

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(trimmed);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else {
    const colon = trimmed.lastIndexOf(":");
    if (colon !== -1 && trimmed.indexOf(":") === colon) {
      host = trimmed.slice(0, colon);
      portText = trimmed.slice(colon + 1);
    } else {
      host = trimmed;
    }
  }

  if (host === "") {
    throw new Error(`Invalid host "${spec}": host name is empty`);
  }

  let port = defaultPort;
  if (portText !== undefined) {
    port = Number(portText);
    if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
      throw new Error(`Invalid host "${spec}": port must be between 1 and 65535`);
    }
  }

  const urlHost = host.includes(":") ? `[${host}]` : host;
  return { host, port, baseUrl: `http://${urlHost}:${port}`, label: trimmed };
}

function parsePositive(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}
