/**
 * otakeeper CLI — Agent Client
 *
 * Talks to the HTTP agent on a device. Replies are validated with zod, so
 * a proxy error page or an older agent shows up as a readable failure
 * instead of undefined fields.
 */

import { z } from "zod";
import { AgentTarget } from "./config";

const UploadReplySchema = z.object({
  detail: z.string(),
  transaction_id: z.string().optional(),
  version: z.string().optional(),
  digest: z.string().optional(),
  category: z.string().optional(),
});

const VersionReplySchema = z.object({
  version: z.string().nullable(),
  hash: z.string().nullable(),
});

export interface UploadOutcome {
  ok: boolean;
  status: number;
  detail: string;
  version?: string;
  digest?: string;
  category?: string;
}

export interface AgentVersion {
  version: string | null;
  digest: string | null;
}

/**
 * POST a package to the agent and wait for the update to finish.
 * Network errors and timeouts reject; HTTP errors resolve with ok=false.
 */
export async function uploadPackage(
  target: AgentTarget,
  archive: Buffer,
  filename: string,
  timeoutMs: number,
): Promise<UploadOutcome> {
  const form = new FormData();
  form.append("file", new Blob([new Uint8Array(archive)], { type: "application/zip" }), filename);

  const res = await fetch(`${target.baseUrl}/api/ota/upload`, {
    method: "POST",
    body: form,
    signal: AbortSignal.timeout(timeoutMs),
  });

  const parsed = UploadReplySchema.safeParse(await readJson(res));
  if (!parsed.success) {
    return { ok: false, status: res.status, detail: `Unexpected reply (HTTP ${res.status})` };
  }

  return { ok: res.ok, status: res.status, ...parsed.data };
}

/**
 * GET the committed version and digest from the agent.
 *
 * @throws on network errors, timeouts, HTTP errors or a malformed reply
 */
export async function fetchVersion(target: AgentTarget, timeoutMs: number): Promise<AgentVersion> {
  const res = await fetch(`${target.baseUrl}/api/ota/version`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!res.ok) {
    throw new Error(`Agent answered HTTP ${res.status}`);
  }

  const parsed = VersionReplySchema.safeParse(await readJson(res));
  if (!parsed.success) {
    throw new Error("Agent sent a malformed version reply");
  }
  return { version: parsed.data.version, digest: parsed.data.hash };
}

async function readJson(res: Response): Promise<unknown> {
  try {
    const body: unknown = await res.json();
    return body;
  } catch {
    // Not JSON; the schema check reports it
    return null;
  }
}
