/**
 * otakeeper Agent — Request Validation Schemas (Zod)
 *
 * Query input is validated before hitting route handlers.
 */

import { z } from "zod";

// ─── Update History ──────────────────────────────────────────

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
