import { z } from "zod";

/**
 * Options accepted by pack().
 *
 * @property password - store password; protects every key without an override
 *   and seeds the whole-file digest
 * @property keyPasswords - per-alias override for the key protection password
 */
export const PackOptionsSchema = z.object({
  password: z.string(),
  keyPasswords: z.record(z.string(), z.string()).optional(),
});

export type PackOptions = z.infer<typeof PackOptionsSchema>;
