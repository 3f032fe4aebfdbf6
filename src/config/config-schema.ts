import { z } from "zod";
import { MIN_FRAME_SIZE } from "../core/packet-codec.js";
import { Level } from "../types/level.js";

const positiveMs = z.number().int().positive();
const capacityBytes = z.number().int().min(MIN_FRAME_SIZE).max(2 ** 32);

export const connectionOptionsSchema = z
  .object({
    host: z.string().trim().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    room: z.string().min(1).optional(),
    timeoutMs: positiveMs.optional(),

    reconnect: z
      .object({
        enabled: z.boolean().optional(),
        intervalMs: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),

    backlog: z
      .object({
        enabled: z.boolean().optional(),
        capacityBytes: capacityBytes.optional(),
        flushOn: z.nativeEnum(Level).optional(),
        keepOpen: z.boolean().optional(),
      })
      .strict()
      .optional(),

    async: z
      .object({
        enabled: z.boolean().optional(),
        capacityBytes: capacityBytes.optional(),
        throttle: z.boolean().optional(),
        clearOnDisconnect: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ValidatedConnectionOptions = z.infer<typeof connectionOptionsSchema>;

/** Render zod issues as `path: message` pairs. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
