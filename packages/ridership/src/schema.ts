import { z } from "zod";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Epoch seconds, or an ISO-8601 date/time. Values without a zone are read as
 * UTC; a space between date and time is accepted.
 */
export function parseTimestamp(value: string): number | null {
  const s = value.trim();
  if (/^\d+$/.test(s)) return Number(s);

  let iso = s.replace(" ", "T");
  if (DATE_ONLY.test(s)) iso = `${s}T00:00:00Z`;
  else if (!HAS_ZONE.test(s)) iso = `${iso}Z`;

  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

const optionalId = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

export const ReadingRowSchema = z.object({
  device_id: optionalId,
  c_a: optionalId,
  unit: optionalId,
  scp: optionalId,
  station_id: optionalId,
  timestamp: z.string().transform((value, ctx) => {
    const t = parseTimestamp(value);
    if (t === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unreadable timestamp "${value}"` });
      return z.NEVER;
    }
    return t;
  }),
  net_increment: z
    .string()
    .trim()
    .regex(/^\d+$/, "net_increment must be a non-negative integer")
    .transform(Number),
});

const idMap = z.record(
  z.string(),
  z.union([z.string().min(1), z.number()]).transform(String),
);

export const TopologyFileSchema = z.object({
  devices: idMap.default({}),
  complexes: idMap.default({}),
  deviceCounts: z.record(z.string(), z.number().int().nonnegative()).default({}),
});

export const formatZodError = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
