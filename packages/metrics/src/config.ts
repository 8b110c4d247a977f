import { GroupingKey } from "tp-shared/types";
import { z } from "zod";
import { parseResolution } from "./bucket";
import { ConfigError } from "./issues";

const resolutionSchema = z
  .union([z.number(), z.string()])
  .default("1h")
  .transform((value, ctx) => {
    const seconds = parseResolution(value);
    if (seconds === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a positive whole number of seconds or <n>s|m|h|d, got ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return seconds;
  });

export const PipelineConfigSchema = z
  .object({
    /** Bucket width; stored as seconds after parsing */
    bucketResolution: resolutionSchema,
    /** Buckets reported by fewer entities than this are low-confidence */
    minCoverage: z.number().int().nonnegative().default(0),
    /** Offsets added to each component score before multiplying */
    trafficWeight: z.number().finite().default(0),
    densityWeight: z.number().finite().default(0),
    groupingKey: z.nativeEnum(GroupingKey).default(GroupingKey.Station),
    /** Attribute an interval's rate to its end (default) or start */
    anchor: z.enum(["end", "start"]).default("end"),
    dropZeroRates: z.boolean().default(false),
    keepLowCoverage: z.boolean().default(false),
    /** Normalize priority over the whole table, or bucket by bucket */
    batching: z.enum(["pooled", "per-bucket"]).default("pooled"),
  })
  .strict();

export type PipelineOptions = z.input<typeof PipelineConfigSchema>;
export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type Anchor = PipelineConfig["anchor"];

export function resolveConfig(options: PipelineOptions = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
