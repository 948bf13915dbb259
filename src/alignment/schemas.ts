import { z } from 'zod';

/**
 * Runtime schemas for everything that crosses the library boundary:
 * field spec configuration, render parameters read back from a cache file,
 * and statistics exports loaded into a tracker.
 */

const FractionSchema = z.number().min(0).max(1);

export const FractionalWindowSchema = z
  .tuple([FractionSchema, FractionSchema])
  .refine(([min, max]) => min < max, { message: 'window start must be below window end' });

export const FieldSpecSchema = z.object({
  name: z.string().trim().min(1),
  searchWindow: FractionalWindowSchema,
  darknessThreshold: z.number().int().min(1).max(256).default(200),
  minInkPixels: z.number().int().min(1).default(50),
  minInkColumnPixels: z.number().int().min(1).default(1),
  maxRowGap: z.number().int().min(0).default(3),
  horizontalWindow: FractionalWindowSchema.default([0, 1]),
  required: z.boolean().default(true),
});
export type FieldSpecInput = z.input<typeof FieldSpecSchema>;

export const FieldSpecListSchema = z
  .array(FieldSpecSchema)
  .min(1, { message: 'at least one field spec is required' })
  .superRefine((specs, ctx) => {
    const seen = new Set<string>();
    for (const [index, spec] of specs.entries()) {
      if (seen.has(spec.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field name "${spec.name}"`,
          path: [index, 'name'],
        });
      }
      seen.add(spec.name);
    }
  });

export const FieldOffsetSchema = z.object({
  dx: z.number().finite(),
  dy: z.number().finite(),
});

export const RenderParametersSchema = z.object({
  offsets: z.record(FieldOffsetSchema),
});

export const CacheSnapshotEntrySchema = z.object({
  key: z.string().min(1),
  payload: RenderParametersSchema,
  createdAt: z.number(),
  ttlSeconds: z.number().min(0),
  expiresAt: z.number(),
});
export type CacheSnapshotEntry = z.infer<typeof CacheSnapshotEntrySchema>;

export const CacheSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  entries: z.array(CacheSnapshotEntrySchema),
});

const TerminationReasonSchema = z.enum(['passed', 'exhausted', 'diverged', 'timeout', 'cancelled']);

// JSON turns Infinity into null; read it back as "never detected"
export const StatsRecordSchema = z.object({
  passed: z.boolean(),
  attemptsUsed: z.number().int().min(0),
  fieldOutcomes: z.record(z.boolean()),
  maxDifference: z
    .number()
    .nullable()
    .transform((value) => value ?? Number.POSITIVE_INFINITY),
  usedBestAvailable: z.boolean(),
  terminationReason: TerminationReasonSchema,
  timestamp: z.number(),
});

export const StatsExportSchema = z.object({
  exportedAt: z.string(),
  capacity: z.number().int().min(1),
  summary: z.unknown(),
  recommendations: z.array(z.string()),
  records: z.array(StatsRecordSchema),
});

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
