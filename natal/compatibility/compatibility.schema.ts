import { z } from "zod";

/**
 * Compatibility contract consumed from the remote match service.
 *
 * Shape only: scores are produced remotely and never recomputed here.
 */

const ScoreSchema = z.number().int().min(0).max(100);

export const CompatibilityContractSchema = z
  .object({
    overall_score: ScoreSchema.nullable(),
    per_system_scores: z.record(z.string().min(1), ScoreSchema),
    synastry_aspect_descriptions: z.array(z.string().min(1)),
  })
  .superRefine((val, ctx) => {
    if (val.overall_score !== null && val.synastry_aspect_descriptions.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "synastry_aspect_descriptions must not be empty when overall_score is present",
        path: ["synastry_aspect_descriptions"],
      });
    }
  });

/**
 * Wire format of the match service response.
 */
export const MatchResponseSchema = z.object({
  overallScore: z.number().nullish(),
  vedicScore: z.number().nullish(),
  chineseScore: z.number().nullish(),
  westernScore: z.number().nullish(),
  synastryAspects: z.array(z.string()).default([]),
  userChart: z.record(z.string(), z.record(z.string(), z.number())).nullish(),
  partnerChart: z.record(z.string(), z.record(z.string(), z.number())).nullish(),
});

export type CompatibilityContract = z.infer<typeof CompatibilityContractSchema>;
