/**
 * Cloud response schemas
 *
 * Schemas are the source of truth for response shapes; the client maps
 * their output into the controller's own types.
 */

import { z } from 'zod';

import type { JSONValue } from '$types';

// ═══════════════════════════════════════════════════════════════
// Generic
// ═══════════════════════════════════════════════════════════════

export const JsonValueSchema: z.ZodType<JSONValue> = z.lazy(function() {
  return z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ]);
});

export const JsonObjectSchema = z.record(JsonValueSchema);

/**
 * Every vendor response: a result, or an error payload
 */
export const EnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      msg: z.string().optional(),
    })
    .optional(),
});

// ═══════════════════════════════════════════════════════════════
// Roster and relay
// ═══════════════════════════════════════════════════════════════

export const RosterSchema = z.object({
  hasRelay: z.boolean().optional(),
  devices: z
    .array(
      z.object({
        type: z.string(),
        data: z.object({
          id: z.number(),
          name: z.string().optional(),
          typeCode: z.number().optional(),
          status: z
            .object({
              pim: z.number().optional(),
            })
            .optional(),
        }),
      })
    )
    .nullable()
    .optional(),
});

export const RelayCandidatesSchema = z
  .array(
    z.object({
      id: z.number(),
    })
  )
  .nullable();

export const ConnectResultSchema = z.object({
  state: z.number(),
});

export const PollResultSchema = z.number();

// ═══════════════════════════════════════════════════════════════
// Fountain
// ═══════════════════════════════════════════════════════════════

/** [start, end] pairs in minutes since midnight */
const MultiRangeSchema = z.array(z.array(z.number())).optional();

export const FountainSettingsSchema = z.object({
  smartWorkingTime: z.number(),
  smartSleepTime: z.number(),
  lampRingSwitch: z.number(),
  lampRingBrightness: z.number(),
  lightMultiRange: MultiRangeSchema,
  noDisturbingSwitch: z.number(),
  disturbMultiRange: MultiRangeSchema,
});

export const FountainDetailSchema = z.object({
  id: z.number(),
  name: z.string(),
  mac: z.string(),
  typeCode: z.number(),
  powerStatus: z.number(),
  mode: z.number(),
  settings: FountainSettingsSchema,
});

export type FountainDetail = z.infer<typeof FountainDetailSchema>;

// ═══════════════════════════════════════════════════════════════
// Litter box
// ═══════════════════════════════════════════════════════════════

export const LitterRecordsSchema = z.array(
  z.object({
    enumEventType: z.string().optional(),
    timestamp: z.number().optional(),
    content: z
      .object({
        result: z.number().optional(),
      })
      .optional(),
  })
);
