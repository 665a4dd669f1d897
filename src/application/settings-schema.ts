import { z } from 'zod';
import { SENSITIVITY_MAX, SENSITIVITY_MIN } from '../domain/index.js';

/**
 * Zod schema for `PATCH /api/v1/settings`.
 *
 * Partial update; unknown keys are rejected and an empty body is an error.
 */
export const settingsPatchSchema = z
  .object({
    sensitivity: z
      .number()
      .min(SENSITIVITY_MIN, `sensitivity must be at least ${SENSITIVITY_MIN}`)
      .max(SENSITIVITY_MAX, `sensitivity must be at most ${SENSITIVITY_MAX}`),
    liveStream: z.boolean(),
  })
  .partial()
  .strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: 'At least one setting must be provided',
  });

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;
