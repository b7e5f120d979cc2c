import { z } from 'zod';

export const channelIdParamsSchema = z.object({
  channelId: z.string().regex(/^\d{1,20}$/, 'channelId must be a numeric snowflake'),
});

export const channelPolicySchema = z
  .object({
    timeThresholdMinutes: z.number().int().nonnegative().optional(),
    maxMessages: z.number().int().nonnegative().optional(),
  })
  .strict();

// Lower bounds match what the command layer always enforced
export const retentionSettingsSchema = z
  .object({
    scanIntervalMinutes: z.number().int().min(2).optional(),
    bulkDeleteMin: z.number().int().min(2).optional(),
  })
  .strict()
  .refine((value) => value.scanIntervalMinutes !== undefined || value.bulkDeleteMin !== undefined, {
    message: 'At least one setting is required',
  });
