import type { z } from 'zod';
import type { ChannelInputSchema } from '../shared/schemas.js';
import type { Channel } from './types.js';

export type ChannelInput = z.infer<typeof ChannelInputSchema>;

/**
 * Build the stored channel from validated input. Upload counters and the
 * creation time carry over from `existing` when the channel is being updated.
 */
export function channelFromInput(input: ChannelInput, existing: Channel | null, now: Date = new Date()): Channel {
  const at = now.toISOString();
  const { branding } = input;
  return {
    name: input.name,
    niche: input.niche,
    qualityTier: input.quality_tier,
    uploadSchedule: input.upload_schedule,
    branding: {
      voiceId: branding.voice_id,
      colorScheme: branding.color_scheme,
      ...(branding.watermark !== undefined ? { watermark: branding.watermark } : {}),
      ...(branding.intro !== undefined ? { intro: branding.intro } : {}),
      ...(branding.outro !== undefined ? { outro: branding.outro } : {}),
    },
    dailyUploads: existing?.dailyUploads ?? 0,
    dailyResetAt: existing?.dailyResetAt ?? null,
    lastUploadAt: existing?.lastUploadAt ?? null,
    createdAt: existing?.createdAt ?? at,
    updatedAt: at,
  };
}
