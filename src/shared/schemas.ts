import { z } from 'zod';

const positiveInt = z.number().int().positive();
const nonNegative = z.number().min(0);

export const PipelineConfigSchema = z.object({
  max_concurrent_jobs: positiveInt.default(3),
  max_queue_size: positiveInt.default(100),
  // Upper bounds: 30 days per job, one day per provider call.
  job_timeout_minutes: z.number().positive().max(43_200).default(15),
  stage_timeout_seconds: z.number().positive().max(86_400).default(120),
  retry_attempts: z.number().int().min(0).default(3),
  retry_delay_seconds: nonNegative.default(30),
  aging_interval_seconds: z.number().positive().default(300),
});

export const YouTubeConfigSchema = z.object({
  max_daily_uploads: z.number().int().min(0).default(3),
  min_upload_interval: nonNegative.default(14400),
  default_privacy: z.enum(['public', 'private', 'unlisted']).default('private'),
  category_id: z.string().default('27'),
});

export const ContentConfigSchema = z.object({
  default_duration: positiveInt.default(45),
  max_title_length: positiveInt.default(100),
  default_hashtags: z.array(z.string()).default(['#shorts']),
  asset_count: positiveInt.default(5),
});

export const QualityWeightsSchema = z.object({
  readability: nonNegative.default(0.25),
  engagement: nonNegative.default(0.25),
  structure: nonNegative.default(0.3),
  accuracy: nonNegative.default(0.2),
  production: nonNegative.default(0.2),
});

export const QualityConfigSchema = z.object({
  min_quality_score: z.number().min(0).max(100).default(70),
  premium_quality_score: z.number().min(0).max(100).default(80),
  improve_band: nonNegative.default(20),
  weights: QualityWeightsSchema.default({}),
  blacklist: z.array(z.string().min(1)).default(['get rich quick', 'miracle cure', 'guaranteed profit']),
});

export const CircuitBreakerConfigSchema = z.object({
  failure_threshold: positiveInt.default(5),
  cooldown_seconds: z.number().positive().default(60),
  max_cooldown_seconds: z.number().positive().default(900),
});

const providerList = (fallback: string[]) => z.array(z.string().min(1)).default(fallback);

export const ProvidersConfigSchema = z.object({
  trend: providerList([]),
  script: providerList(['cohere']),
  asset: providerList(['pexels']),
  voiceover: providerList(['elevenlabs']),
  video: providerList([]),
  thumbnail: providerList([]),
  upload: providerList(['local']),
});

export const ApiConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(7810),
  allowed_origins: z
    .array(z.string())
    .default(['http://localhost', 'http://127.0.0.1', 'http://[::1]']),
});

export const StudioConfigSchema = z.object({
  version: z.string().default('1'),
  pipeline: PipelineConfigSchema.default({}),
  youtube: YouTubeConfigSchema.default({}),
  content: ContentConfigSchema.default({}),
  quality: QualityConfigSchema.default({}),
  circuit_breaker: CircuitBreakerConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  api: ApiConfigSchema.default({}),
});

export const JobPrioritySchema = z.enum(['low', 'normal', 'high', 'critical']);
export const QualityTierSchema = z.enum(['standard', 'premium']);

const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

export const WeekdaySchema = z.enum([
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]);

export const ChannelInputSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only'),
  niche: z.string().min(1),
  quality_tier: QualityTierSchema.default('standard'),
  upload_schedule: z.record(WeekdaySchema, z.array(timeOfDay)).default({}),
  branding: z
    .object({
      voice_id: z.string().min(1).default('default'),
      color_scheme: z.array(z.string()).default(['#FF0000', '#FFFFFF']),
      watermark: z.string().optional(),
      intro: z.string().optional(),
      outro: z.string().optional(),
    })
    .default({}),
});

export const SubmitJobSchema = z.object({
  topic: z.string().trim().min(1).max(200).optional(),
  channel: z.string().min(1),
  priority: JobPrioritySchema.default('normal'),
});

export const ApprovalDecisionSchema = z.object({
  decision: z.enum(['approve', 'reject']),
  reason: z.string().max(500).optional(),
  actor: z.string().max(100).optional(),
});

/**
 * Format a zod error as `path: message` lines so config and request errors
 * name the offending field.
 */
export function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export const JobListQuerySchema = z.object({
  status: z.enum(['pending', 'running', 'succeeded', 'failed', 'cancelled']).optional(),
  channel: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const ApprovalListQuerySchema = z.object({
  status: z.enum(['pending', 'approved', 'denied']).optional(),
});
