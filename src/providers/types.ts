/**
 * Provider contracts. Every capability operation takes a CallContext carrying
 * the cancellation signal and returns a ProviderResult rather than throwing
 * for expected failures.
 */

export type ProviderResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export function success<T>(value: T): ProviderResult<T> {
  return { kind: 'success', value };
}

export function retryable(reason: string): ProviderResult<never> {
  return { kind: 'retryable', reason };
}

export function fatal(reason: string): ProviderResult<never> {
  return { kind: 'fatal', reason };
}

export type FetchFn = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface CallContext {
  signal: AbortSignal;
  jobId: string;
  /** Scratch directory for this job; removed when the job is cancelled or fails. */
  workDir: string;
}

export interface Trend {
  topic: string;
  score: number;
  source: string;
}

export interface TrendRequest {
  topic?: string;
  niche: string;
}

export interface Script {
  title: string;
  content: string;
  durationSeconds: number;
  hashtags: string[];
  generator: string;
}

export interface Asset {
  url: string;
  kind: 'video' | 'image';
  license: string;
  durationSeconds?: number;
  width?: number;
  height?: number;
}

export interface AssetQueryOptions {
  limit: number;
  orientation?: 'portrait' | 'landscape';
}

/**
 * File outputs are named by `outputBase` (a path without extension); the
 * provider picks the extension for the format it writes and returns the path.
 */
export interface VoiceoverOptions {
  voiceId: string;
  outputBase: string;
}

export interface Branding {
  voiceId: string;
  colorScheme: string[];
  watermark?: string;
  intro?: string;
  outro?: string;
}

export interface AssembleRequest {
  script: Script;
  voiceoverPath: string;
  assets: Asset[];
  branding: Branding;
  outputBase: string;
}

export interface ThumbnailRequest {
  title: string;
  colorScheme: string[];
  outputBase: string;
}

export interface UploadRequest {
  videoPath: string;
  thumbnailPath?: string;
  script: Script;
  channel: string;
}

export interface TrendProvider {
  readonly id: string;
  detect(request: TrendRequest, ctx: CallContext): Promise<ProviderResult<Trend>>;
}

export interface ScriptProvider {
  readonly id: string;
  generate(topic: string, durationSeconds: number, ctx: CallContext): Promise<ProviderResult<Script>>;
  improve(script: Script, feedback: string[], ctx: CallContext): Promise<ProviderResult<Script>>;
}

export interface AssetProvider {
  readonly id: string;
  gather(query: string, options: AssetQueryOptions, ctx: CallContext): Promise<ProviderResult<Asset[]>>;
}

export interface VoiceoverProvider {
  readonly id: string;
  synthesize(text: string, options: VoiceoverOptions, ctx: CallContext): Promise<ProviderResult<string>>;
}

export interface VideoProvider {
  readonly id: string;
  assemble(request: AssembleRequest, ctx: CallContext): Promise<ProviderResult<string>>;
}

export interface ThumbnailProvider {
  readonly id: string;
  render(request: ThumbnailRequest, ctx: CallContext): Promise<ProviderResult<string>>;
}

export interface Uploader {
  readonly id: string;
  /** Returns the external video id. */
  upload(request: UploadRequest, ctx: CallContext): Promise<ProviderResult<string>>;
}

export interface CapabilityMap {
  trend: TrendProvider;
  script: ScriptProvider;
  asset: AssetProvider;
  voiceover: VoiceoverProvider;
  video: VideoProvider;
  thumbnail: ThumbnailProvider;
  upload: Uploader;
}

export type Capability = keyof CapabilityMap;
