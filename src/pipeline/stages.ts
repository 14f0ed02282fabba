export const STAGE_ORDER = [
  'TREND_CHECK',
  'SCRIPT_GEN',
  'QUALITY_CHECK',
  'ASSET_GATHER',
  'VOICEOVER',
  'VIDEO_ASSEMBLY',
  'THUMBNAIL',
  'HUMAN_APPROVAL',
  'UPLOAD',
  'DONE',
] as const;

export type ActiveStage = Exclude<(typeof STAGE_ORDER)[number], 'DONE'>;
export type Stage = (typeof STAGE_ORDER)[number] | 'FAILED' | 'CANCELLED';

export const TERMINAL_STAGES: ReadonlySet<Stage> = new Set<Stage>(['DONE', 'FAILED', 'CANCELLED']);

export function isTerminalStage(stage: Stage): boolean {
  return TERMINAL_STAGES.has(stage);
}

/** The stage after `stage` in the linear pipeline. */
export function nextStage(stage: ActiveStage): Stage {
  const next = STAGE_ORDER[STAGE_ORDER.indexOf(stage) + 1];
  return next ?? 'DONE';
}

export function isActiveStage(stage: Stage): stage is ActiveStage {
  return !isTerminalStage(stage);
}
