import type { StageName } from '@spatial-audio/contracts';

export type StageProgressStatus = 'start' | 'success' | 'failure' | 'skipped';

export interface StageProgressEvent {
  stage: StageName;
  status: StageProgressStatus;
  detail?: Record<string, unknown>;
}

export interface PipelineProgressCallbacks {
  onStage?: (event: StageProgressEvent) => void;
}

export interface ProcessOptions extends PipelineProgressCallbacks {
  /** Overrides the configured spatialize switch for this job only. */
  spatialize?: boolean;
}
