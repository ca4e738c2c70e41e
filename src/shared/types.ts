/**
 * Shared types for tapecut
 */

/**
 * Colour-histogram descriptor for one decoded frame.
 * Scoped to a single detection run and never persisted.
 */
export interface FrameDescriptor {
  readonly index: number;
  /** Seconds from the start of the video */
  readonly time: number;
  /** Flattened, L2-normalized HSV histogram */
  readonly histogram: Float64Array;
}

/**
 * Frame boundary whose dissimilarity crossed the detection threshold.
 */
export interface CutCandidate {
  time: number;
  dissimilarity: number;
}

/**
 * Half-open time range [start, end) in seconds.
 */
export interface Segment {
  start: number;
  end: number;
}

/**
 * Output of one scene detection run.
 */
export interface SceneDetectionResult {
  segments: Segment[];
  /** Every primary candidate, sorted by time */
  candidates: CutCandidate[];
  /** Dense low-threshold boundaries, audit only */
  diagnosticBoundaries: CutCandidate[];
  totalDuration: number;
  frameCount: number;
  frameRate: number;
}

// ============================================================================
// Pipeline state
// ============================================================================

export const PIPELINE_STATES = ['NEW', 'SCENES_EXTRACTED', 'CONCATENATED', 'PLEX_DONE'] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export const GEOMETRY_PRESETS = ['4:3', 'anamorphic-16:9'] as const;

export type GeometryPreset = (typeof GEOMETRY_PRESETS)[number];

export type UnitKind = 'folder' | 'loose';

/**
 * Progress of one logical output unit (an operator folder or a loose clip).
 */
export interface UnitRecord {
  kind: UnitKind;
  status: 'done' | 'failed';
  attempts: number;
  error?: string;
}

/**
 * Persisted progress for one input stem.
 */
export interface PipelineRecord {
  version: 1;
  stem: string;
  state: PipelineState;
  geometry: GeometryPreset | null;
  units: Record<string, UnitRecord>;
  updatedAt: string;
}

// ============================================================================
// Progress
// ============================================================================

/**
 * One progress observation from a long-running operation.
 */
export interface ProgressTick {
  unit: 'seconds' | 'bytes';
  processed: number;
  /** Known total, when the operation can tell */
  total?: number;
}

export type ProgressListener = (label: string, tick: ProgressTick) => void;

// ============================================================================
// Run results
// ============================================================================

export type RunOutcome = 'complete' | 'partial' | 'failed';

export interface InputRunResult {
  inputPath: string;
  stem: string;
  outcome: RunOutcome;
  state: PipelineState | null;
  /** Scratch directory to inspect when the run did not complete */
  workDir: string;
  failedUnits: string[];
  message?: string;
}
