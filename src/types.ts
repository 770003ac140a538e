// --- Instructions ---

export interface InstructionStep {
  stepNumber: number;
  description: string;
  expectedDurationSeconds?: number;
  critical: boolean;
}

export interface Instruction {
  title: string;
  steps: InstructionStep[]; // ordered by stepNumber ascending
}

/** On-disk shape of an instruction document, before validation. */
export interface InstructionDocument {
  title: string;
  steps: {
    step_number: number;
    description: string;
    expected_duration_seconds?: number | null;
    critical?: boolean;
  }[];
}

// --- Frames & Model I/O ---

export interface Frame {
  timestamp: number; // seconds from the start of the video or session
  imageBase64: string;
  mimeType: string;
}

export type ModelPart =
  | { text: string }
  | { imageBase64: string; mimeType: string };

/**
 * Text-in/text-out contract of the vision-language model. Implementations may throw on
 * network or provider failure; callers decide whether to retry.
 */
export interface VisionModel {
  invoke(systemPrompt: string, parts: ModelPart[]): Promise<string>;
}

// --- Detected Actions & Matches ---

export interface DetectedAction {
  id: string; // stable identifier assigned at creation, used instead of object identity
  description: string;
  timestampStart: number;
  timestampEnd: number;
  confidence: number; // 0..1
}

export interface TimeRange {
  start: number;
  end: number;
}

export interface ParsedStepReply {
  verdict: boolean;
  timeRange: TimeRange | null;
  comment: string | null;
}

/**
 * One verdict per instruction step. A step is only ever `matched` together with the action
 * that corroborates it.
 */
export type ActionMatch =
  | { stepNumber: number; matched: true; detectedAction: DetectedAction; deviation: string | null }
  | { stepNumber: number; matched: false; detectedAction: null; deviation: string | null };

export interface VideoAnalysisResult {
  videoPath: string;
  totalDuration: number;
  videoSummary: string;
  detectedActions: DetectedAction[];
  actionMatches: ActionMatch[];
  missingSteps: number[];
  extraActions: DetectedAction[];
  summary: string;
}

export interface DetectedActionDocument {
  id: string;
  description: string;
  timestamp_start: number;
  timestamp_end: number;
  confidence: number;
}

export interface VideoAnalysisResultDocument {
  video_path: string;
  total_duration: number;
  video_summary: string;
  detected_actions: DetectedActionDocument[];
  action_matches: {
    step_number: number;
    matched: boolean;
    detected_action: DetectedActionDocument | null;
    deviation: string | null;
  }[];
  missing_steps: number[];
  extra_actions: DetectedActionDocument[];
  summary: string;
}

// --- Live Compliance ---

export type ComplianceStatus = 'waiting' | 'in_progress' | 'warning' | 'step_completed' | 'completed';

export interface StepProgress {
  completed: number;
  total: number;
}

export type ComplianceEvent =
  | { status: 'waiting'; message: string; progress: StepProgress }
  | { status: 'in_progress'; message: string; expectedStep: number; progress: StepProgress }
  | { status: 'warning'; message: string; expectedStep: number; detectedStep: number; progress: StepProgress }
  | { status: 'step_completed'; message: string; completedStep: number; expectedNext: number | null; progress: StepProgress }
  | { status: 'completed'; message: string; progress: StepProgress };

export interface LiveSessionSummary {
  title: string;
  completedSteps: number[];
  outstandingSteps: number[];
  warnings: string[];
  totalActions: number;
  text: string;
}

// --- Rep Counting ---

export type Posture = 'standing' | 'squatting' | 'unknown';

export interface RepCountEvent {
  count: number;
  posture: Posture;
  timestamp: number;
  repCompleted: boolean;
}

// --- Frame Manifests ---

export interface FrameManifestDocument {
  video_path?: string;
  duration?: number;
  frames: { timestamp: number; file: string; mime_type?: string }[];
}

export interface FrameManifest {
  videoPath: string;
  duration: number;
  frames: Frame[];
}
