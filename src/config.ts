// Runtime settings. Everything can be overridden through the environment (see env.d.ts).

export const DEFAULT_MODEL = process.env.GEMINI_MODEL || 'gemini-2.5-flash';

export const isDev = process.env.NODE_ENV !== 'production';

/** Frames sent to the model per description request in batch mode. */
export const FRAMES_PER_BATCH = 3;

/** Confidence attached to every model-described action; the model does not report one. */
export const DESCRIBED_ACTION_CONFIDENCE = 0.8;

/** Seconds between live analyses unless the caller picks another interval. */
export const DEFAULT_ANALYSIS_INTERVAL = 5.0;

// Alignment thresholds
export const MERGE_MAX_GAP_SECONDS = 10;
export const MERGE_MIN_SIMILARITY = 0.5;
export const FALLBACK_MIN_SIMILARITY = 0.25;
export const PROXIMITY_MAX_DISTANCE_SECONDS = 30;
export const LIVE_MIN_SIMILARITY = 0.3;
