import type {
    ActionMatch,
    DetectedAction,
    DetectedActionDocument,
    FrameManifest,
    Instruction,
    VideoAnalysisResult,
    VideoAnalysisResultDocument,
    VisionModel,
} from '@/types';
import { isDev } from '@/config';
import { detectActions, generateVideoSummary } from '@/services/actionDetection';
import { findExtraActions, findMissingSteps, matchWithInstruction } from '@/services/instructionMatcher';
import { formatClock } from '@/utils/formatTime';

export interface AnalyzeVideoOptions {
    manifest: FrameManifest;
    instruction: Instruction;
    model: VisionModel;
}

export interface SummaryInput {
    instruction: Instruction;
    actionMatches: ActionMatch[];
    detectedActions: DetectedAction[];
    missingSteps: number[];
    totalDuration: number;
}

/**
 * Plain-text report of a batch run: one line per step, then the missing steps.
 */
export function generateSummary({ instruction, actionMatches, detectedActions, missingSteps, totalDuration }: SummaryInput): string {
    const completedCount = actionMatches.filter(match => match.matched).length;
    const lines = [
        "=== VIDEO ANALYSIS SUMMARY ===",
        "",
        `Instruction: ${instruction.title}`,
        `Video duration: ${formatClock(totalDuration)}`,
        "",
        `COMPLETED STEPS (${completedCount}/${instruction.steps.length}):`,
    ];

    for (const match of actionMatches) {
        const description = instruction.steps.find(step => step.stepNumber === match.stepNumber)?.description ?? '';

        if (match.matched) {
            const action = match.detectedAction;
            const duration = action.timestampEnd - action.timestampStart;
            const timeRange = `[${formatClock(action.timestampStart)} - ${formatClock(action.timestampEnd)}]`;
            lines.push(`✓ Step ${match.stepNumber}: ${description} ${timeRange} (${duration.toFixed(1)}s)`);
        } else {
            lines.push(`✗ Step ${match.stepNumber}: ${description} - NOT COMPLETED`);
        }
    }

    if (missingSteps.length > 0) {
        lines.push("", `MISSING STEPS: ${missingSteps.join(', ')}`);
    }

    lines.push("", `Total actions detected: ${detectedActions.length}`);
    return lines.join('\n');
}

/**
 * Full offline pipeline: describe frame windows, merge them into actions, match the checklist
 * in one model call, then write the narrative and text summaries. Any model failure aborts the
 * whole run.
 */
export async function analyzeVideo({ manifest, instruction, model }: AnalyzeVideoOptions): Promise<VideoAnalysisResult> {
    if (isDev) console.time('[Video Analyzer] total');
    console.log(`[Video Analyzer] Analyzing ${manifest.videoPath}: ${manifest.frames.length} frames over ${manifest.duration.toFixed(1)}s`);

    try {
        const detectedActions = await detectActions(model, manifest.frames, instruction);
        console.log(`[Video Analyzer] Detected ${detectedActions.length} actions.`);

        console.log("[Video Analyzer] Matching against the instruction...");
        const actionMatches = await matchWithInstruction(model, detectedActions, instruction);

        console.log("[Video Analyzer] Generating the video description...");
        const videoSummary = await generateVideoSummary(model, detectedActions);

        const missingSteps = findMissingSteps(actionMatches);
        const extraActions = findExtraActions(detectedActions, actionMatches);

        return {
            videoPath: manifest.videoPath,
            totalDuration: manifest.duration,
            videoSummary,
            detectedActions,
            actionMatches,
            missingSteps,
            extraActions,
            summary: generateSummary({ instruction, actionMatches, detectedActions, missingSteps, totalDuration: manifest.duration }),
        };
    } finally {
        if (isDev) console.timeEnd('[Video Analyzer] total');
    }
}

const toActionDocument = (action: DetectedAction): DetectedActionDocument => ({
    id: action.id,
    description: action.description,
    timestamp_start: action.timestampStart,
    timestamp_end: action.timestampEnd,
    confidence: action.confidence,
});

/** Snake-case document written to disk and stored with saved reports. */
export const toResultDocument = (result: VideoAnalysisResult): VideoAnalysisResultDocument => ({
    video_path: result.videoPath,
    total_duration: result.totalDuration,
    video_summary: result.videoSummary,
    detected_actions: result.detectedActions.map(toActionDocument),
    action_matches: result.actionMatches.map(match => ({
        step_number: match.stepNumber,
        matched: match.matched,
        detected_action: match.matched ? toActionDocument(match.detectedAction) : null,
        deviation: match.deviation,
    })),
    missing_steps: result.missingSteps,
    extra_actions: result.extraActions.map(toActionDocument),
    summary: result.summary,
});
