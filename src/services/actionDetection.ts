import { randomUUID } from 'node:crypto';
import type { DetectedAction, Frame, Instruction, VisionModel } from '@/types';
import { DESCRIBED_ACTION_CONFIDENCE, FRAMES_PER_BATCH } from '@/config';
import { mergeSimilarActions } from '@/utils/actionMerger';
import {
    FRAME_BATCH_SYSTEM_PROMPT,
    LIVE_FRAME_SYSTEM_PROMPT,
    SUMMARY_SYSTEM_PROMPT,
    buildFrameBatchParts,
    buildLiveFrameParts,
    buildVideoSummaryPrompt,
} from '@/utils/promptEngineering';

const PROGRESS_LOG_EVERY = 20;

export const createDetectedAction = (
    description: string,
    timestampStart: number,
    timestampEnd: number,
    confidence: number = DESCRIBED_ACTION_CONFIDENCE
): DetectedAction => ({
    id: randomUUID(),
    description: description.trim(),
    timestampStart,
    timestampEnd,
    confidence,
});

export function chunkFrames(frames: Frame[], size: number = FRAMES_PER_BATCH): Frame[][] {
    const batches: Frame[][] = [];
    for (let i = 0; i < frames.length; i += size) {
        batches.push(frames.slice(i, i + size));
    }
    return batches;
}

/**
 * Describes one window of frames as a single action spanning the first to the last frame.
 */
export async function describeFrameBatch(
    model: VisionModel,
    batch: Frame[],
    instruction?: Instruction
): Promise<DetectedAction> {
    if (batch.length === 0) {
        throw new Error("Cannot describe an empty frame batch.");
    }
    const description = await model.invoke(FRAME_BATCH_SYSTEM_PROMPT, buildFrameBatchParts(batch, instruction));
    return createDetectedAction(description, batch[0].timestamp, batch[batch.length - 1].timestamp);
}

/**
 * Runs the batch description pass over a whole video and merges the results into intervals.
 * Windows are described one after another; a failed call aborts the pass.
 */
export async function detectActions(
    model: VisionModel,
    frames: Frame[],
    instruction?: Instruction
): Promise<DetectedAction[]> {
    const batches = chunkFrames(frames);
    const observations: DetectedAction[] = [];

    for (const [index, batch] of batches.entries()) {
        const batchNumber = index + 1;
        if (batchNumber === 1 || batchNumber % PROGRESS_LOG_EVERY === 0) {
            console.log(`[Video Analyzer] Described batches: ${batchNumber}/${batches.length} (${index * FRAMES_PER_BATCH}/${frames.length} frames)`);
        }
        observations.push(await describeFrameBatch(model, batch, instruction));
    }

    const merged = mergeSimilarActions(observations);
    console.log(`[Video Analyzer] Merged ${observations.length} observations into ${merged.length} actions.`);
    return merged;
}

/** Describes a single live frame as an instantaneous action. */
export async function describeFrame(model: VisionModel, frame: Frame): Promise<DetectedAction> {
    const description = await model.invoke(LIVE_FRAME_SYSTEM_PROMPT, buildLiveFrameParts(frame));
    return createDetectedAction(description, frame.timestamp, frame.timestamp);
}

export async function generateVideoSummary(model: VisionModel, actions: DetectedAction[]): Promise<string> {
    if (actions.length === 0) {
        return "No actions were detected in the video.";
    }
    return model.invoke(SUMMARY_SYSTEM_PROMPT, [{ text: buildVideoSummaryPrompt(actions) }]);
}
