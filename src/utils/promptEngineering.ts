import type { DetectedAction, Frame, Instruction, ModelPart } from '@/types';

// --- System Instructions ---

export const FRAME_BATCH_SYSTEM_PROMPT =
    "You are an expert at analyzing videos of production and assembly processes.";

export const LIVE_FRAME_SYSTEM_PROMPT =
    "You are an expert video analyst. Describe what is happening in this frame briefly and precisely.";

export const MATCHING_SYSTEM_PROMPT =
    "You are an expert at checking whether performed actions comply with an instruction.";

export const SUMMARY_SYSTEM_PROMPT =
    "You are an expert at analyzing videos and writing narrative descriptions of them.";

export const POSTURE_SYSTEM_PROMPT =
    "You are an expert at analyzing human body position. Answer briefly and precisely.";

// --- Formatting Helpers ---

export const formatActionLine = (action: DetectedAction): string =>
    `- [${action.timestampStart.toFixed(1)}s - ${action.timestampEnd.toFixed(1)}s] ${action.description}`;

export const formatStepList = (instruction: Instruction): string =>
    instruction.steps.map(step => `${step.stepNumber}. ${step.description}`).join('\n');

// --- Prompt Construction ---

/**
 * Builds the request for one window of frames: the task, the instruction steps for context,
 * then each image followed by its timestamp label.
 * @param instruction Optional; when present its steps are listed so the model can use the same vocabulary.
 */
export const buildFrameBatchParts = (frames: Frame[], instruction?: Instruction): ModelPart[] => {
    let prompt = "Analyze these frames from a video and determine which action is being performed.\n";
    if (instruction) {
        prompt += `\nInstruction steps for reference:\n${formatStepList(instruction)}\n`;
    }
    prompt += "\nDescribe the action briefly and say whether its start or completion is visible.";

    const parts: ModelPart[] = [{ text: prompt }];
    for (const frame of frames) {
        parts.push({ imageBase64: frame.imageBase64, mimeType: frame.mimeType });
        parts.push({ text: `[Frame at ${frame.timestamp.toFixed(1)}s]` });
    }
    return parts;
};

export const buildLiveFrameParts = (frame: Frame): ModelPart[] => [
    { text: `Timestamp: ${frame.timestamp.toFixed(2)}s. What is happening in this frame?` },
    { imageBase64: frame.imageBase64, mimeType: frame.mimeType },
];

/**
 * Asks the model to judge every step against the full list of detected actions in one request.
 * The reply format here is what `parseStepReply` decodes.
 */
export const buildMatchingPrompt = (actions: DetectedAction[], instruction: Instruction): string => {
    const actionsText = actions.length > 0
        ? actions.map(formatActionLine).join('\n')
        : "(no actions were detected)";

    return `Match the actions detected in the video against the steps of the instruction.

Instruction:
${formatStepList(instruction)}

Detected actions:
${actionsText}

For each instruction step determine:
1. Whether it was performed (YES/NO), even if the action is worded differently but means the same thing
2. Which detected action corresponds to the step (give its time range)
3. Whether there are deviations from the instruction

IMPORTANT: match by MEANING, not by exact words. For example:
- "Preparing the mortar" = "mixing" = "kneading the mix"
- "Preparing the mold" = "cleaning the mold" = "greasing the mold"

Answer with exactly one line per step in this format:
Step N: YES|NO - [start s-end s] - comment

Example:
Step 1: YES - [0.0s-15.5s] - Mold preparation performed
Step 2: NO - - Action not detected`;
};

export const buildVideoSummaryPrompt = (actions: DetectedAction[]): string => `Analyze this sequence of actions from a video and write a detailed description of what is happening.

Detected actions:
${actions.map(formatActionLine).join('\n')}

Write a coherent narrative of the video content that combines all actions into a logical story.
Describe:
1. What kind of process or activity is shown
2. The main stages and their order
3. The overall impression of what is happening`;

export const POSTURE_PROMPT = `Look at the image and determine the person's body position.

Answer with ONE word:
- STANDING - the person stands upright with straight legs
- SQUATTING - the person is in a squat (knees bent, thighs parallel to the floor or lower)
- NONE - no person is visible or the position is unclear

Answer ONLY with one of these words, without explanation.`;
