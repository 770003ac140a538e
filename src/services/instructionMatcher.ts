import type { ActionMatch, DetectedAction, Instruction, InstructionStep, TimeRange, VisionModel } from '@/types';
import { FALLBACK_MIN_SIMILARITY, PROXIMITY_MAX_DISTANCE_SECONDS } from '@/config';
import { parseStepReply } from '@/utils/replyParser';
import { similarityScore } from '@/utils/textSimilarity';
import { MATCHING_SYSTEM_PROMPT, buildMatchingPrompt } from '@/utils/promptEngineering';

export const DEVIATION_NOT_DETECTED = "Action not detected";
export const DEVIATION_UNCORROBORATED = "Time range not corroborated by any detected action";

/** Length of the intersection of two intervals, 0 when they are disjoint. */
export const temporalOverlap = (a: TimeRange, b: TimeRange): number =>
    Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));

const actionRange = (action: DetectedAction): TimeRange => ({ start: action.timestampStart, end: action.timestampEnd });

/**
 * Picks the action the model's time range refers to.
 *
 * The action with the largest positive overlap wins. For an instant, or when nothing overlaps,
 * the first action containing `range.start` wins outright; otherwise the closest action by
 * start-to-start or end-to-end distance, if that distance is under 30 s. Ties keep the earlier
 * action.
 */
export function findActionForTimeRange(actions: readonly DetectedAction[], range: TimeRange): DetectedAction | null {
    let best: DetectedAction | null = null;
    let bestOverlap = 0;

    for (const action of actions) {
        const overlap = temporalOverlap(actionRange(action), range);
        if (overlap > bestOverlap) {
            bestOverlap = overlap;
            best = action;
        }
    }

    if (best && range.start !== range.end) {
        return best;
    }

    let nearest: DetectedAction | null = null;
    let minDistance = Number.POSITIVE_INFINITY;

    for (const action of actions) {
        if (action.timestampStart <= range.start && range.start <= action.timestampEnd) {
            return action;
        }
        const distance = Math.min(
            Math.abs(action.timestampStart - range.start),
            Math.abs(action.timestampEnd - range.end)
        );
        if (distance < minDistance && distance < PROXIMITY_MAX_DISTANCE_SECONDS) {
            minDistance = distance;
            nearest = action;
        }
    }

    return nearest;
}

/**
 * Lexical fallback: the action whose description best overlaps the step's, accepted above 0.25.
 */
export function matchBySimilarity(step: InstructionStep, actions: readonly DetectedAction[]): ActionMatch {
    let best: DetectedAction | null = null;
    let bestScore = 0;

    for (const action of actions) {
        const score = similarityScore(step.description, action.description);
        if (score > bestScore) {
            bestScore = score;
            best = action;
        }
    }

    if (best && bestScore > FALLBACK_MIN_SIMILARITY) {
        return { stepNumber: step.stepNumber, matched: true, detectedAction: best, deviation: null };
    }
    return { stepNumber: step.stepNumber, matched: false, detectedAction: null, deviation: DEVIATION_NOT_DETECTED };
}

/**
 * Resolves one step from the model's reply, falling back to similarity when the reply has no
 * usable line for it.
 *
 * A YES without a time range is treated like an unparsable line: the model's claim alone never
 * binds an action. A YES whose range no action corroborates stays unmatched.
 */
export function resolveStepMatch(step: InstructionStep, actions: readonly DetectedAction[], reply: string): ActionMatch {
    const parsed = parseStepReply(reply, step.stepNumber);

    if (!parsed) {
        console.log(`[Matcher] Step ${step.stepNumber}: no parsable reply line, using similarity fallback.`);
        return matchBySimilarity(step, actions);
    }

    if (!parsed.verdict) {
        return { stepNumber: step.stepNumber, matched: false, detectedAction: null, deviation: parsed.comment };
    }

    if (!parsed.timeRange) {
        console.log(`[Matcher] Step ${step.stepNumber}: YES without a time range, using similarity fallback.`);
        return matchBySimilarity(step, actions);
    }

    const action = findActionForTimeRange(actions, parsed.timeRange);
    if (!action) {
        console.warn(`[Matcher] Step ${step.stepNumber}: no action near ${parsed.timeRange.start}s-${parsed.timeRange.end}s.`);
        return { stepNumber: step.stepNumber, matched: false, detectedAction: null, deviation: DEVIATION_UNCORROBORATED };
    }

    return { stepNumber: step.stepNumber, matched: true, detectedAction: action, deviation: null };
}

/** One match per instruction step, in step order. Pure given the reply text. */
export function resolveMatches(actions: readonly DetectedAction[], instruction: Instruction, reply: string): ActionMatch[] {
    return instruction.steps.map(step => resolveStepMatch(step, actions, reply));
}

/**
 * Asks the model to judge the whole checklist in a single request and resolves every step
 * from that one reply. Model failures propagate.
 */
export async function matchWithInstruction(
    model: VisionModel,
    actions: DetectedAction[],
    instruction: Instruction
): Promise<ActionMatch[]> {
    const reply = await model.invoke(MATCHING_SYSTEM_PROMPT, [{ text: buildMatchingPrompt(actions, instruction) }]);
    console.log(`[Matcher] Model reply for matching:\n${reply}`);
    return resolveMatches(actions, instruction, reply);
}

/** Detected actions that no match claims, compared by id. */
export function findExtraActions(actions: readonly DetectedAction[], matches: readonly ActionMatch[]): DetectedAction[] {
    const claimed = new Set(matches.flatMap(match => (match.matched ? [match.detectedAction.id] : [])));
    return actions.filter(action => !claimed.has(action.id));
}

export const findMissingSteps = (matches: readonly ActionMatch[]): number[] =>
    matches.filter(match => !match.matched).map(match => match.stepNumber);
