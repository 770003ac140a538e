import type { ParsedStepReply, TimeRange } from '@/types';

// Verdict tokens the model may answer with: English, Russian, and Russian transliterated.
const YES_TOKENS = ['yes', 'да', 'da'];
const NO_TOKENS = ['no', 'нет', 'net'];

const STEP_LABELS = ['step', 'шаг'];

const NUMBER = String.raw`\d+(?:\.\d+)?`;
const SECONDS_UNIT = String.raw`(?:sec|сек|s|с)?\.?`;
const RANGE = String.raw`${NUMBER}[ \t]*${SECONDS_UNIT}(?:[ \t]*[-–—][ \t]*${NUMBER}[ \t]*${SECONDS_UNIT})?`;

// The whole bracket content must be a range; stray digits inside other text are not one.
const TIME_RANGE_PATTERN = new RegExp(
    String.raw`^[ \t]*(${NUMBER})[ \t]*${SECONDS_UNIT}(?:[ \t]*[-–—][ \t]*(${NUMBER})[ \t]*${SECONDS_UNIT})?[ \t]*$`,
    'iu'
);

const escapeForRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Builds the pattern for one step's line, e.g. `Step 2: YES - [12.0s-30.5s] - Mixture poured`.
 * The label may sit after list numbering or markdown, and bold markers around the verdict are
 * tolerated. The range may also come without brackets, as long as a separator or the line end
 * follows it. Only horizontal whitespace is crossed after the label, so a bare `Step 1: YES`
 * line never swallows the next line as its comment.
 */
const stepLinePattern = (stepNumber: number): RegExp => {
    const labels = STEP_LABELS.map(escapeForRegExp).join('|');
    const verdicts = [...YES_TOKENS, ...NO_TOKENS].map(escapeForRegExp).join('|');
    return new RegExp(
        String.raw`(?<![\p{L}\p{N}])(?:${labels})[ \t]*${stepNumber}[ \t]*[:.)][ \t*_]*(${verdicts})(?![\p{L}\p{N}])[ \t*_]*(?:[-–—:][ \t]*)?(?:\[([^\]\n]*)\]|(${RANGE})(?=[ \t]*(?:[-–—:]|$)))?[ \t]*(?:[-–—:][ \t]*)?(.*)$`,
        'imu'
    );
};

/**
 * Reads `start-end` (or a single instant) in seconds. A reversed range is put back in order.
 * @returns null unless the whole text is such a range.
 */
export const parseTimeRange = (raw: string): TimeRange | null => {
    const match = TIME_RANGE_PATTERN.exec(raw);
    if (!match) return null;

    const first = parseFloat(match[1]);
    const second = match[2] !== undefined ? parseFloat(match[2]) : first;

    return { start: Math.min(first, second), end: Math.max(first, second) };
};

/**
 * Extracts the verdict for one step from the model's free-text matching reply.
 *
 * Returning null is routine: the model ignored the format, skipped the step, or wrapped the
 * answer in prose. Callers fall back to similarity matching in that case.
 */
export const parseStepReply = (replyText: string, stepNumber: number): ParsedStepReply | null => {
    const match = stepLinePattern(stepNumber).exec(replyText);
    if (!match) return null;

    const verdictToken = match[1].toLowerCase();
    const rawRange = match[2] ?? match[3];
    const comment = match[4].trim();

    let timeRange: TimeRange | null = null;
    if (rawRange !== undefined && rawRange.trim().length > 0) {
        timeRange = parseTimeRange(rawRange);
        // A range that is there but unreadable makes the whole line malformed.
        if (!timeRange) return null;
    }

    return {
        verdict: YES_TOKENS.includes(verdictToken),
        timeRange,
        comment: comment.length > 0 ? comment : null,
    };
};
