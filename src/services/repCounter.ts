import type { Frame, Posture, RepCountEvent, VisionModel } from '@/types';
import { initialRepCounterState, repCounterReducer, type RepCounterState } from '@/reducers/repCounterReducer';
import { POSTURE_PROMPT, POSTURE_SYSTEM_PROMPT } from '@/utils/promptEngineering';

export interface RepCounterSession {
    readonly analysisInterval: number;
    state: RepCounterState;
}

export const createRepCounterSession = (analysisInterval = 1.0): RepCounterSession => ({
    analysisInterval,
    state: initialRepCounterState,
});

export const shouldAnalyzeRep = (session: RepCounterSession, currentTime: number): boolean =>
    currentTime - session.state.lastAnalysisTimestamp >= session.analysisInterval;

/**
 * Reads the one-word posture answer. The model is told to answer STANDING, SQUATTING or NONE,
 * but Russian answers and extra words are common.
 */
export const interpretPosture = (answer: string): Posture => {
    const normalized = answer.trim().toUpperCase();
    if (normalized.includes('STANDING') || normalized.includes('СТОИТ')) return 'standing';
    if (normalized.includes('SQUAT') || normalized.includes('ПРИСЕД')) return 'squatting';
    return 'unknown';
};

export async function detectPosture(model: VisionModel, frame: Frame): Promise<Posture> {
    const answer = await model.invoke(POSTURE_SYSTEM_PROMPT, [
        { text: POSTURE_PROMPT },
        { imageBase64: frame.imageBase64, mimeType: frame.mimeType },
    ]);
    console.log(`[Rep Counter] Model answer: ${answer}`);
    return interpretPosture(answer);
}

export async function analyzeRepFrame(session: RepCounterSession, model: VisionModel, frame: Frame): Promise<RepCountEvent> {
    const posture = await detectPosture(model, frame);
    session.state = repCounterReducer(session.state, { type: 'OBSERVE_POSTURE', payload: { posture, timestamp: frame.timestamp } });

    const event: RepCountEvent = session.state.lastEvent ?? { count: session.state.count, posture, timestamp: frame.timestamp, repCompleted: false };
    if (event.repCompleted) {
        console.log(`[Rep Counter] Rep #${event.count}`);
    }
    return event;
}

export const formatRepDisplay = (event: RepCountEvent): string =>
    ['=== SQUAT COUNTER ===', `Total: ${event.count}`, `Posture: ${event.posture}`].join('\n');
