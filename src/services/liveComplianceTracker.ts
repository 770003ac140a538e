import type { ComplianceEvent, DetectedAction, Frame, Instruction, LiveSessionSummary, VisionModel } from '@/types';
import { DEFAULT_ANALYSIS_INTERVAL } from '@/config';
import { complianceReducer, createInitialComplianceState, type ComplianceState } from '@/reducers/complianceReducer';
import { describeFrame } from '@/services/actionDetection';

const RULE = '='.repeat(60);

/**
 * One live session. Each session owns its state; the instruction is only read, so several
 * sessions may share it.
 */
export interface LiveSession {
    readonly analysisInterval: number;
    state: ComplianceState;
}

export const createLiveSession = (instruction: Instruction, analysisInterval: number = DEFAULT_ANALYSIS_INTERVAL): LiveSession => {
    console.log(`[Live Tracker] Session started for "${instruction.title}" (${instruction.steps.length} steps, every ${analysisInterval}s).`);
    return { analysisInterval, state: createInitialComplianceState(instruction) };
};

/** Whether enough time has passed since the last analysis. Does not touch the session. */
export const shouldAnalyze = (session: LiveSession, currentTime: number): boolean =>
    currentTime - session.state.lastAnalysisTimestamp >= session.analysisInterval;

export const currentEvent = (session: LiveSession): ComplianceEvent => session.state.lastEvent;

/**
 * Feeds one described observation through the state machine.
 */
export function analyzeObservation(session: LiveSession, observation: DetectedAction): ComplianceEvent {
    session.state = complianceReducer(session.state, { type: 'OBSERVE_ACTION', payload: observation });
    const event = session.state.lastEvent;

    switch (event.status) {
        case 'step_completed':
            console.log(`[Live Tracker] ${event.message}`);
            break;
        case 'warning':
            console.warn(`[Live Tracker] ${event.message}`);
            break;
        default:
            console.log(`[Live Tracker] ${event.status} @ ${observation.timestampStart.toFixed(1)}s: ${observation.description.slice(0, 50)}`);
    }
    return event;
}

/**
 * Describes the frame with the model, then judges the description. If the model call throws,
 * the session is left exactly as it was.
 */
export async function analyzeFrame(session: LiveSession, model: VisionModel, frame: Frame): Promise<ComplianceEvent> {
    const observation = await describeFrame(model, frame);
    return analyzeObservation(session, observation);
}

const describeStep = (session: LiveSession, stepNumber: number): string =>
    session.state.instruction.steps.find(step => step.stepNumber === stepNumber)?.description ?? '';

/**
 * Status block for a console or overlay after one analysis. A finished session also lists its
 * out-of-order warnings.
 */
export function formatStatusDisplay(session: LiveSession, event: ComplianceEvent): string {
    const { instruction, completedStepNumbers, warnings } = session.state;
    const lines = [
        `=== ${instruction.title} ===`,
        `Progress: ${event.progress.completed}/${event.progress.total}`,
        '',
        event.status === 'completed' ? '✓✓✓ ALL STEPS COMPLETED ✓✓✓' : event.message,
    ];

    // Warnings raised along the way are repeated once the session is done.
    if (event.status === 'completed' && warnings.length > 0) {
        lines.push('', ...warnings);
    }

    if (completedStepNumbers.length > 0) {
        lines.push('', 'Completed:');
        for (const stepNumber of completedStepNumbers) {
            lines.push(`  ✓ ${stepNumber}. ${describeStep(session, stepNumber)}`);
        }
    }

    return lines.join('\n');
}

/**
 * Completed against outstanding steps plus the full warning log. Pure projection of the state;
 * still valid after a failed frame call.
 */
export function getSummary(session: LiveSession): LiveSessionSummary {
    const { instruction, completedStepNumbers, warnings, actionHistory } = session.state;
    const completed = new Set(completedStepNumbers);
    const outstandingSteps = instruction.steps
        .map(step => step.stepNumber)
        .filter(stepNumber => !completed.has(stepNumber));

    const lines = [
        RULE,
        'FINAL SUMMARY',
        RULE,
        `Instruction: ${instruction.title}`,
        `Steps completed: ${completedStepNumbers.length}/${instruction.steps.length}`,
        '',
        ...instruction.steps.map(step =>
            completed.has(step.stepNumber)
                ? `✓ Step ${step.stepNumber}: ${step.description}`
                : `✗ Step ${step.stepNumber}: ${step.description} - NOT COMPLETED`
        ),
    ];

    if (warnings.length > 0) {
        lines.push('', 'WARNINGS:', ...warnings.map(warning => `  ${warning}`));
    }
    lines.push('', `Total actions recorded: ${actionHistory.length}`);

    return {
        title: instruction.title,
        completedSteps: [...completedStepNumbers],
        outstandingSteps,
        warnings: [...warnings],
        totalActions: actionHistory.length,
        text: lines.join('\n'),
    };
}
