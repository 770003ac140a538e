import type { ComplianceEvent, DetectedAction, Instruction, InstructionStep, StepProgress } from '@/types';
import { similarityScore } from '@/utils/textSimilarity';
import { LIVE_MIN_SIMILARITY } from '@/config';

/**
 * The shape of one live session's state. `expectedStepIndex` only moves forward and the
 * step history only grows; nothing here is ever rolled back.
 */
export interface ComplianceState {
  instruction: Instruction;
  expectedStepIndex: number;
  completedStepNumbers: number[];
  warnings: string[];
  lastAction: DetectedAction | null;
  lastAnalysisTimestamp: number;
  actionHistory: DetectedAction[];
  lastEvent: ComplianceEvent;
}

/**
 * Actions that can be dispatched to the compliance reducer. Observations are the only input;
 * the model call that produces them happens outside.
 */
export type ComplianceAction = { type: 'OBSERVE_ACTION'; payload: DetectedAction };

export const progressOf = (state: Pick<ComplianceState, 'instruction' | 'completedStepNumbers'>): StepProgress => ({
  completed: state.completedStepNumbers.length,
  total: state.instruction.steps.length,
});

export const outOfOrderWarning = (detected: InstructionStep, expected: InstructionStep): string =>
  `Step ${detected.stepNumber} performed out of order: step ${expected.stepNumber} was expected`;

export function createInitialComplianceState(instruction: Instruction): ComplianceState {
  return {
    instruction,
    expectedStepIndex: 0,
    completedStepNumbers: [],
    warnings: [],
    lastAction: null,
    lastAnalysisTimestamp: 0,
    actionHistory: [],
    lastEvent: {
      status: 'waiting',
      message: 'Waiting for actions...',
      progress: { completed: 0, total: instruction.steps.length },
    },
  };
}

/**
 * Judges one observation against the step the session is waiting for.
 *
 * A match above 0.3 completes the expected step and moves the cursor. Otherwise only the steps
 * after the cursor are checked; a match there is recorded as a warning, and neither the cursor
 * nor the completed list changes. Once every step is done, observations are still recorded but
 * the result is always `completed`.
 */
function observe(state: ComplianceState, observation: DetectedAction): ComplianceState {
  const { steps } = state.instruction;
  const recorded: ComplianceState = {
    ...state,
    lastAction: observation,
    lastAnalysisTimestamp: observation.timestampStart,
    actionHistory: [...state.actionHistory, observation],
  };

  if (state.expectedStepIndex >= steps.length) {
    return {
      ...recorded,
      lastEvent: { status: 'completed', message: 'All instruction steps completed!', progress: progressOf(state) },
    };
  }

  const expected = steps[state.expectedStepIndex];

  if (similarityScore(expected.description, observation.description) > LIVE_MIN_SIMILARITY) {
    const completedStepNumbers = [...state.completedStepNumbers, expected.stepNumber];
    const nextIndex = state.expectedStepIndex + 1;
    const next = nextIndex < steps.length ? steps[nextIndex] : null;

    return {
      ...recorded,
      expectedStepIndex: nextIndex,
      completedStepNumbers,
      lastEvent: {
        status: 'step_completed',
        message: `Step ${expected.stepNumber} completed: ${expected.description}`,
        completedStep: expected.stepNumber,
        expectedNext: next ? next.stepNumber : null,
        progress: progressOf({ instruction: state.instruction, completedStepNumbers }),
      },
    };
  }

  const future = steps
    .slice(state.expectedStepIndex + 1)
    .find(step => similarityScore(step.description, observation.description) > LIVE_MIN_SIMILARITY);

  if (future) {
    const warning = outOfOrderWarning(future, expected);
    return {
      ...recorded,
      warnings: [...state.warnings, warning],
      lastEvent: {
        status: 'warning',
        message: warning,
        expectedStep: expected.stepNumber,
        detectedStep: future.stepNumber,
        progress: progressOf(state),
      },
    };
  }

  return {
    ...recorded,
    lastEvent: {
      status: 'in_progress',
      message: `Expected: Step ${expected.stepNumber} - ${expected.description}`,
      expectedStep: expected.stepNumber,
      progress: progressOf(state),
    },
  };
}

/** Applies one dispatched observation to a live session's state and returns the next state. */
export function complianceReducer(state: ComplianceState, action: ComplianceAction): ComplianceState {
  switch (action.type) {
    case 'OBSERVE_ACTION':
      return observe(state, action.payload);
    default:
      return state;
  }
}
