import type { Posture, RepCountEvent } from '@/types';

export interface RepCounterState {
  count: number;
  posture: Posture;
  lastAnalysisTimestamp: number;
  lastEvent: RepCountEvent | null;
}

export type RepCounterAction = { type: 'OBSERVE_POSTURE'; payload: { posture: Posture; timestamp: number } };

export const initialRepCounterState: RepCounterState = {
  count: 0,
  posture: 'unknown',
  lastAnalysisTimestamp: 0,
  lastEvent: null,
};

/**
 * Counts a rep on every squatting -> standing transition. Going down is not counted, and an
 * unknown posture in between breaks the pair.
 */
export function repCounterReducer(state: RepCounterState, action: RepCounterAction): RepCounterState {
  switch (action.type) {
    case 'OBSERVE_POSTURE': {
      const { posture, timestamp } = action.payload;
      const repCompleted = state.posture === 'squatting' && posture === 'standing';
      const count = repCompleted ? state.count + 1 : state.count;
      return {
        count,
        posture,
        lastAnalysisTimestamp: timestamp,
        lastEvent: { count, posture, timestamp, repCompleted },
      };
    }
    default:
      return state;
  }
}
