import type { DetectedAction } from '@/types';
import { similarityScore } from '@/utils/textSimilarity';
import { MERGE_MAX_GAP_SECONDS, MERGE_MIN_SIMILARITY } from '@/config';

/**
 * Collapses consecutive near-duplicate observations into action intervals.
 *
 * The model is queried once per small frame window, so one real activity usually shows up as a
 * run of short, similarly worded actions. An action joins the open interval when it starts less
 * than 10 s after the interval ends and its description scores above 0.5 against the interval's
 * description. The merged interval keeps the first action's id, description and confidence.
 *
 * @param actions Observations ordered by `timestampStart`. Not mutated.
 * @returns Intervals in input order.
 */
export function mergeSimilarActions(actions: readonly DetectedAction[]): DetectedAction[] {
  if (actions.length === 0) {
    return [];
  }

  const merged: DetectedAction[] = [];
  let current: DetectedAction = { ...actions[0] };

  for (const action of actions.slice(1)) {
    const gap = action.timestampStart - current.timestampEnd;

    if (gap < MERGE_MAX_GAP_SECONDS && similarityScore(current.description, action.description) > MERGE_MIN_SIMILARITY) {
      current.timestampEnd = action.timestampEnd;
    } else {
      merged.push(current);
      current = { ...action };
    }
  }
  merged.push(current);

  return merged;
}
