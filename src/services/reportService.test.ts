import { describe, it, expect, beforeEach, vi } from 'vitest';
import { saveAnalysisReport, saveLiveSession } from './reportService';
import { analyzeObservation, createLiveSession } from '@/services/liveComplianceTracker';
import { DEVIATION_NOT_DETECTED } from '@/services/instructionMatcher';
import { makeAction, makeInstruction } from '@/test/fixtures';
import type { VideoAnalysisResult } from '@/types';

const mocks = vi.hoisted(() => {
  const single = vi.fn();
  const select = vi.fn((_columns: string) => ({ single }));
  const insert = vi.fn((_row: Record<string, unknown>) => ({ select }));
  const upsert = vi.fn();
  const from = vi.fn((_table: string) => ({ insert, upsert }));
  return { from, insert, select, single, upsert };
});

vi.mock('@/services/apiClient', () => ({
  getSupabase: () => ({ from: mocks.from }),
}));

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

const action = makeAction(0, 4, 'prepare the mold');

const result: VideoAnalysisResult = {
  videoPath: 'cast.mp4',
  totalDuration: 10,
  videoSummary: 'A worker prepares a mold.',
  detectedActions: [action],
  actionMatches: [
    { stepNumber: 1, matched: true, detectedAction: action, deviation: null },
    { stepNumber: 2, matched: false, detectedAction: null, deviation: DEVIATION_NOT_DETECTED },
  ],
  missingSteps: [2],
  extraActions: [],
  summary: 'summary text',
};

describe('saveAnalysisReport', () => {
  it('inserts the report and returns its id', async () => {
    mocks.single.mockResolvedValue({ data: { id: 42 }, error: null });

    await expect(saveAnalysisReport(result, 'Block casting')).resolves.toBe('42');

    expect(mocks.from).toHaveBeenCalledWith('analysis_reports');
    expect(mocks.select).toHaveBeenCalledWith('id');
    const [row] = mocks.insert.mock.calls[0];
    expect(row).toMatchObject({
      video_path: 'cast.mp4',
      instruction_title: 'Block casting',
      missing_steps: [2],
      completed_count: 1,
      step_count: 2,
    });
    expect(row.result).toMatchObject({ video_path: 'cast.mp4', missing_steps: [2], summary: 'summary text' });
  });

  it('throws when the insert fails', async () => {
    mocks.single.mockResolvedValue({ data: null, error: { message: 'permission denied' } });

    await expect(saveAnalysisReport(result, 'Block casting'))
      .rejects.toThrow('Could not save the analysis report: permission denied');
  });
});

describe('saveLiveSession', () => {
  it('upserts the session state keyed by session id', async () => {
    mocks.upsert.mockResolvedValue({ error: null });
    const session = createLiveSession(makeInstruction(['prepare mold', 'pour mixture']));
    analyzeObservation(session, makeAction(5, 5, 'prepare mold'));

    await saveLiveSession('session-1', session);

    expect(mocks.from).toHaveBeenCalledWith('live_sessions');
    expect(mocks.upsert).toHaveBeenCalledWith(
      expect.objectContaining({
        session_id: 'session-1',
        instruction_title: 'Block casting',
        expected_step_index: 1,
        completed_steps: [1],
        outstanding_steps: [2],
        warnings: [],
        total_actions: 1,
        is_completed: false,
        last_status: 'step_completed',
      }),
      { onConflict: 'session_id' }
    );
  });

  it('rethrows the storage error', async () => {
    mocks.upsert.mockResolvedValue({ error: { message: 'offline' } });
    const session = createLiveSession(makeInstruction(['prepare mold']));

    await expect(saveLiveSession('session-2', session)).rejects.toMatchObject({ message: 'offline' });
  });
});
