import { describe, it, expect, beforeEach, vi } from 'vitest';
import { analyzeVideo, generateSummary, toResultDocument } from './videoAnalyzer';
import {
  FRAME_BATCH_SYSTEM_PROMPT,
  MATCHING_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
} from '@/utils/promptEngineering';
import { DEVIATION_NOT_DETECTED } from '@/services/instructionMatcher';
import { createScriptedModel, makeAction, makeFrame, makeInstruction } from '@/test/fixtures';
import type { FrameManifest } from '@/types';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'time').mockImplementation(() => {});
  vi.spyOn(console, 'timeEnd').mockImplementation(() => {});
});

const instruction = makeInstruction(['prepare the mold', 'pour the mixture into the mold']);

const manifest: FrameManifest = {
  videoPath: 'site/cast.mp4',
  duration: 10,
  frames: [0, 2, 4, 6, 8, 10].map(makeFrame),
};

describe('analyzeVideo', () => {
  it('runs detection, matching and the narrative summary', async () => {
    const { model, invoke } = createScriptedModel({
      [FRAME_BATCH_SYSTEM_PROMPT]: ['prepare the mold', 'pour the mixture into the mold'],
      [MATCHING_SYSTEM_PROMPT]: ['Step 1: YES - [0s-4s] - done\nStep 2: NO - - Not poured'],
      [SUMMARY_SYSTEM_PROMPT]: ['A worker prepares a mold.'],
    });

    const result = await analyzeVideo({ manifest, instruction, model });

    expect(invoke).toHaveBeenCalledTimes(4);
    expect(result.videoPath).toBe('site/cast.mp4');
    expect(result.totalDuration).toBe(10);
    expect(result.videoSummary).toBe('A worker prepares a mold.');

    const [prepare, pour] = result.detectedActions;
    expect(result.detectedActions).toHaveLength(2);
    expect(prepare).toMatchObject({ timestampStart: 0, timestampEnd: 4 });
    expect(pour).toMatchObject({ timestampStart: 6, timestampEnd: 10 });

    expect(result.actionMatches).toEqual([
      { stepNumber: 1, matched: true, detectedAction: prepare, deviation: null },
      { stepNumber: 2, matched: false, detectedAction: null, deviation: 'Not poured' },
    ]);
    expect(result.missingSteps).toEqual([2]);
    expect(result.extraActions).toEqual([pour]);

    expect(result.summary).toBe([
      '=== VIDEO ANALYSIS SUMMARY ===',
      '',
      'Instruction: Block casting',
      'Video duration: 0:00:10',
      '',
      'COMPLETED STEPS (1/2):',
      '✓ Step 1: prepare the mold [0:00:00 - 0:00:04] (4.0s)',
      '✗ Step 2: pour the mixture into the mold - NOT COMPLETED',
      '',
      'MISSING STEPS: 2',
      '',
      'Total actions detected: 2',
    ].join('\n'));
  });

  it('fails the whole run when the matching call fails', async () => {
    const { model } = createScriptedModel({ [FRAME_BATCH_SYSTEM_PROMPT]: ['prepare the mold'] });
    await expect(analyzeVideo({ manifest, instruction, model })).rejects.toThrow('No scripted reply');
  });
});

describe('generateSummary', () => {
  it('omits the missing-steps section when every step matched', () => {
    const action = makeAction(61, 75.5, 'prepare the mold');
    const text = generateSummary({
      instruction: makeInstruction(['prepare the mold']),
      actionMatches: [{ stepNumber: 1, matched: true, detectedAction: action, deviation: null }],
      detectedActions: [action],
      missingSteps: [],
      totalDuration: 3725,
    });

    expect(text.split('\n')).toEqual([
      '=== VIDEO ANALYSIS SUMMARY ===',
      '',
      'Instruction: Block casting',
      'Video duration: 1:02:05',
      '',
      'COMPLETED STEPS (1/1):',
      '✓ Step 1: prepare the mold [0:01:01 - 0:01:15] (14.5s)',
      '',
      'Total actions detected: 1',
    ]);
  });
});

describe('toResultDocument', () => {
  it('maps the result to snake_case fields', () => {
    const action = makeAction(0, 4, 'prepare the mold');
    const doc = toResultDocument({
      videoPath: 'cast.mp4',
      totalDuration: 10,
      videoSummary: 'summary',
      detectedActions: [action],
      actionMatches: [
        { stepNumber: 1, matched: true, detectedAction: action, deviation: null },
        { stepNumber: 2, matched: false, detectedAction: null, deviation: DEVIATION_NOT_DETECTED },
      ],
      missingSteps: [2],
      extraActions: [],
      summary: 'text',
    });

    const actionDoc = { id: action.id, description: 'prepare the mold', timestamp_start: 0, timestamp_end: 4, confidence: 0.8 };
    expect(doc).toEqual({
      video_path: 'cast.mp4',
      total_duration: 10,
      video_summary: 'summary',
      detected_actions: [actionDoc],
      action_matches: [
        { step_number: 1, matched: true, detected_action: actionDoc, deviation: null },
        { step_number: 2, matched: false, detected_action: null, deviation: DEVIATION_NOT_DETECTED },
      ],
      missing_steps: [2],
      extra_actions: [],
      summary: 'text',
    });
  });
});
