/**
 * Live compliance tracking over a replayed camera feed.
 *
 * Usage:
 *   npm run analyze-live -- <frames-manifest.json> <instruction.json> [--interval 5] [--speed 1] [--save]
 *   --speed 0     instant replay (no delays)
 *
 * The tracker's state survives a failed model call; the summary is printed either way.
 */
import { randomUUID } from 'node:crypto';
import { numberOption, parseArgs } from './args';
import { DEFAULT_ANALYSIS_INTERVAL } from '@/config';
import { createReplayFeed, loadFrameManifest } from '@/services/frameSource';
import { loadInstruction } from '@/services/instructionService';
import { createGeminiVisionModel } from '@/services/geminiService';
import {
  analyzeFrame,
  createLiveSession,
  formatStatusDisplay,
  getSummary,
  shouldAnalyze,
} from '@/services/liveComplianceTracker';
import { saveLiveSession } from '@/services/reportService';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), ['interval', 'speed']);
  const [manifestPath, instructionPath] = args.positionals;

  if (!manifestPath || !instructionPath) {
    console.error('Usage: npm run analyze-live -- <frames-manifest.json> <instruction.json> [--interval N] [--speed N] [--save]');
    process.exit(1);
  }

  const interval = numberOption(args, 'interval', DEFAULT_ANALYSIS_INTERVAL);
  const speed = numberOption(args, 'speed', 1);
  const save = args.switches.has('save');

  const instruction = await loadInstruction(instructionPath);
  const manifest = await loadFrameManifest(manifestPath);
  const model = createGeminiVisionModel();
  const session = createLiveSession(instruction, interval);
  const sessionId = randomUUID();

  console.log('\n' + '='.repeat(60));
  console.log('LIVE COMPLIANCE TRACKING');
  console.log('='.repeat(60));
  console.log(`Instruction: ${instruction.title}`);
  console.log(`Steps: ${instruction.steps.length} | Interval: ${interval}s | Speed: ${speed === 0 ? 'instant' : `${speed}x`}`);
  console.log('');

  let lastStatusText = '';
  try {
    for await (const frame of createReplayFeed(manifest.frames, speed)) {
      if (!shouldAnalyze(session, frame.timestamp)) continue;

      const event = await analyzeFrame(session, model, frame);
      const statusText = formatStatusDisplay(session, event);
      if (statusText !== lastStatusText) {
        console.log('\n' + statusText);
        lastStatusText = statusText;
      }
      if (save) await saveLiveSession(sessionId, session);

      if (event.status === 'completed' || (event.status === 'step_completed' && event.expectedNext === null)) {
        console.log('\nAll instruction steps are done; stopping the replay.');
        break;
      }
    }
  } finally {
    console.log(getSummary(session).text);
  }
}

main().catch(error => {
  console.error('Live analysis failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
