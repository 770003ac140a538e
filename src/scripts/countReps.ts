/**
 * Squat counter over a replayed camera feed.
 *
 * Usage:
 *   npm run count-reps -- <frames-manifest.json> [--interval 1] [--speed 1]
 */
import { numberOption, parseArgs } from './args';
import { createReplayFeed, loadFrameManifest } from '@/services/frameSource';
import { createGeminiVisionModel } from '@/services/geminiService';
import { analyzeRepFrame, createRepCounterSession, formatRepDisplay, shouldAnalyzeRep } from '@/services/repCounter';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), ['interval', 'speed']);
  const [manifestPath] = args.positionals;

  if (!manifestPath) {
    console.error('Usage: npm run count-reps -- <frames-manifest.json> [--interval N] [--speed N]');
    process.exit(1);
  }

  const manifest = await loadFrameManifest(manifestPath);
  const model = createGeminiVisionModel();
  const session = createRepCounterSession(numberOption(args, 'interval', 1.0));

  try {
    for await (const frame of createReplayFeed(manifest.frames, numberOption(args, 'speed', 1))) {
      if (!shouldAnalyzeRep(session, frame.timestamp)) continue;
      const event = await analyzeRepFrame(session, model, frame);
      if (event.repCompleted) console.log('\n' + formatRepDisplay(event));
    }
  } finally {
    console.log('\n' + '='.repeat(60));
    console.log(`Total squats: ${session.state.count}`);
    console.log('='.repeat(60));
  }
}

main().catch(error => {
  console.error('Rep counting failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
