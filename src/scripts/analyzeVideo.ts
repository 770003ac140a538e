/**
 * Offline analysis of a recorded video.
 *
 * Usage:
 *   npm run analyze-video -- <frames-manifest.json> <instruction.json> [--output result.json] [--save]
 *
 * Frames are extracted beforehand and listed in the manifest with their timestamps.
 */
import { writeFile } from 'node:fs/promises';
import { parseArgs } from './args';
import { loadFrameManifest } from '@/services/frameSource';
import { loadInstruction } from '@/services/instructionService';
import { createGeminiVisionModel } from '@/services/geminiService';
import { analyzeVideo, toResultDocument } from '@/services/videoAnalyzer';
import { saveAnalysisReport } from '@/services/reportService';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), ['output']);
  const [manifestPath, instructionPath] = args.positionals;

  if (!manifestPath || !instructionPath) {
    console.error('Usage: npm run analyze-video -- <frames-manifest.json> <instruction.json> [--output file] [--save]');
    console.error('  --output FILE  write the result document as JSON');
    console.error('  --save         store the report in Supabase');
    process.exit(1);
  }

  const instruction = await loadInstruction(instructionPath);
  const manifest = await loadFrameManifest(manifestPath);
  const model = createGeminiVisionModel();

  const result = await analyzeVideo({ manifest, instruction, model });

  console.log('\n' + '='.repeat(60));
  console.log('VIDEO DESCRIPTION:');
  console.log('='.repeat(60));
  console.log(result.videoSummary);
  console.log('');
  console.log(result.summary);

  const outputPath = args.options.get('output');
  if (outputPath) {
    await writeFile(outputPath, JSON.stringify(toResultDocument(result), null, 2), 'utf-8');
    console.log(`\nResults saved to ${outputPath}`);
  }

  if (args.switches.has('save')) {
    const reportId = await saveAnalysisReport(result, instruction.title);
    console.log(`Report stored with id ${reportId}`);
  }
}

main().catch(error => {
  console.error('Analysis failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
