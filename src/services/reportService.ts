import { getSupabase } from '@/services/apiClient';
import { toResultDocument } from '@/services/videoAnalyzer';
import { getSummary, type LiveSession } from '@/services/liveComplianceTracker';
import type { VideoAnalysisResult } from '@/types';

const REPORTS_TABLE = 'analysis_reports';
const LIVE_SESSIONS_TABLE = 'live_sessions';

/**
 * Stores a finished batch analysis.
 * @returns The id of the new report row.
 */
export const saveAnalysisReport = async (result: VideoAnalysisResult, instructionTitle: string): Promise<string> => {
    const { data, error } = await getSupabase()
        .from(REPORTS_TABLE)
        .insert({
            video_path: result.videoPath,
            instruction_title: instructionTitle,
            missing_steps: result.missingSteps,
            completed_count: result.actionMatches.filter(match => match.matched).length,
            step_count: result.actionMatches.length,
            result: toResultDocument(result),
        })
        .select('id')
        .single();

    if (error) {
        console.error('[Reports] Error saving analysis report:', error);
        throw new Error(`Could not save the analysis report: ${error.message}`);
    }

    return String(data.id);
};

/**
 * Upserts the current state of a live session, keyed by `sessionId`. Safe to call after every
 * analysis; the latest call wins.
 */
export const saveLiveSession = async (sessionId: string, session: LiveSession): Promise<void> => {
    const summary = getSummary(session);
    const { state } = session;

    const { error } = await getSupabase()
        .from(LIVE_SESSIONS_TABLE)
        .upsert({
            session_id: sessionId,
            instruction_title: summary.title,
            expected_step_index: state.expectedStepIndex,
            completed_steps: summary.completedSteps,
            outstanding_steps: summary.outstandingSteps,
            warnings: summary.warnings,
            total_actions: summary.totalActions,
            is_completed: summary.outstandingSteps.length === 0,
            last_status: state.lastEvent.status,
            updated_at: new Date().toISOString(),
        }, { onConflict: 'session_id' });

    if (error) {
        console.error('[Reports] Error saving live session:', error);
        throw error;
    }
};
