import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Frame, FrameManifest } from '@/types';
import { isRecord } from '@/services/instructionService';

export class FrameManifestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FrameManifestError';
    }
}

interface ManifestEntry {
    timestamp: number;
    file: string;
    mimeType: string;
}

const MIME_BY_EXTENSION: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
};

export const mimeTypeFor = (file: string): string | null => MIME_BY_EXTENSION[path.extname(file).toLowerCase()] ?? null;

/**
 * Validates the frame list of a manifest. Timestamps must be non-negative and non-decreasing,
 * since both the batch windows and the live throttle depend on frame order.
 */
export function parseManifestEntries(raw: unknown): { entries: ManifestEntry[]; videoPath?: string; duration?: number } {
    if (!isRecord(raw) || !Array.isArray(raw.frames)) {
        throw new FrameManifestError('A frame manifest must be an object with a "frames" array.');
    }
    const items: unknown[] = raw.frames;
    if (items.length === 0) {
        throw new FrameManifestError('The frame manifest lists no frames.');
    }

    const entries: ManifestEntry[] = [];
    let previous = 0;

    for (const [index, item] of items.entries()) {
        if (!isRecord(item) || typeof item.file !== 'string' || typeof item.timestamp !== 'number') {
            throw new FrameManifestError(`frames[${index}] needs a string "file" and a numeric "timestamp".`);
        }
        if (item.timestamp < 0 || item.timestamp < previous) {
            throw new FrameManifestError(`frames[${index}] has timestamp ${item.timestamp}; timestamps must be non-negative and non-decreasing.`);
        }
        const mimeType = typeof item.mime_type === 'string' ? item.mime_type : mimeTypeFor(item.file);
        if (!mimeType) {
            throw new FrameManifestError(`frames[${index}]: cannot tell the image type of "${item.file}".`);
        }
        entries.push({ timestamp: item.timestamp, file: item.file, mimeType });
        previous = item.timestamp;
    }

    return {
        entries,
        videoPath: typeof raw.video_path === 'string' ? raw.video_path : undefined,
        duration: typeof raw.duration === 'number' ? raw.duration : undefined,
    };
}

/**
 * Loads a manifest of frames extracted ahead of time; image paths are relative to the manifest.
 */
export async function loadFrameManifest(manifestPath: string): Promise<FrameManifest> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(manifestPath, 'utf-8'));
    } catch (error) {
        console.error(`[Frames] Could not read manifest ${manifestPath}:`, error);
        throw new FrameManifestError(`Could not read frame manifest ${manifestPath}.`);
    }

    const { entries, videoPath, duration } = parseManifestEntries(raw);
    const baseDir = path.dirname(manifestPath);

    const frames: Frame[] = [];
    for (const entry of entries) {
        const image = await readFile(path.resolve(baseDir, entry.file));
        frames.push({ timestamp: entry.timestamp, imageBase64: image.toString('base64'), mimeType: entry.mimeType });
    }

    return {
        videoPath: videoPath ?? manifestPath,
        duration: duration ?? entries[entries.length - 1].timestamp,
        frames,
    };
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Replays recorded frames as if they came from a camera, waiting out the gaps between
 * timestamps divided by `speed`. A speed of 0 replays instantly.
 */
export async function* createReplayFeed(frames: Frame[], speed = 1): AsyncGenerator<Frame, void, unknown> {
    let previous: number | null = null;
    for (const frame of frames) {
        if (previous !== null && speed > 0) {
            const delta = frame.timestamp - previous;
            if (delta > 0) await sleep((delta * 1000) / speed);
        }
        previous = frame.timestamp;
        yield frame;
    }
}
