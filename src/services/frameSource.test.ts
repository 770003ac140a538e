import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { FrameManifestError, createReplayFeed, loadFrameManifest, mimeTypeFor, parseManifestEntries } from './frameSource';
import { makeFrame } from '@/test/fixtures';
import type { Frame } from '@/types';

describe('mimeTypeFor', () => {
  it('maps known image extensions', () => {
    expect(mimeTypeFor('frames/0001.JPG')).toBe('image/jpeg');
    expect(mimeTypeFor('a.png')).toBe('image/png');
    expect(mimeTypeFor('a.gif')).toBeNull();
  });
});

describe('parseManifestEntries', () => {
  it('takes an explicit mime type over the extension', () => {
    const { entries } = parseManifestEntries({ frames: [{ timestamp: 0, file: 'raw.bin', mime_type: 'image/png' }] });
    expect(entries).toEqual([{ timestamp: 0, file: 'raw.bin', mimeType: 'image/png' }]);
  });

  it('rejects timestamps that go backwards', () => {
    expect(() => parseManifestEntries({
      frames: [{ timestamp: 2, file: 'a.jpg' }, { timestamp: 1, file: 'b.jpg' }],
    })).toThrow(FrameManifestError);
  });

  it('rejects an empty frame list and malformed entries', () => {
    expect(() => parseManifestEntries({ frames: [] })).toThrow('The frame manifest lists no frames.');
    expect(() => parseManifestEntries({ frames: [{ file: 'a.jpg' }] }))
      .toThrow('frames[0] needs a string "file" and a numeric "timestamp".');
    expect(() => parseManifestEntries({ frames: [{ timestamp: 0, file: 'a.gif' }] })).toThrow(FrameManifestError);
  });
});

describe('loadFrameManifest', () => {
  it('reads the images next to the manifest', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'frames-'));
    await writeFile(path.join(dir, 'f0.jpg'), 'first');
    await writeFile(path.join(dir, 'f1.png'), 'second');
    const manifestPath = path.join(dir, 'manifest.json');
    await writeFile(manifestPath, JSON.stringify({
      video_path: 'cast.mp4',
      frames: [{ timestamp: 0, file: 'f0.jpg' }, { timestamp: 1.5, file: 'f1.png' }],
    }));

    const manifest = await loadFrameManifest(manifestPath);

    expect(manifest).toEqual({
      videoPath: 'cast.mp4',
      duration: 1.5,
      frames: [
        { timestamp: 0, imageBase64: Buffer.from('first').toString('base64'), mimeType: 'image/jpeg' },
        { timestamp: 1.5, imageBase64: Buffer.from('second').toString('base64'), mimeType: 'image/png' },
      ],
    });
  });

  it('fails with a manifest error when the file is not JSON', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const dir = await mkdtemp(path.join(tmpdir(), 'frames-'));
    const manifestPath = path.join(dir, 'manifest.json');
    await writeFile(manifestPath, 'not json');

    await expect(loadFrameManifest(manifestPath)).rejects.toBeInstanceOf(FrameManifestError);
  });
});

describe('createReplayFeed', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('yields every frame in order at speed 0', async () => {
    const frames = [0, 1, 2].map(makeFrame);
    const seen: Frame[] = [];
    for await (const frame of createReplayFeed(frames, 0)) {
      seen.push(frame);
    }
    expect(seen).toEqual(frames);
  });

  it('waits out the gap between frames divided by the speed', async () => {
    vi.useFakeTimers();
    const [first, second] = [0, 1].map(makeFrame);
    const feed = createReplayFeed([first, second], 2);

    expect((await feed.next()).value).toBe(first);

    let arrived = false;
    const pending = feed.next().then(result => {
      arrived = true;
      return result;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(arrived).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect((await pending).value).toBe(second);
  });
});
