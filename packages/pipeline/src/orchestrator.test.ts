import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DownloadError,
  EncodeError,
  MetadataError,
  SegmentRangeError,
  ValidationError,
  type AcquireOptions,
  type AcquiredMedia,
  type EncodeRequest,
  type EncodeResult,
  type MediaAcquirer,
  type MetadataProvider,
  type SegmentEncoder,
  type VideoMetadata,
} from '@chaptercut/core';
import { pathExists } from '@chaptercut/utils';
import { ExtractionOrchestrator } from './orchestrator.js';
import type { PipelineProgress } from './types.js';

const REFERENCE = 'https://www.youtube.com/watch?v=abc123XYZ_-';

function video(overrides: Partial<VideoMetadata> = {}): VideoMetadata {
  return {
    reference: REFERENCE,
    title: 'Live Session',
    description: 'Tracklist:\n0:00 Intro\n1:30 Main Theme\n3:00 Outro',
    durationSeconds: 240,
    isLive: false,
    ...overrides,
  };
}

class FakeMetadataProvider implements MetadataProvider {
  calls: string[] = [];

  constructor(private readonly result: VideoMetadata | Error) {}

  async fetchMetadata(reference: string): Promise<VideoMetadata> {
    this.calls.push(reference);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakeAcquirer implements MediaAcquirer {
  requests: AcquireOptions[] = [];
  failWith: Error | null = null;
  lastPath: string | null = null;

  async acquire(_reference: string, options: AcquireOptions): Promise<AcquiredMedia> {
    this.requests.push(options);
    if (this.failWith) throw this.failWith;

    options.onProgress?.({ percent: 50, estimated: false });
    const path = join(options.outputDir, 'source.mp4');
    await writeFile(path, 'source');
    this.lastPath = path;
    return { path, offsetSeconds: options.hint?.startSeconds ?? 0, sizeBytes: 6 };
  }
}

const NARRATION = [
  'Building segment',
  'Writing audio',
  'audio 50%',
  'Done.',
  'Writing video',
  'video 50%',
  'Done !',
];

class FakeEncoder implements SegmentEncoder {
  requests: EncodeRequest[] = [];
  failFor = new Set<number>();

  async encode(request: EncodeRequest): Promise<EncodeResult> {
    this.requests.push(request);
    if (this.failFor.has(request.range.sourceMarkerIndex)) {
      throw new EncodeError(request.outputPath, 'Video pass failed with exit code 1');
    }
    for (const line of NARRATION) {
      request.onLine?.(line);
    }
    await writeFile(request.outputPath, 'clip');
    return { outputPath: request.outputPath, sizeBytes: 4, durationMs: 1 };
  }
}

describe('ExtractionOrchestrator', () => {
  let dir: string;
  let mediaDir: string;
  let outputDir: string;
  let acquirer: FakeAcquirer;
  let encoder: FakeEncoder;

  function orchestrator(metadata: MetadataProvider = new FakeMetadataProvider(video())) {
    return new ExtractionOrchestrator(
      { metadata, acquirer, encoder, isSupportedReference: (ref) => ref.startsWith('https://') },
      { mediaDir, outputDir }
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chaptercut-pipeline-'));
    mediaDir = join(dir, 'media');
    outputDir = join(dir, 'output');
    acquirer = new FakeAcquirer();
    encoder = new FakeEncoder();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('analyze', () => {
    it('extracts chapters from the description', async () => {
      const subject = orchestrator();

      const result = await subject.analyze(`  ${REFERENCE} `);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.chapters.map((c) => [c.timecode.toSeconds(), c.title])).toEqual([
        [0, 'Intro'],
        [90, 'Main Theme'],
        [180, 'Outro'],
      ]);
      expect(subject.getSession()?.metadata.title).toBe('Live Session');
    });

    it('rejects unsupported references before any lookup', async () => {
      const provider = new FakeMetadataProvider(video());
      const result = await orchestrator(provider).analyze('not a url');

      expect(result).toMatchObject({ ok: false, error: { kind: 'invalid-reference' } });
      expect(provider.calls).toEqual([]);
    });

    it('refuses live streams', async () => {
      const result = await orchestrator(new FakeMetadataProvider(video({ isLive: true }))).analyze(REFERENCE);

      expect(result).toMatchObject({ ok: false, error: { kind: 'live-stream' } });
    });

    it('refuses videos over the duration limit', async () => {
      const subject = orchestrator(new FakeMetadataProvider(video({ durationSeconds: 4000 })));

      const result = await subject.analyze(REFERENCE);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MetadataError);
      expect(result.error.message).toBe('Video is too long (67 min, limit 60 min)');
      expect(subject.getSession()).toBeNull();
    });

    it('returns provider failures as results', async () => {
      const error = new MetadataError('private', REFERENCE, 'This video is private and cannot be processed');
      const result = await orchestrator(new FakeMetadataProvider(error)).analyze(REFERENCE);

      expect(result).toEqual({ ok: false, reference: REFERENCE, error });
    });

    it('wraps unexpected errors', async () => {
      const result = await orchestrator(new FakeMetadataProvider(new Error('socket hang up'))).analyze(REFERENCE);

      expect(result).toMatchObject({ ok: false, error: { code: 'INTERNAL_ERROR', message: 'socket hang up' } });
    });

    it('honours configured limits', async () => {
      const subject = new ExtractionOrchestrator(
        { metadata: new FakeMetadataProvider(video()), acquirer, encoder },
        { mediaDir, outputDir, limits: { maxChapters: 2 } }
      );

      const result = await subject.analyze(REFERENCE);

      expect(result.ok && result.chapters.map((c) => c.title)).toEqual(['Intro', 'Main Theme']);
    });

    it('forgets the session on clear', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);

      subject.clear();

      expect(subject.getSession()).toBeNull();
      await expect(subject.extract({ kind: 'first' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('extract', () => {
    it('cuts a single chapter from a range-hinted download', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);
      const progress: PipelineProgress[] = [];

      const summary = await subject.extract({ kind: 'first' }, { onProgress: (p) => progress.push(p) });

      expect(acquirer.requests).toHaveLength(1);
      expect(acquirer.requests[0]?.hint).toEqual({ startSeconds: 0, endSeconds: 90 });
      expect(acquirer.requests[0]?.outputDir).toBe(mediaDir);
      expect(summary).toMatchObject({ extracted: 1, failed: 0, outputDir });
      expect(summary.outcomes[0]).toMatchObject({
        status: 'extracted',
        markerIndex: 0,
        title: 'Intro',
        outputPath: join(outputDir, '01_Intro.mp4'),
        sizeBytes: 4,
      });
      expect(await pathExists(join(outputDir, '01_Intro.mp4'))).toBe(true);
      expect(await pathExists(join(mediaDir, 'source.mp4'))).toBe(false);

      expect(progress.map((p) => p.percent)).toEqual([
        40, 45, 52.5, 60, 60, 62.5, 65, 67.5, 70, 77.5, 85, 90, 100,
      ]);
      expect(progress.map((p) => p.step)).toEqual([1, 2, 2, 3, 3, 3, 3, 3, 3, 3, 3, 4, 4]);
      expect(progress[3]?.message).toBe('Chapter 1/1: Intro');
      expect(progress[4]?.message).toBe('Chapter 1/1: Building video structure...');
      expect(progress.every((p) => p.totalSteps === 4)).toBe(true);
    });

    it('downloads once and cuts every chapter', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);

      const summary = await subject.extract({ kind: 'all' });

      expect(acquirer.requests).toHaveLength(1);
      expect(acquirer.requests[0]?.hint).toBeUndefined();
      expect(encoder.requests.map((r) => [r.range.startSeconds, r.range.endSeconds])).toEqual([
        [0, 90],
        [90, 180],
        [180, 240],
      ]);
      expect(summary.outcomes.map((o) => o.status === 'extracted' && o.outputPath)).toEqual([
        join(outputDir, '01_Intro.mp4'),
        join(outputDir, '02_Main Theme.mp4'),
        join(outputDir, '03_Outro.mp4'),
      ]);
    });

    it('extracts a chapter chosen by index', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);

      const summary = await subject.extract({ kind: 'index', index: 2 });

      expect(acquirer.requests[0]?.hint).toEqual({ startSeconds: 180, endSeconds: 240 });
      expect(encoder.requests[0]?.media.offsetSeconds).toBe(180);
      expect(summary.outcomes[0]).toMatchObject({
        status: 'extracted',
        outputPath: join(outputDir, '01_Outro.mp4'),
      });
    });

    it('keeps going after one chapter fails', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);
      encoder.failFor.add(1);

      const summary = await subject.extract({ kind: 'all' });

      expect(summary.extracted).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.outcomes.map((o) => o.status)).toEqual(['extracted', 'failed', 'extracted']);
      const failure = summary.outcomes[1];
      expect(failure?.status === 'failed' && failure.error.code).toBe('ENCODE_ERROR');
    });

    it('fails every chapter when the download fails', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);
      acquirer.failWith = new DownloadError('download-failed', REFERENCE, 'Download failed');

      const summary = await subject.extract({ kind: 'all' });

      expect(summary).toMatchObject({ extracted: 0, failed: 3 });
      expect(encoder.requests).toEqual([]);
    });

    it('fails every chapter when the output directory cannot be created', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory');
      const subject = new ExtractionOrchestrator(
        { metadata: new FakeMetadataProvider(video()), acquirer, encoder },
        { mediaDir, outputDir: join(blocker, 'clips') }
      );
      await subject.analyze(REFERENCE);

      const summary = await subject.extract({ kind: 'all' });

      expect(summary).toMatchObject({ extracted: 0, failed: 3 });
      expect(summary.outcomes.map((o) => o.markerIndex)).toEqual([0, 1, 2]);
      expect(acquirer.requests).toEqual([]);
      expect(encoder.requests).toEqual([]);
    });

    it('reports chapters whose range collapses', async () => {
      const subject = orchestrator(new FakeMetadataProvider(video({
        description: '0:00 Intro\n0:00 Welcome\n1:00 Song',
      })));
      await subject.analyze(REFERENCE);

      const summary = await subject.extract({ kind: 'all' });

      const [first, second, third] = summary.outcomes;
      expect(first?.status === 'failed' && first.error).toBeInstanceOf(SegmentRangeError);
      expect(second).toMatchObject({ status: 'extracted', outputPath: join(outputDir, '01_Welcome.mp4') });
      expect(third).toMatchObject({ status: 'extracted', outputPath: join(outputDir, '02_Song.mp4') });
    });

    it('throws on a chapter index that does not exist', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);

      await expect(subject.extract({ kind: 'index', index: 7 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('returns an empty batch for a video without chapters', async () => {
      const subject = orchestrator(new FakeMetadataProvider(video({ description: 'no timestamps here' })));
      await subject.analyze(REFERENCE);

      const summary = await subject.extract({ kind: 'first' });

      expect(summary).toEqual({ outcomes: [], extracted: 0, failed: 0, outputDir });
      expect(acquirer.requests).toEqual([]);
    });
  });

  describe('downloadFull', () => {
    it('copies the whole video to a file named after its title', async () => {
      const subject = orchestrator(new FakeMetadataProvider(video({ title: 'My: Video' })));
      await subject.analyze(REFERENCE);

      const result = await subject.downloadFull();

      const outputPath = join(outputDir, 'My_ Video.mp4');
      expect(result).toEqual({ ok: true, outputPath, sizeBytes: 6 });
      expect(acquirer.requests[0]?.hint).toBeUndefined();
      expect(await pathExists(outputPath)).toBe(true);
      expect(await pathExists(join(mediaDir, 'source.mp4'))).toBe(false);
    });

    it('returns the download failure', async () => {
      const subject = orchestrator();
      await subject.analyze(REFERENCE);
      acquirer.failWith = new DownloadError('file-too-large', REFERENCE, 'Video exceeds the 500MB limit');

      const result = await subject.downloadFull();

      expect(result).toMatchObject({ ok: false, error: { kind: 'file-too-large' } });
    });
  });
});
