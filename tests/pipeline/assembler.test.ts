import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProcessError, runProcess } from '../../src/media/process.js';
import {
  buildCompositionArgs,
  buildFilterGraph,
  composeVideo,
  compositionTimeoutMs,
  partialPathFor,
} from '../../src/pipeline/assembler.js';
import { planTimeline } from '../../src/pipeline/planner.js';
import { CompositionError, InputError } from '../../src/utils/errors.js';
import type { Timeline } from '../../src/types.js';
import { HD, audioAsset, overlaysFor, scenarioTimeline, segments, videoAsset } from '../helpers/fixtures.js';
import { emptyOutput } from '../helpers/media-stub.js';

vi.mock('../../src/media/process.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/media/process.js')>();
  return { ...actual, runProcess: vi.fn() };
});

const mockRun = vi.mocked(runProcess);
const PATHS = { filterScriptPath: '/work/run/filtergraph.txt', partialPath: '/out/.video.mp4.run.partial' };

describe('buildFilterGraph', () => {
  it('should loop, overlay and mix scenario A in one graph', () => {
    expect(buildFilterGraph(scenarioTimeline()).split(';\n')).toEqual([
      '[0:v]scale=1920:1080:force_original_aspect_ratio=increase,crop=1920:1080,setsar=1,fps=25,trim=duration=60,setpts=PTS-STARTPTS[bg]',
      '[1:v]scale=1920:1080,setsar=1,format=rgba[ov0]',
      '[2:v]scale=1920:1080,setsar=1,format=rgba[ov1]',
      '[3:v]scale=1920:1080,setsar=1,format=rgba[ov2]',
      "[bg][ov0]overlay=x=0:y=0:enable='gte(t,0)*lt(t,20)'[v0]",
      "[v0][ov1]overlay=x=0:y=0:enable='gte(t,20)*lt(t,40)'[v1]",
      "[v1][ov2]overlay=x=0:y=0:enable='gte(t,40)*lt(t,60)'[v2]",
      '[v2]format=yuv420p[vout]',
      '[4:a]atrim=duration=60,asetpts=PTS-STARTPTS,aresample=48000,volume=0dB,alimiter=limit=0.89:level=disabled[aout]',
    ]);
  });

  it('should never use frame-repeating filters or concatenation', () => {
    const graph = buildFilterGraph(scenarioTimeline({ background: 7, audio: 13, count: 12 }));

    expect(graph).not.toMatch(/(^|[,\]])(loop|aloop|tpad|concat)=/m);
  });

  it('should make adjacent windows meet without overlap', () => {
    const graph = buildFilterGraph(scenarioTimeline({ total: 10 }));

    expect(graph).toContain("enable='gte(t,0)*lt(t,3.333333)'");
    expect(graph).toContain("enable='gte(t,3.333333)*lt(t,6.666667)'");
    expect(graph).toContain("enable='gte(t,6.666667)*lt(t,10)'");
  });
});

describe('buildCompositionArgs', () => {
  it('should loop short inputs with the native input loop', () => {
    const args = buildCompositionArgs(scenarioTimeline(), PATHS);

    expect(args.slice(0, 12)).toEqual([
      '-v', 'error',
      '-stream_loop', '-1', '-i', '/assets/background.mp4',
      '-i', '/work/overlay_0000.png',
      '-i', '/work/overlay_0001.png',
      '-i', '/work/overlay_0002.png',
    ]);
    expect(args.slice(12, 16)).toEqual(['-stream_loop', '-1', '-i', '/assets/music.m4a']);
  });

  it('should not loop inputs that already cover the total', () => {
    const args = buildCompositionArgs(scenarioTimeline({ background: 90, audio: 90 }), PATHS);

    expect(args).not.toContain('-stream_loop');
  });

  it('should encode deterministically to the partial path', () => {
    const args = buildCompositionArgs(scenarioTimeline(), PATHS);

    expect(args.slice(16)).toEqual([
      '-filter_complex_script', '/work/run/filtergraph.txt',
      '-map', '[vout]',
      '-map', '[aout]',
      '-t', '60',
      '-r', '25',
      '-c:v', 'libx264',
      '-preset', 'medium',
      '-crf', '23',
      '-pix_fmt', 'yuv420p',
      '-c:a', 'aac',
      '-b:a', '192k',
      '-ar', '48000',
      '-map_metadata', '-1',
      '-fflags', '+bitexact',
      '-flags:v', '+bitexact',
      '-flags:a', '+bitexact',
      '-movflags', '+faststart',
      '-f', 'mp4',
      '/out/.video.mp4.run.partial',
    ]);
  });
});

describe('compositionTimeoutMs', () => {
  it('should add a per-second budget to the base allowance', () => {
    expect(compositionTimeoutMs(60)).toBe(180_000);
    expect(compositionTimeoutMs(28_800)).toBe(28_920_000);
  });
});

describe('partialPathFor', () => {
  it('should place a hidden run-scoped file beside the output', () => {
    expect(partialPathFor('/out/videos/final.mp4', 'abc')).toBe('/out/videos/.final.mp4.abc.partial');
  });
});

describe('composeVideo', () => {
  let dir: string;
  let timeline: Timeline;
  let outputPath: string;

  beforeEach(() => {
    mockRun.mockReset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'compose-test-'));
    const segs = segments(2);
    const overlays = overlaysFor(segs).map(o => ({ ...o, imagePath: path.join(dir, path.basename(o.imagePath)) }));
    const background = videoAsset(10, { path: path.join(dir, 'bg.mp4') });
    const audio = audioAsset(10, { path: path.join(dir, 'music.m4a') });
    for (const file of [background.path, audio.path, ...overlays.map(o => o.imagePath)]) {
      fs.writeFileSync(file, '');
    }
    timeline = planTimeline({ totalDuration: 20, canvas: HD, segments: segs, overlays, background, audio });
    outputPath = path.join(dir, 'out', 'video.mp4');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  // Stands in for FFmpeg: writes whatever file is last on the command line
  function writeOutput(args: readonly string[]): void {
    const target = args[args.length - 1];
    if (target) fs.writeFileSync(target, 'mp4-bytes');
  }

  it('should move the finished render into place', async () => {
    mockRun.mockImplementation(async (_command, args) => {
      writeOutput(args);
      return emptyOutput();
    });

    await expect(composeVideo(timeline, outputPath, { runId: 'run1', workDir: path.join(dir, 'work') }))
      .resolves.toBe(outputPath);

    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('mp4-bytes');
    expect(fs.existsSync(partialPathFor(outputPath, 'run1'))).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'work', 'filtergraph.txt'), 'utf-8')).toBe(buildFilterGraph(timeline));
  });

  it('should pass the duration-proportional deadline to the process runner', async () => {
    mockRun.mockImplementation(async (_command, args) => {
      writeOutput(args);
      return emptyOutput();
    });

    await composeVideo(timeline, outputPath, { runId: 'run1', workDir: dir });

    expect(mockRun.mock.calls[0]?.[2]).toEqual({ label: 'compose', timeoutMs: 140_000 });
  });

  it('should remove the partial file and report the diagnostic on failure', async () => {
    mockRun.mockImplementation(async (_command, args) => {
      writeOutput(args);
      throw new ProcessError('compose: ffmpeg exited with code 1', 'compose', 1, 'Error while filtering', false);
    });

    const failure = composeVideo(timeline, outputPath, { runId: 'run2', workDir: dir });

    await expect(failure).rejects.toBeInstanceOf(CompositionError);
    await expect(failure).rejects.toMatchObject({
      message: 'Composition failed',
      diagnostic: 'Error while filtering',
      exitCode: 1,
      timedOut: false,
    });
    expect(fs.existsSync(partialPathFor(outputPath, 'run2'))).toBe(false);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('should report a timeout without retrying', async () => {
    mockRun.mockRejectedValue(new ProcessError('compose: ffmpeg timed out', 'compose', null, '', true));

    await expect(composeVideo(timeline, outputPath, { runId: 'run3', workDir: dir, timeoutMs: 5_000 }))
      .rejects.toMatchObject({ message: 'Composition timed out after 5000ms', timedOut: true });
    expect(mockRun).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('should refuse to start when an input file is missing', async () => {
    fs.rmSync(timeline.audio.source.path);

    await expect(composeVideo(timeline, outputPath, { runId: 'run4', workDir: dir })).rejects.toBeInstanceOf(InputError);
    expect(mockRun).not.toHaveBeenCalled();
  });
});
