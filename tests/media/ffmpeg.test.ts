import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runProcess } from '../../src/media/process.js';
import { detectVolume, formatSeconds, listFilters, parseVolumeStats, probeMedia } from '../../src/media/ffmpeg.js';
import { emptyOutput, probeOutput, volumeOutput } from '../helpers/media-stub.js';

vi.mock('../../src/media/process.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/media/process.js')>();
  return { ...actual, runProcess: vi.fn() };
});

const mockRun = vi.mocked(runProcess);

beforeEach(() => {
  mockRun.mockReset();
});

describe('formatSeconds', () => {
  it('should drop float noise and trailing zeros', () => {
    expect(formatSeconds(0.1 + 0.2)).toBe('0.3');
    expect(formatSeconds(60)).toBe('60');
    expect(formatSeconds(1e-7)).toBe('0');
  });
});

describe('probeMedia', () => {
  it('should read size, rate and duration of a video', async () => {
    mockRun.mockResolvedValue(probeOutput([
      { codec_type: 'video', width: 1920, height: 1080, r_frame_rate: '30000/1001', duration: '12.012000' },
      { codec_type: 'audio', duration: '12.000000' },
    ], 12.05));

    const asset = await probeMedia('/assets/bg.mp4', 'video');

    expect(asset).toEqual({
      path: '/assets/bg.mp4',
      kind: 'video',
      duration: 12.05,
      width: 1920,
      height: 1080,
      fps: 30000 / 1001,
      hasAudio: true,
    });
    expect(mockRun.mock.calls[0]?.[0]).toBe('ffprobe');
  });

  it('should fall back to the stream duration', async () => {
    mockRun.mockResolvedValue(probeOutput([{ codec_type: 'audio', duration: '183.4' }]));

    expect((await probeMedia('/assets/music.mp3', 'audio')).duration).toBe(183.4);
  });

  it('should report zero duration for a still image', async () => {
    mockRun.mockResolvedValue(probeOutput([{ codec_type: 'video', width: 640, height: 360 }], 0.04));

    expect(await probeMedia('/work/overlay_0000.png', 'image')).toMatchObject({ duration: 0, width: 640, fps: undefined });
  });

  it('should reject music without an audio stream', async () => {
    mockRun.mockResolvedValue(probeOutput([{ codec_type: 'video', width: 640, height: 360 }], 5));

    await expect(probeMedia('/assets/clip.mp4', 'audio')).rejects.toThrow('No audio stream in /assets/clip.mp4');
  });

  it('should reject unreadable probe output', async () => {
    mockRun.mockResolvedValue({ stdout: Buffer.from('not json'), stderr: '' });

    await expect(probeMedia('/assets/bg.mp4', 'video')).rejects.toThrow('FFprobe returned unreadable output');
  });
});

describe('volume analysis', () => {
  it('should parse the volumedetect summary', () => {
    expect(parseVolumeStats('mean_volume: -18.3 dB\nmax_volume: -0.4 dB')).toEqual({ meanVolumeDb: -18.3, maxVolumeDb: -0.4 });
  });

  it('should read missing or infinite levels as silence', () => {
    expect(parseVolumeStats('mean_volume: -inf dB')).toEqual({ meanVolumeDb: -99, maxVolumeDb: -99 });
  });

  it('should analyse the first audio stream', async () => {
    mockRun.mockResolvedValue(volumeOutput('-20.0', '-3.5'));

    await expect(detectVolume('/out/video.mp4')).resolves.toEqual({ meanVolumeDb: -20, maxVolumeDb: -3.5 });
    const args = mockRun.mock.calls[0]?.[1];
    expect(args).toContain('volumedetect');
    expect(args).toContain('0:a:0');
  });
});

describe('listFilters', () => {
  it('should collect filter names from the filter table', async () => {
    mockRun.mockResolvedValue({
      stdout: Buffer.from([
        'Filters:',
        '  T.. = Timeline support',
        '  ------',
        ' TSC alimiter          A->A       Audio lookahead limiter.',
        ' T.C drawtext          V->V       Draw text on top of video frames using libfreetype library.',
        ' ... volumedetect      A->N       Detect audio volume.',
      ].join('\n')),
      stderr: '',
    });

    const filters = await listFilters();

    expect([...filters]).toEqual(['alimiter', 'drawtext', 'volumedetect']);
  });

  it('should return an empty set when ffmpeg lists nothing', async () => {
    mockRun.mockResolvedValue(emptyOutput());

    expect((await listFilters()).size).toBe(0);
  });
});
