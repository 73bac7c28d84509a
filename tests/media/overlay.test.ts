import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runProcess, ProcessError } from '../../src/media/process.js';
import {
  buildOverlayFilter,
  overlayBaseName,
  renderOverlay,
  renderOverlays,
  resolveFont,
  styleForCanvas,
} from '../../src/media/overlay.js';
import { RenderError } from '../../src/utils/errors.js';
import { HD } from '../helpers/fixtures.js';
import { emptyOutput, probeOutput } from '../helpers/media-stub.js';

vi.mock('../../src/media/process.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/media/process.js')>();
  return { ...actual, runProcess: vi.fn() };
});

const mockRun = vi.mocked(runProcess);
const NO_FONTS = {};

// Image probe answers with the given size, ffmpeg succeeds silently
function stubTools(size = HD) {
  mockRun.mockImplementation(async (command) =>
    command === 'ffprobe'
      ? probeOutput([{ codec_type: 'video', width: size.width, height: size.height }])
      : emptyOutput(),
  );
}

describe('overlay renderer', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'overlay-test-'));
    mockRun.mockReset();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('styleForCanvas', () => {
    it('should use the reference style on a 1920x1080 canvas', () => {
      const style = styleForCanvas(HD, NO_FONTS);

      expect(style.fontSize).toBe(52);
      expect(style.lineHeight).toBe(60);
      expect(style.maxLineChars).toBe(50);
      expect(style.fontFile).toBeUndefined();
    });

    it('should narrow the wrap width on a square canvas', () => {
      const style = styleForCanvas({ width: 1080, height: 1080 }, NO_FONTS);

      expect(style.maxLineChars).toBe(28);
      expect(style.fontSize).toBe(52);
    });

    it('should scale type with canvas height', () => {
      const style = styleForCanvas({ width: 1280, height: 720 }, NO_FONTS);

      expect(style.fontSize).toBe(35);
      expect(style.lineHeight).toBe(40);
      expect(style.referenceFontSize).toBe(24);
    });
  });

  describe('resolveFont', () => {
    it('should keep the configured font when it exists', () => {
      const configured = path.join(workDir, 'Configured.ttf');
      fs.writeFileSync(configured, 'font');

      expect(resolveFont(configured, [])).toBe(configured);
    });

    it('should fall back to a system font when the configured one is missing', () => {
      const system = path.join(workDir, 'System.ttf');
      fs.writeFileSync(system, 'font');

      expect(resolveFont(path.join(workDir, 'Missing.ttf'), [path.join(workDir, 'Absent.ttf'), system])).toBe(system);
    });

    it('should fall back to the built-in face when no font file exists', async () => {
      const fontFile = resolveFont(path.join(workDir, 'Missing.ttf'), [path.join(workDir, 'Absent.ttf')]);
      const style = styleForCanvas(HD, { fontFile, referenceFontFile: fontFile });
      const filter = await buildOverlayFilter({ index: 0, text: 'Rest' }, HD, workDir, style);

      expect(fontFile).toBeUndefined();
      expect(filter).toContain(':font=Sans:');
      expect(filter).not.toContain('fontfile=');
    });
  });

  describe('buildOverlayFilter', () => {
    it('should centre the verse and reference over a panel', async () => {
      const filter = await buildOverlayFilter(
        { index: 3, text: '"Be still, and know."', reference: 'Test 46:10' },
        HD,
        workDir,
        styleForCanvas(HD, NO_FONTS),
      );
      const base = path.join(workDir, 'overlay_0003');

      expect(filter.split(',drawtext=')).toEqual([
        'drawbox=x=0:y=432:w=iw:h=216:color=black@0.471:t=fill:replace=1',
        `textfile=${base}.line01.txt:expansion=none:font=Sans:fontsize=52:fontcolor=white:x=(w-text_w)/2:y=482`,
        `textfile=${base}.ref.txt:expansion=none:font=Sans:fontsize=36:fontcolor=0xC8C8C8:x=(w-text_w)/2:y=562`,
      ]);
    });

    it('should hand text to the drawing step through files', async () => {
      await buildOverlayFilter(
        { index: 3, text: '"Be still, and know."', reference: 'Test 46:10' },
        HD,
        workDir,
        styleForCanvas(HD, NO_FONTS),
      );

      expect(fs.readFileSync(path.join(workDir, 'overlay_0003.line01.txt'), 'utf-8')).toBe('Be still, and know.');
      expect(fs.readFileSync(path.join(workDir, 'overlay_0003.ref.txt'), 'utf-8')).toBe('Test 46:10');
    });

    it('should write one file per wrapped line', async () => {
      const style = { ...styleForCanvas(HD, NO_FONTS), maxLineChars: 12 };
      const filter = await buildOverlayFilter({ index: 0, text: 'peace be with you all' }, HD, workDir, style);

      expect(filter.match(/drawtext=/g)).toHaveLength(2);
      expect(fs.readFileSync(path.join(workDir, 'overlay_0000.line01.txt'), 'utf-8')).toBe('peace be');
      expect(fs.readFileSync(path.join(workDir, 'overlay_0000.line02.txt'), 'utf-8')).toBe('with you all');
    });

    it('should use the configured font file when one is given', async () => {
      const style = styleForCanvas(HD, { fontFile: '/fonts/Serif.ttf' });
      const filter = await buildOverlayFilter({ index: 0, text: 'Rest' }, HD, workDir, style);

      expect(filter).toContain(':fontfile=/fonts/Serif.ttf:');
    });

    it('should reject text that is empty once quotes are removed', async () => {
      await expect(
        buildOverlayFilter({ index: 0, text: ' "" ' }, HD, workDir, styleForCanvas(HD, NO_FONTS)),
      ).rejects.toThrow(RenderError);
    });
  });

  describe('renderOverlay', () => {
    it('should draw onto a transparent canvas-sized source', async () => {
      stubTools();

      const overlay = await renderOverlay({ index: 7, text: 'Rest' }, HD, workDir, styleForCanvas(HD, NO_FONTS));

      expect(overlay).toEqual({
        segmentIndex: 7,
        imagePath: path.join(workDir, `${overlayBaseName(7)}.png`),
        width: 1920,
        height: 1080,
      });
      const call = mockRun.mock.calls[0];
      const args = call?.[1];
      expect(call?.[0]).toBe('ffmpeg');
      expect(args).toContain('color=c=black@0:s=1920x1080:d=1:r=1,format=rgba');
      expect(args?.[args.length - 1]).toBe(overlay.imagePath);
    });

    it('should wrap a drawing failure with the tool diagnostic', async () => {
      mockRun.mockRejectedValue(new ProcessError('exited with code 1', 'renderOverlay:0', 1, 'No such filter: drawtext', false));

      const failure = renderOverlay({ index: 0, text: 'Rest' }, HD, workDir, styleForCanvas(HD, NO_FONTS));

      await expect(failure).rejects.toBeInstanceOf(RenderError);
      await expect(failure).rejects.toMatchObject({
        stage: 'render',
        details: { segmentIndex: 0, diagnostic: 'No such filter: drawtext' },
      });
    });

    it('should reject an image that is not canvas-sized', async () => {
      stubTools({ width: 1280, height: 720 });

      await expect(
        renderOverlay({ index: 0, text: 'Rest' }, HD, workDir, styleForCanvas(HD, NO_FONTS)),
      ).rejects.toThrow('Overlay 0 has the wrong size');
    });
  });

  describe('renderOverlays', () => {
    it('should render every segment in order', async () => {
      stubTools();

      const overlays = await renderOverlays(
        [{ index: 1, text: 'one' }, { index: 4, text: 'two' }],
        HD,
        workDir,
      );

      expect(overlays.map(o => o.segmentIndex)).toEqual([1, 4]);
      expect(overlays.map(o => path.basename(o.imagePath))).toEqual(['overlay_0001.png', 'overlay_0004.png']);
    });
  });
});
