import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionClass, getSession, SOLID_TILE_SIZE } from './session.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { type Rgb, type RgbaImage } from '../types/color.js';
import { type TileImage } from '../types/tile.js';
import { loadTileDirectory, loadPngFile, savePngFile } from '../io/image-io.js';
import { loadConfigFile, saveConfigFile } from '../io/config-io.js';

vi.mock('../io/image-io.js', () => ({
  loadTileDirectory: vi.fn(),
  loadPngFile: vi.fn(),
  savePngFile: vi.fn(),
}));

vi.mock('../io/config-io.js', () => ({
  loadConfigFile: vi.fn(),
  saveConfigFile: vi.fn(),
}));

function solid(width: number, height: number, [r, g, b]: Rgb): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data.set([r, g, b, 255], i * 4);
  }
  return { width, height, data };
}

function tile(name: string, color: Rgb): TileImage {
  return { name, ...solid(2, 2, color) };
}

describe('SessionClass', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    SessionClass.reset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.mocked(savePngFile).mockResolvedValue(undefined);
    vi.mocked(saveConfigFile).mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the same singleton instance', () => {
    expect(SessionClass.instance()).toBe(SessionClass.instance());
    expect(getSession()).toBe(SessionClass.instance());
  });

  it('reset clears the singleton', () => {
    const a = SessionClass.instance();
    SessionClass.reset();
    expect(SessionClass.instance()).not.toBe(a);
  });

  it('starts with the default config and no index', () => {
    const session = getSession();
    expect(session.config).toEqual(DEFAULT_CONFIG);
    expect(session.index).toBeNull();
    expect(session.info()).toEqual({ config: DEFAULT_CONFIG, balanced: false, index: null });
  });

  describe('configure', () => {
    it('merges changes into the active config', () => {
      const session = getSession();
      const config = session.configure({ max_bucket_size: 12 });
      expect(config).toEqual({ ...DEFAULT_CONFIG, max_bucket_size: 12 });
      expect(session.config.max_bucket_size).toBe(12);
    });

    it('rejects an invalid result and keeps the previous config', () => {
      const session = getSession();
      expect(() => session.configure({ min_bucket_size: 100 })).toThrow(
        'Invalid index configuration: min_bucket_size must not exceed max_bucket_size',
      );
      expect(session.config).toEqual(DEFAULT_CONFIG);
    });

    it('discards the loaded index', () => {
      const session = getSession();
      session.addColorTile([1, 2, 3]);
      expect(session.index).not.toBeNull();
      session.configure({ distance_threshold: 5 });
      expect(session.index).toBeNull();
    });

    it('loadConfig applies the file contents', async () => {
      vi.mocked(loadConfigFile).mockResolvedValue({ merge_threshold: 99 });
      const config = await getSession().loadConfig('/cfg/tilematch.json');
      expect(loadConfigFile).toHaveBeenCalledWith('/cfg/tilematch.json');
      expect(config.merge_threshold).toBe(99);
    });

    it('saveConfig writes the active config', async () => {
      const session = getSession();
      session.configure({ min_bucket_size: 2 });
      await session.saveConfig('/cfg/out.json');
      expect(saveConfigFile).toHaveBeenCalledWith('/cfg/out.json', { ...DEFAULT_CONFIG, min_bucket_size: 2 });
    });
  });

  describe('load phase', () => {
    it('addTile inserts the tile under its average color', () => {
      const session = getSession();
      const color = session.addTile(tile('red.png', [250, 10, 10]));
      expect(color).toEqual([250, 10, 10]);
      expect(session.index?.elementCount).toBe(1);
    });

    it('addColorTile creates a solid tile', () => {
      const created = getSession().addColorTile([7, 8, 9]);
      expect(created.name).toBe('rgb(7,8,9)');
      expect(created.width).toBe(SOLID_TILE_SIZE);
      expect(Array.from(created.data.slice(0, 4))).toEqual([7, 8, 9, 255]);
    });

    it('loadTiles adds every decoded tile and reports skipped files', async () => {
      vi.mocked(loadTileDirectory).mockResolvedValue({
        tiles: [tile('a.png', [0, 0, 0]), tile('b.png', [255, 255, 255])],
        skipped: ['c.png'],
      });

      const session = getSession();
      const result = await session.loadTiles('/tiles');

      expect(loadTileDirectory).toHaveBeenCalledWith('/tiles');
      expect(result).toEqual({ loaded: ['a.png', 'b.png'], skipped: ['c.png'] });
      expect(session.index?.elementCount).toBe(2);
      expect(session.index?.buckets).toHaveLength(2);
    });

    it('balance requires tiles', () => {
      expect(() => getSession().balance()).toThrow(
        'No tiles loaded. Call mosaic_index load_tiles or add_color first.',
      );
    });

    it('balance logs and returns the report', () => {
      const session = getSession();
      session.addColorTile([0, 0, 0]);
      const report = session.balance();
      expect(report.bucketCount).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        'Balanced index: split 0 into 0, merged 0 into 0, 1 bucket(s) total',
      );
      expect(session.info().balanced).toBe(true);
    });
  });

  describe('query phase', () => {
    it('query requires a balanced index', () => {
      const session = getSession();
      expect(() => session.query([0, 0, 0])).toThrow('No tiles loaded');
      session.addColorTile([0, 0, 0]);
      expect(() => session.query([0, 0, 0])).toThrow(
        'Index is not balanced yet. Call mosaic_index balance before querying.',
      );
    });

    it('query returns the closest tile and its bucket color', () => {
      const session = getSession();
      session.addColorTile([0, 0, 0], 'black');
      session.addColorTile([255, 255, 255], 'white');
      session.balance();

      const result = session.query([240, 240, 240]);
      expect(result.tile.name).toBe('white');
      expect(result.color).toEqual([255, 255, 255]);
      expect(result.bucketColor).toEqual([255, 255, 255]);
    });

    it('render paints each cell with the closest tile and writes the result', async () => {
      const session = getSession();
      session.addColorTile([0, 0, 0], 'black');
      session.addColorTile([255, 255, 255], 'white');
      session.balance();

      // 4×2 source: left half near-black, right half near-white
      const source = solid(4, 2, [10, 10, 10]);
      for (const [x, y] of [[2, 0], [3, 0], [2, 1], [3, 1]]) {
        source.data.set([245, 245, 245, 255], (y * 4 + x) * 4);
      }
      vi.mocked(loadPngFile).mockResolvedValue(source);

      const result = await session.render('/in.png', 2, '/out.png');

      expect(result).toEqual({ outputPath: '/out.png', width: 4, height: 2, cells: 2, distinctTiles: 2 });
      expect(savePngFile).toHaveBeenCalledTimes(1);
      const [writtenPath, written] = vi.mocked(savePngFile).mock.calls[0];
      expect(writtenPath).toBe('/out.png');
      expect(Array.from(written.data.slice(0, 4))).toEqual([0, 0, 0, 255]);
      expect(Array.from(written.data.slice(12, 16))).toEqual([255, 255, 255, 255]);
    });

    it('render reports an unwritable output path', async () => {
      const session = getSession();
      session.addColorTile([0, 0, 0]);
      session.balance();
      vi.mocked(loadPngFile).mockResolvedValue(solid(1, 1, [0, 0, 0]));
      vi.mocked(savePngFile).mockRejectedValue(Object.assign(new Error('EACCES'), { code: 'EACCES' }));

      await expect(session.render('/in.png', 1, '/root-only/out.png')).rejects.toThrow(
        'Cannot write to path: /root-only/out.png',
      );
    });
  });

  it('info summarizes the index', () => {
    const session = getSession();
    session.addColorTile([0, 0, 0]);
    session.addColorTile([2, 2, 2]);

    expect(session.info()).toEqual({
      config: DEFAULT_CONFIG,
      balanced: false,
      index: {
        bucketCount: 1,
        elementCount: 2,
        buckets: [{ avgColor: [1, 1, 1], size: 2 }],
      },
    });
  });
});
