import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { downloadImages, resolveImagesDir } from './download-images';

jest.mock('axios');

const mockedAxios = jest.mocked(axios);

const okResponse = (data: Buffer): AxiosResponse => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('downloadImages', () => {
  let imagesDir: string;

  beforeEach(async () => {
    imagesDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bytebite-images-'));
    mockedAxios.get.mockReset();
  });

  afterEach(async () => {
    await fs.rm(imagesDir, { recursive: true, force: true });
  });

  it('downloads missing images, skips present ones and reports failures', async () => {
    await fs.writeFile(path.join(imagesDir, '1.jpg'), 'already here');
    const png = await sharp({
      create: {
        width: 600,
        height: 300,
        channels: 3,
        background: { r: 10, g: 20, b: 30 },
      },
    })
      .png()
      .toBuffer();
    mockedAxios.get
      .mockResolvedValueOnce(okResponse(png))
      .mockRejectedValueOnce(new Error('timeout of 15000ms exceeded'));

    const report = await downloadImages(imagesDir, [
      { file: '1.jpg', url: 'https://images.example.test/1' },
      { file: '2.jpg', url: 'https://images.example.test/2' },
      { file: '3.jpg', url: 'https://images.example.test/3' },
    ]);

    expect(report).toEqual({
      downloaded: ['2.jpg'],
      skipped: ['1.jpg'],
      failed: ['3.jpg'],
    });
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    expect(mockedAxios.get).toHaveBeenCalledWith(
      'https://images.example.test/2',
      { responseType: 'arraybuffer', timeout: 15000 },
    );
    const saved = await sharp(path.join(imagesDir, '2.jpg')).metadata();
    expect(saved.format).toBe('jpeg');
    expect(saved.width).toBe(400);
    expect((await fs.readdir(imagesDir)).sort()).toEqual(['1.jpg', '2.jpg']);
  });

  describe('resolveImagesDir', () => {
    it('falls back to the configured default', () => {
      expect(resolveImagesDir({})).toBe(path.resolve('images'));
    });

    it('resolves the configured directory', () => {
      expect(resolveImagesDir({ IMAGES_DIR: 'data/dishes' })).toBe(
        path.resolve('data/dishes'),
      );
    });

    it('rejects an empty directory', () => {
      expect(() => resolveImagesDir({ IMAGES_DIR: '' })).toThrow(
        '"value" is not allowed to be empty',
      );
    });
  });
});
