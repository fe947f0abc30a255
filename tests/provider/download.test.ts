import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { downloadAsset } from '../../src/provider/download';
import { ServiceError } from '../../src/domain/errors';

describe('downloadAsset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'download-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('streams the body to disk and returns the byte count', async () => {
    const fetchFn = jest.fn<Promise<Response>, [string, RequestInit]>(async () =>
      new Response('fake-video-bytes', { status: 200 }),
    );
    const dest = path.join(dir, 'out.mp4');

    const bytes = await downloadAsset('https://cdn.test/a.mp4', dest, { timeoutMs: 1000, fetchFn });

    expect(bytes).toBe(16);
    expect(await readFile(dest, 'utf8')).toBe('fake-video-bytes');
    expect(fetchFn.mock.calls[0][0]).toBe('https://cdn.test/a.mp4');
  });

  test('a non-OK status is a provider error', async () => {
    const fetchFn = jest.fn<Promise<Response>, [string, RequestInit]>(async () =>
      new Response('gone', { status: 404 }),
    );

    await expect(
      downloadAsset('https://cdn.test/a.mp4', path.join(dir, 'out.mp4'), { timeoutMs: 1000, fetchFn }),
    ).rejects.toMatchObject({
      typedError: { code: 'PROVIDER.REQUEST_FAILED', message: 'Asset download returned HTTP 404' },
    });
  });

  test('a network failure is wrapped', async () => {
    const fetchFn = jest.fn<Promise<Response>, [string, RequestInit]>(async () => {
      throw new Error('ECONNRESET');
    });

    const attempt = downloadAsset('https://cdn.test/a.mp4', path.join(dir, 'out.mp4'), { timeoutMs: 1000, fetchFn });
    await expect(attempt).rejects.toBeInstanceOf(ServiceError);
    await expect(attempt).rejects.toThrow('Asset download failed: ECONNRESET');
  });
});
