import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { TransportError } from '../errors';
import { HttpMediaDownloader } from './media-downloader';

describe('HttpMediaDownloader', () => {
  let server: http.Server;
  let baseUrl: string;
  let dir: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      switch (req.url) {
        case '/clip.mp4':
          res.writeHead(200, { 'Content-Type': 'video/mp4' });
          res.end('0123456789');
          break;
        case '/moved.mp4':
          res.writeHead(302, { Location: '/clip.mp4' });
          res.end();
          break;
        case '/empty.mp4':
          res.writeHead(200);
          res.end();
          break;
        case '/short.mp4':
          res.writeHead(200, { 'Content-Type': 'video/mp4', 'Content-Length': '100' });
          res.write('0123456789', () => res.destroy());
          break;
        case '/stall.mp4':
          // Never answers
          break;
        default:
          res.writeHead(404, 'Not Found');
          res.end();
      }
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'adloop-dl-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the body to the destination and removes the temp file', async () => {
    const dest = path.join(dir, 'nested', 'video_1.mp4');

    const bytes = await new HttpMediaDownloader(5000).download(`${baseUrl}/clip.mp4`, dest, new AbortController().signal);

    expect(bytes).toBe(10);
    expect(fs.readFileSync(dest, 'utf8')).toBe('0123456789');
    expect(fs.existsSync(`${dest}.tmp`)).toBe(false);
  });

  it('follows redirects', async () => {
    const dest = path.join(dir, 'video_2.mp4');
    await new HttpMediaDownloader(5000).download(`${baseUrl}/moved.mp4`, dest, new AbortController().signal);
    expect(fs.readFileSync(dest, 'utf8')).toBe('0123456789');
  });

  it('rejects a non-200 status', async () => {
    const dest = path.join(dir, 'video_3.mp4');
    const error = await new HttpMediaDownloader(5000)
      .download(`${baseUrl}/missing.mp4`, dest, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 404, message: 'HTTP 404 Not Found' });
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('rejects an empty body without leaving files behind', async () => {
    const dest = path.join(dir, 'video_4.mp4');

    await expect(
      new HttpMediaDownloader(5000).download(`${baseUrl}/empty.mp4`, dest, new AbortController().signal),
    ).rejects.toThrow(TransportError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('rejects a body shorter than its Content-Length', async () => {
    const dest = path.join(dir, 'video_6.mp4');

    await expect(
      new HttpMediaDownloader(5000).download(`${baseUrl}/short.mp4`, dest, new AbortController().signal),
    ).rejects.toThrow(TransportError);
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('gives up on a server that does not answer in time', async () => {
    const dest = path.join(dir, 'video_7.mp4');
    const error = await new HttpMediaDownloader(50)
      .download(`${baseUrl}/stall.mp4`, dest, new AbortController().signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: `Request failed for ${baseUrl}/stall.mp4: Download timeout` });
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('refuses to start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new HttpMediaDownloader(5000).download(`${baseUrl}/clip.mp4`, path.join(dir, 'video_5.mp4'), controller.signal),
    ).rejects.toThrow('Download aborted');
  });
});
