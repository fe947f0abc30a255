/**
 * Still-frame extraction with ffmpeg.
 *
 * Runs `ffmpeg -y -ss <offset> -i <video> -frames:v 1 <image>` as a child
 * process. A non-zero exit rejects with the tail of stderr.
 */

import { spawn } from 'child_process';

export interface FrameExtractor {
  extractFrame(videoPath: string, imagePath: string): Promise<void>;
}

const STDERR_TAIL_CHARS = 500;

export class FfmpegFrameExtractor implements FrameExtractor {
  constructor(private ffmpegPath = 'ffmpeg', private offset = '00:00:01') {}

  extractFrame(videoPath: string, imagePath: string): Promise<void> {
    const args = ['-y', '-ss', this.offset, '-i', videoPath, '-frames:v', '1', imagePath];

    return new Promise((resolve, reject) => {
      const child = spawn(this.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';

      child.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_CHARS);
      });
      child.on('error', (err) => {
        reject(new Error(`Failed to start ffmpeg: ${err.message}`, { cause: err }));
      });
      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const exit = signal ? `signal ${signal}` : `code ${code}`;
        reject(new Error(`ffmpeg exited with ${exit}: ${stderr.trim()}`));
      });
    });
  }
}
