import { spawn } from 'child_process';
import { Readable } from 'stream';
import { ffmpegBinary } from '../config';

export function isExpectedStreamTeardownError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  const message = error.message.toLowerCase();
  return code === 'ERR_STREAM_PREMATURE_CLOSE'
    || code === 'EPIPE'
    || message.includes('premature close')
    || message.includes('aborted');
}

export function logStreamIssue(context: string, error: unknown): void {
  if (isExpectedStreamTeardownError(error)) {
    console.log(`${context} (expected teardown)`);
    return;
  }
  console.error(context, error);
}

export function ffmpegArgs(url: string): string[] {
  return [
    '-reconnect', '1',
    '-reconnect_streamed', '1',
    '-reconnect_delay_max', '5',
    '-i', url,
    '-vn',
    '-analyzeduration', '0',
    '-loglevel', 'error',
    '-f', 's16le',
    '-ar', '48000',
    '-ac', '2',
    'pipe:1',
  ];
}

/** Decodes `url` into raw 48 kHz stereo PCM. Killing the stream's consumer ends ffmpeg. */
export function createFfmpegStream(url: string): Readable {
  const ffmpeg = spawn(ffmpegBinary(), ffmpegArgs(url));

  ffmpeg.on('error', (error) => {
    console.error('[ffmpeg] Process error:', error);
  });

  ffmpeg.on('exit', (code, signal) => {
    if (code !== 0 && signal !== 'SIGKILL') {
      console.log(`[ffmpeg] Exited with code ${code} and signal ${signal}`);
    }
  });

  ffmpeg.stderr.on('data', (data: Buffer) => {
    const message = data.toString().trim();
    if (!message) return;
    if (message.includes('403') || message.includes('Forbidden')) {
      console.error('[ffmpeg] Access forbidden - stream URL may have expired');
    }
    console.error('[ffmpeg] stderr:', message);
  });

  ffmpeg.stdout.on('error', (error) => {
    logStreamIssue('[ffmpeg] stdout error', error);
  });

  ffmpeg.stdout.on('close', () => {
    if (ffmpeg.exitCode === null) ffmpeg.kill('SIGKILL');
  });

  return ffmpeg.stdout;
}
