/**
 * ffmpeg / ffprobe invocations
 *
 * Encodes run through spawn so `-progress` output can be streamed; probes use
 * execFile and parse the JSON report.
 */

import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { MediaToolchain, ProbeResult, RunOptions } from './MediaToolchain.js';
import { ToolchainError } from './MediaToolchain.js';

const execFileAsync = promisify(execFile);

const STDERR_TAIL_BYTES = 4096;
const PROBE_TIMEOUT_MS = 30_000;

const probeSchema = z.object({
  format: z
    .object({
      format_name: z.string().default(''),
      duration: z.coerce.number().optional(),
    })
    .default({}),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        duration: z.coerce.number().optional(),
      })
    )
    .default([]),
});

export function parseProbeOutput(stdout: string): ProbeResult {
  const data = probeSchema.parse(JSON.parse(stdout));
  const video = data.streams.find((stream) => stream.codec_type === 'video');
  const audio = data.streams.find((stream) => stream.codec_type === 'audio');

  return {
    durationSeconds: data.format.duration ?? video?.duration ?? 0,
    formatName: data.format.format_name,
    width: video?.width ?? 0,
    height: video?.height ?? 0,
    hasVideo: video !== undefined,
    hasAudio: audio !== undefined,
  };
}

/**
 * Reads `out_time_us=` lines from `-progress` output and reports the completed fraction
 */
export function parseProgressChunk(chunk: string, durationSeconds: number): number | null {
  let latest: number | null = null;
  for (const line of chunk.split('\n')) {
    const match = /^out_time_(?:us|ms)=(\d+)/.exec(line.trim());
    if (match && durationSeconds > 0) {
      const seconds = Number(match[1]) / 1_000_000;
      latest = Math.min(1, Math.max(0, seconds / durationSeconds));
    }
  }
  return latest;
}

export class FfmpegToolchain implements MediaToolchain {
  constructor(
    private ffmpegPath: string = 'ffmpeg',
    private ffprobePath: string = 'ffprobe'
  ) {}

  async probe(path: string, signal?: AbortSignal): Promise<ProbeResult> {
    try {
      const { stdout } = await execFileAsync(
        this.ffprobePath,
        ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', path],
        { timeout: PROBE_TIMEOUT_MS, maxBuffer: 10 * 1024 * 1024, signal }
      );
      return parseProbeOutput(stdout);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('ffprobe failed', { path, error: message });
      throw new ToolchainError('ffprobe could not read the file', null, message.slice(-STDERR_TAIL_BYTES));
    }
  }

  run(args: string[], options: RunOptions = {}): Promise<void> {
    const fullArgs = ['-hide_banner', '-nostdin', '-nostats', '-progress', 'pipe:1', ...args];

    return new Promise<void>((resolve, reject) => {
      let stderrTail = '';
      let settled = false;
      const settle = (error?: ToolchainError) => {
        if (settled) return;
        settled = true;
        if (error) reject(error);
        else resolve();
      };

      const child = spawn(this.ffmpegPath, fullArgs, {
        stdio: ['ignore', 'pipe', 'pipe'],
        signal: options.signal,
      });

      child.stdout.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        if (!options.onProgress || !options.durationSeconds) return;
        const fraction = parseProgressChunk(chunk, options.durationSeconds);
        if (fraction !== null) {
          options.onProgress(fraction);
        }
      });

      child.stderr.setEncoding('utf-8');
      child.stderr.on('data', (chunk: string) => {
        stderrTail = (stderrTail + chunk).slice(-STDERR_TAIL_BYTES);
      });

      child.on('error', (error) => {
        logger.error('ffmpeg failed to run', { error: error.message });
        settle(new ToolchainError(`ffmpeg could not run: ${error.name}`, null, stderrTail));
      });

      child.on('close', (code) => {
        if (code === 0) {
          settle();
          return;
        }
        logger.error('ffmpeg exited with an error', { exitCode: code, stderr: stderrTail });
        settle(new ToolchainError(`ffmpeg exited with code ${String(code)}`, code, stderrTail));
      });
    });
  }
}
