import { join } from 'node:path';
import { PipelineError } from '../../domain/errors.js';
import { downloadToFile } from '../../infra/media/downloader.js';
import type { MediaToolchain, ProbeResult } from '../../infra/media/MediaToolchain.js';
import { ToolchainError } from '../../infra/media/MediaToolchain.js';
import { logger } from '../../infra/logger.js';
import type { PipelineStage, StageContext } from './PipelineStage.js';
import { sourceExtension, sourceFileName } from './PipelineStage.js';

// ffprobe reports container families, not file extensions
const FORMAT_ALIASES: Record<string, string[]> = {
  mkv: ['matroska'],
  webm: ['webm', 'matroska'],
  mov: ['mov', 'mp4'],
  mp4: ['mp4', 'mov'],
  m4v: ['mp4', 'mov'],
};

export function probeMatchesFormats(probe: ProbeResult, allowedFormats: string[]): boolean {
  const reported = probe.formatName.split(',').map((name) => name.trim().toLowerCase());
  return allowedFormats.some((format) =>
    (FORMAT_ALIASES[format] ?? [format]).some((alias) => reported.includes(alias))
  );
}

export interface AcquireStageOptions {
  maxFileSize: number;
  allowedFormats: string[];
}

/**
 * Downloads the source video into scratch and checks it is a supported video
 */
export class AcquireStage implements PipelineStage {
  readonly name = 'acquire' as const;
  readonly status = 'DOWNLOADING' as const;
  readonly message = 'Downloading source video';
  readonly band = [0, 0.25] as const;
  readonly errorKind = 'ACQUIRE_FAILED' as const;

  constructor(
    private toolchain: MediaToolchain,
    private options: AcquireStageOptions
  ) {}

  async run(context: StageContext): Promise<void> {
    const { videoUrl } = context.job.parameters;
    const extension = sourceExtension(videoUrl);
    if (extension && !this.options.allowedFormats.includes(extension)) {
      throw new PipelineError('ACQUIRE_FAILED', `Unsupported video format: .${extension}`, false, {
        allowedFormats: this.options.allowedFormats,
      });
    }

    const destination = join(context.scratchDir, sourceFileName(videoUrl));
    const { bytes } = await downloadToFile(videoUrl, destination, {
      maxBytes: this.options.maxFileSize,
      signal: context.signal,
      onBytes: (received, total) => {
        if (total) context.reportProgress(received / total);
      },
    });

    let probe: ProbeResult;
    try {
      probe = await this.toolchain.probe(destination, context.signal);
    } catch (error) {
      if (error instanceof ToolchainError) {
        throw new PipelineError('ACQUIRE_FAILED', 'Source file is not a readable video', false);
      }
      throw error;
    }

    if (!probe.hasVideo) {
      throw new PipelineError('ACQUIRE_FAILED', 'Source file has no video stream', false);
    }
    if (!probeMatchesFormats(probe, this.options.allowedFormats)) {
      throw new PipelineError('ACQUIRE_FAILED', `Unsupported video format: ${probe.formatName}`, false, {
        allowedFormats: this.options.allowedFormats,
      });
    }

    logger.info('Source video acquired', {
      jobId: context.job.id,
      bytes,
      durationSeconds: probe.durationSeconds,
      format: probe.formatName,
    });
    context.reportProgress(1);
  }
}
