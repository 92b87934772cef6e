import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { PipelineError, StorageError } from '../../domain/errors.js';
import type { MediaToolchain } from '../../infra/media/MediaToolchain.js';
import {
  buildComposeArgs,
  buildConcatList,
  composedDuration,
  evenDimension,
  type ComposeClip,
  type ComposePlan,
} from '../../infra/media/operations.js';
import { logger } from '../../infra/logger.js';
import type { StorageBackend } from '../../infra/storage/StorageBackend.js';
import type { PipelineStage, StageContext } from './PipelineStage.js';
import { COMPOSED_FILE, CONCAT_LIST_FILE, sourceFileName } from './PipelineStage.js';

const DEFAULT_CANVAS = { width: 1920, height: 1080 };

/**
 * Joins intro, source and outro with the requested transition and layers the
 * customer text and watermark on top
 */
export class ComposeStage implements PipelineStage {
  readonly name = 'compose' as const;
  readonly status = 'COMPOSING' as const;
  readonly message = 'Composing video';
  readonly band = [0.25, 0.6] as const;
  readonly errorKind = 'COMPOSE_FAILED' as const;

  constructor(
    private toolchain: MediaToolchain,
    private storage: StorageBackend,
    private options: { transitionDurationSeconds: number }
  ) {}

  async run(context: StageContext): Promise<void> {
    const { parameters } = context.job;
    const sourcePath = join(context.scratchDir, sourceFileName(parameters.videoUrl));

    const introPath = parameters.introClip
      ? await this.fetchAsset(parameters.introClip, context, 'intro', '.mp4')
      : null;
    const outroPath = parameters.outroClip
      ? await this.fetchAsset(parameters.outroClip, context, 'outro', '.mp4')
      : null;
    const watermarkPath = parameters.overlay.watermark
      ? await this.fetchAsset(parameters.overlay.watermark, context, 'watermark', '.png')
      : null;

    const clipPaths = [introPath, sourcePath, outroPath].filter(
      (path): path is string => path !== null
    );

    const clips: ComposeClip[] = [];
    let canvas = DEFAULT_CANVAS;
    for (const path of clipPaths) {
      const probe = await this.toolchain.probe(path, context.signal);
      clips.push({ path, durationSeconds: probe.durationSeconds, hasAudio: probe.hasAudio });
      if (path === sourcePath) {
        canvas = {
          width: evenDimension(probe.width, DEFAULT_CANVAS.width),
          height: evenDimension(probe.height, DEFAULT_CANVAS.height),
        };
      }
    }

    const concatListPath = join(context.scratchDir, CONCAT_LIST_FILE);
    if (parameters.transitionStyle === 'CUT' && clips.length > 1) {
      await writeFile(concatListPath, buildConcatList(clipPaths));
    }

    const plan: ComposePlan = {
      clips,
      transition: parameters.transitionStyle,
      transitionDurationSeconds: this.options.transitionDurationSeconds,
      concatListPath,
      width: canvas.width,
      height: canvas.height,
      customerText: parameters.overlay.customerText ? parameters.customerName : null,
      watermark: watermarkPath
        ? { path: watermarkPath, position: parameters.overlay.watermarkPosition }
        : null,
      outputPath: join(context.scratchDir, COMPOSED_FILE),
    };

    logger.debug('Composing clips', {
      jobId: context.job.id,
      clips: clips.length,
      transition: plan.transition,
      watermark: plan.watermark !== null,
    });

    await this.toolchain.run(buildComposeArgs(plan), {
      signal: context.signal,
      durationSeconds: composedDuration(plan),
      onProgress: (fraction) => context.reportProgress(fraction),
    });
    context.reportProgress(1);
  }

  private async fetchAsset(
    reference: string,
    context: StageContext,
    baseName: string,
    defaultExtension: string
  ): Promise<string> {
    if (!(await this.storage.exists(reference))) {
      throw new PipelineError('COMPOSE_FAILED', `Asset not found: ${reference}`, false, {
        reference,
      });
    }

    const destination = join(context.scratchDir, `${baseName}${extname(reference) || defaultExtension}`);
    const body = await this.storage.read(reference);
    try {
      await pipeline(body, createWriteStream(destination), { signal: context.signal });
    } catch (error) {
      if (context.signal.aborted) throw error;
      throw new StorageError(`Failed to fetch asset ${reference}`, { error });
    }
    return destination;
  }
}
