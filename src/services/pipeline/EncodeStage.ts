import { join } from 'node:path';
import type { MediaToolchain } from '../../infra/media/MediaToolchain.js';
import { buildEncodeArgs } from '../../infra/media/operations.js';
import type { PresetRegistry } from '../../infra/media/PresetRegistry.js';
import { logger } from '../../infra/logger.js';
import type { PipelineStage, StageContext } from './PipelineStage.js';
import { COMPOSED_FILE, ENCODED_FILE } from './PipelineStage.js';

/**
 * Re-encodes the composed video with the job's preset. Preset numbers are read
 * when the stage starts, so a reload applies to every encode that begins after it.
 */
export class EncodeStage implements PipelineStage {
  readonly name = 'encode' as const;
  readonly status = 'ENCODING' as const;
  readonly message = 'Encoding final video';
  readonly band = [0.6, 0.9] as const;
  readonly errorKind = 'ENCODE_FAILED' as const;

  constructor(
    private toolchain: MediaToolchain,
    private presets: PresetRegistry
  ) {}

  async run(context: StageContext): Promise<void> {
    const presetName = context.job.parameters.encodingPreset;
    const preset = this.presets.get(presetName);
    const inputPath = join(context.scratchDir, COMPOSED_FILE);
    const probe = await this.toolchain.probe(inputPath, context.signal);

    logger.debug('Encoding with preset', { jobId: context.job.id, preset: presetName, ...preset });

    await this.toolchain.run(
      buildEncodeArgs({
        inputPath,
        outputPath: join(context.scratchDir, ENCODED_FILE),
        preset,
        hasAudio: probe.hasAudio,
      }),
      {
        signal: context.signal,
        durationSeconds: probe.durationSeconds,
        onProgress: (fraction) => context.reportProgress(fraction),
      }
    );
    context.reportProgress(1);
  }
}
