import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EncodingPresetName } from '../../domain/entities/Job.js';
import { ENCODING_PRESETS } from '../../domain/entities/Job.js';
import { ConfigError, PipelineError } from '../../domain/errors.js';
import { logger } from '../logger.js';

const bitrate = z.string().regex(/^\d+[kKmM]?$/, { message: 'must look like 5000k' });

const presetSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  videoBitrate: bitrate,
  audioBitrate: bitrate,
  frameRate: z.number().positive(),
  x264Preset: z.enum([
    'ultrafast',
    'superfast',
    'veryfast',
    'faster',
    'fast',
    'medium',
    'slow',
    'slower',
    'veryslow',
  ]),
});

const presetFileSchema = z.record(z.enum(ENCODING_PRESETS), presetSchema);

export type EncodingPreset = z.infer<typeof presetSchema>;
export type PresetDefinitions = Partial<Record<EncodingPresetName, EncodingPreset>>;

export function parsePresetFile(raw: string): PresetDefinitions {
  return presetFileSchema.parse(JSON.parse(raw));
}

/**
 * Encoding presets loaded from a JSON file. Names are a closed set; the
 * numbers behind them can change between reloads.
 */
export class PresetRegistry {
  private presets: PresetDefinitions;

  constructor(private filePath: string) {
    try {
      this.presets = parsePresetFile(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to load encoding presets from ${filePath}`, { error });
    }
    logger.info('Encoding presets loaded', { file: filePath, presets: Object.keys(this.presets) });
  }

  /**
   * Re-reads the file. On failure the previous definitions stay in effect.
   */
  reload(): boolean {
    try {
      this.presets = parsePresetFile(readFileSync(this.filePath, 'utf-8'));
      logger.info('Encoding presets reloaded', {
        file: this.filePath,
        presets: Object.keys(this.presets),
      });
      return true;
    } catch (error) {
      logger.error('Preset reload failed, keeping previous definitions', {
        file: this.filePath,
        error,
      });
      return false;
    }
  }

  get(name: EncodingPresetName): EncodingPreset {
    const preset = this.presets[name];
    if (!preset) {
      throw new PipelineError('ENCODE_FAILED', `Unsupported encoding preset: ${name}`, false, {
        preset: name,
      });
    }
    return preset;
  }

  names(): EncodingPresetName[] {
    return ENCODING_PRESETS.filter((name) => this.presets[name] !== undefined);
  }
}
