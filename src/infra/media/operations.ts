/**
 * ffmpeg argument builders for the compose and encode stages
 *
 * Pure functions: every invocation overwrites its output (`-y`) and strips
 * container metadata and encoder tags so identical inputs give identical bytes.
 */

import type { TransitionStyle, WatermarkPosition } from '../../domain/entities/Job.js';
import type { EncodingPreset } from './PresetRegistry.js';

export const DETERMINISTIC_OUTPUT_FLAGS = [
  '-map_metadata',
  '-1',
  '-fflags',
  '+bitexact',
  '-flags:v',
  '+bitexact',
  '-flags:a',
  '+bitexact',
];

export const WATERMARK_OVERLAY_POSITIONS: Record<WatermarkPosition, string> = {
  'top-left': '10:10',
  'top-right': 'main_w-overlay_w-10:10',
  'bottom-left': '10:main_h-overlay_h-10',
  'bottom-right': 'main_w-overlay_w-10:main_h-overlay_h-10',
  center: '(main_w-overlay_w)/2:(main_h-overlay_h)/2',
};

const XFADE_TRANSITIONS: Record<Exclude<TransitionStyle, 'CUT'>, string> = {
  FADE: 'fade',
  SLIDE: 'slideright',
};

const CUSTOMER_TEXT_SECONDS = 5;
const COMPOSE_FRAME_RATE = 30;

export interface ComposeClip {
  path: string;
  durationSeconds: number;
  hasAudio: boolean;
}

export interface ComposePlan {
  clips: ComposeClip[];
  transition: TransitionStyle;
  transitionDurationSeconds: number;
  /** Concat demuxer list, used by CUT */
  concatListPath: string;
  width: number;
  height: number;
  customerText: string | null;
  watermark: { path: string; position: WatermarkPosition } | null;
  outputPath: string;
}

/**
 * Builds the concat demuxer list; single quotes in paths are escaped the way
 * the demuxer expects.
 */
export function buildConcatList(paths: string[]): string {
  return paths.map((path) => `file '${path.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export function escapeDrawtext(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/:/g, '\\:').replace(/%/g, '\\%');
}

export function evenDimension(value: number, fallback: number): number {
  const base = Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
  return base - (base % 2);
}

/**
 * Transition length actually used: never more than half of the shortest clip
 */
export function effectiveTransitionDuration(clips: ComposeClip[], requested: number): number {
  if (clips.length < 2) return 0;
  const shortest = Math.min(...clips.map((clip) => clip.durationSeconds));
  if (!Number.isFinite(shortest) || shortest <= 0) return 0;
  return Math.min(requested, shortest / 2);
}

/**
 * xfade offsets: the k-th transition starts where the accumulated stream ends,
 * minus the overlap
 */
export function xfadeOffsets(clips: ComposeClip[], duration: number): number[] {
  const offsets: number[] = [];
  let accumulated = clips[0]?.durationSeconds ?? 0;
  for (let index = 1; index < clips.length; index += 1) {
    offsets.push(roundSeconds(accumulated - duration));
    accumulated += clips[index].durationSeconds - duration;
  }
  return offsets;
}

export function composedDuration(plan: Pick<ComposePlan, 'clips' | 'transition' | 'transitionDurationSeconds'>): number {
  const total = plan.clips.reduce((sum, clip) => sum + clip.durationSeconds, 0);
  if (plan.transition === 'CUT') return total;
  const overlap = effectiveTransitionDuration(plan.clips, plan.transitionDurationSeconds);
  return Math.max(0, total - overlap * (plan.clips.length - 1));
}

function roundSeconds(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function normalizeFilter(width: number, height: number): string {
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
    `fps=${COMPOSE_FRAME_RATE}`,
    'format=yuv420p',
  ].join(',');
}

function drawtextFilter(text: string): string {
  return [
    `drawtext=text='${escapeDrawtext(text)}'`,
    'fontcolor=white',
    'fontsize=60',
    'x=(w-text_w)/2',
    'y=(h-text_h)/2',
    `enable='between(t,0,${CUSTOMER_TEXT_SECONDS})'`,
  ].join(':');
}

/**
 * Single ffmpeg invocation producing the composed intermediate: clips joined by
 * the transition, then customer text and watermark layered on top.
 */
export function buildComposeArgs(plan: ComposePlan): string[] {
  if (plan.clips.length === 0) {
    throw new Error('Compose plan needs at least one clip');
  }

  const inputs: string[] = [];
  const filters: string[] = [];
  let videoLabel: string;
  let audioLabel: string | null;
  let nextInput: number;

  if (plan.transition === 'CUT' || plan.clips.length === 1) {
    if (plan.transition === 'CUT' && plan.clips.length > 1) {
      inputs.push('-f', 'concat', '-safe', '0', '-i', plan.concatListPath);
    } else {
      inputs.push('-i', plan.clips[0].path);
    }
    filters.push(`[0:v]${normalizeFilter(plan.width, plan.height)}[base]`);
    videoLabel = 'base';
    audioLabel = plan.clips.every((clip) => clip.hasAudio) ? '0:a' : null;
    nextInput = 1;
  } else {
    const duration = effectiveTransitionDuration(plan.clips, plan.transitionDurationSeconds);
    const offsets = xfadeOffsets(plan.clips, duration);
    const xfade = XFADE_TRANSITIONS[plan.transition];
    const withAudio = plan.clips.every((clip) => clip.hasAudio);

    plan.clips.forEach((clip, index) => {
      inputs.push('-i', clip.path);
      filters.push(`[${index}:v]${normalizeFilter(plan.width, plan.height)}[v${index}]`);
    });

    videoLabel = 'v0';
    for (let index = 1; index < plan.clips.length; index += 1) {
      const out = `x${index}`;
      filters.push(
        `[${videoLabel}][v${index}]xfade=transition=${xfade}:duration=${duration}:offset=${offsets[index - 1]}[${out}]`
      );
      videoLabel = out;
    }

    audioLabel = null;
    if (withAudio) {
      audioLabel = '0:a';
      for (let index = 1; index < plan.clips.length; index += 1) {
        const out = `a${index}`;
        filters.push(`[${audioLabel}][${index}:a]acrossfade=d=${duration}[${out}]`);
        audioLabel = out;
      }
    }
    nextInput = plan.clips.length;
  }

  if (plan.customerText) {
    filters.push(`[${videoLabel}]${drawtextFilter(plan.customerText)}[txt]`);
    videoLabel = 'txt';
  }

  if (plan.watermark) {
    inputs.push('-i', plan.watermark.path);
    filters.push(
      `[${videoLabel}][${nextInput}:v]overlay=${WATERMARK_OVERLAY_POSITIONS[plan.watermark.position]}[wm]`
    );
    videoLabel = 'wm';
  }

  const mapAudio = audioLabel
    ? ['-map', audioLabel.includes(':') ? audioLabel : `[${audioLabel}]`, '-c:a', 'aac']
    : ['-an'];

  return [
    '-y',
    ...inputs,
    '-filter_complex',
    filters.join(';'),
    '-map',
    `[${videoLabel}]`,
    ...mapAudio,
    '-c:v',
    'libx264',
    '-preset',
    'veryfast',
    '-crf',
    '18',
    ...DETERMINISTIC_OUTPUT_FLAGS,
    plan.outputPath,
  ];
}

/**
 * Doubles a bitrate string for the rate-control buffer
 */
export function bufferSizeFor(bitrate: string): string {
  const match = /^(\d+)([kKmM]?)$/.exec(bitrate);
  if (!match) return bitrate;
  return `${Number(match[1]) * 2}${match[2]}`;
}

export function buildEncodeArgs(params: {
  inputPath: string;
  outputPath: string;
  preset: EncodingPreset;
  hasAudio: boolean;
}): string[] {
  const { preset } = params;
  const videoFilter = [
    `scale=${preset.width}:${preset.height}:force_original_aspect_ratio=decrease`,
    `pad=${preset.width}:${preset.height}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
    `fps=${preset.frameRate}`,
  ].join(',');

  const audio = params.hasAudio
    ? ['-map', '0:a:0', '-c:a', 'aac', '-b:a', preset.audioBitrate]
    : ['-an'];

  return [
    '-y',
    '-i',
    params.inputPath,
    '-map',
    '0:v:0',
    ...audio,
    '-vf',
    videoFilter,
    '-c:v',
    'libx264',
    '-preset',
    preset.x264Preset,
    '-b:v',
    preset.videoBitrate,
    '-maxrate',
    preset.videoBitrate,
    '-bufsize',
    bufferSizeFor(preset.videoBitrate),
    '-pix_fmt',
    'yuv420p',
    '-movflags',
    '+faststart',
    ...DETERMINISTIC_OUTPUT_FLAGS,
    params.outputPath,
  ];
}
