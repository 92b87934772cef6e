/**
 * Media toolchain contract: probing files and running encoder invocations.
 */

export interface ProbeResult {
  durationSeconds: number;
  formatName: string;
  width: number;
  height: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Expected output duration, used to turn encoder progress into a fraction */
  durationSeconds?: number;
  onProgress?: (fraction: number) => void;
}

export interface MediaToolchain {
  probe(path: string, signal?: AbortSignal): Promise<ProbeResult>;
  run(args: string[], options?: RunOptions): Promise<void>;
}

/**
 * Non-zero exit or spawn failure of a toolchain binary. `stderrTail` is for
 * logs only and never reaches a job record.
 */
export class ToolchainError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string
  ) {
    super(message);
    this.name = 'ToolchainError';
  }
}
