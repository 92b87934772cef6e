import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ComposeStage } from '../../../../src/services/pipeline/ComposeStage.js';
import type { StageContext } from '../../../../src/services/pipeline/PipelineStage.js';
import { LocalStorageBackend } from '../../../../src/infra/storage/LocalStorageBackend.js';
import { createJob, type JobParameters } from '../../../../src/domain/entities/Job.js';
import { FakeToolchain, buildParameters, makeTempDir } from '../../../helpers/fakes.js';

async function setup(parameters: Partial<JobParameters>) {
  const storage = new LocalStorageBackend({
    rootDir: makeTempDir('compose-storage'),
    signingSecret: 'test-secret',
  });
  await storage.write('assets/intro.mp4', Buffer.from('intro'));
  await storage.write('assets/outro.mp4', Buffer.from('outro'));

  const scratchDir = makeTempDir('compose');
  writeFileSync(join(scratchDir, 'source.mp4'), 'source');

  const context: StageContext = {
    job: createJob({ id: 'job-compose', parameters: buildParameters(parameters) }),
    scratchDir,
    signal: new AbortController().signal,
    reportProgress: () => undefined,
    setResultLocation: () => undefined,
  };
  const toolchain = new FakeToolchain();
  const stage = new ComposeStage(toolchain, storage, { transitionDurationSeconds: 1 });
  return { context, scratchDir, toolchain, stage };
}

describe('ComposeStage', () => {
  it('should join intro, source and outro through a concat list for CUT', async () => {
    const { context, scratchDir, toolchain, stage } = await setup({
      transitionStyle: 'CUT',
      introClip: 'assets/intro.mp4',
      outroClip: 'assets/outro.mp4',
    });

    await stage.run(context);

    const listPath = join(scratchDir, 'concat.txt');
    expect(readFileSync(listPath, 'utf-8')).toBe(
      [
        `file '${join(scratchDir, 'intro.mp4')}'`,
        `file '${join(scratchDir, 'source.mp4')}'`,
        `file '${join(scratchDir, 'outro.mp4')}'`,
        '',
      ].join('\n')
    );
    expect(readFileSync(join(scratchDir, 'intro.mp4'), 'utf-8')).toBe('intro');
    expect(toolchain.runs).toHaveLength(1);
    expect(toolchain.runs[0].slice(0, 7)).toEqual(['-y', '-f', 'concat', '-safe', '0', '-i', listPath]);
    expect(toolchain.runs[0][toolchain.runs[0].length - 1]).toBe(join(scratchDir, 'composed.mp4'));
  });

  it('should fail with COMPOSE_FAILED when the watermark asset is missing', async () => {
    const { context, toolchain, stage } = await setup({
      overlay: { customerText: true, watermark: 'brand/logo.png', watermarkPosition: 'center' },
    });

    await expect(stage.run(context)).rejects.toMatchObject({
      kind: 'COMPOSE_FAILED',
      retryable: false,
      message: 'Asset not found: brand/logo.png',
    });
    expect(toolchain.runs).toEqual([]);
  });
});
