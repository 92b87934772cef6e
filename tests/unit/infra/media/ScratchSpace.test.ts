import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ScratchSpace } from '../../../../src/infra/media/ScratchSpace.js';
import { makeTempDir } from '../../../helpers/fakes.js';

describe('ScratchSpace', () => {
  it('should create and remove a directory per job', async () => {
    const root = makeTempDir('scratch');
    const scratch = new ScratchSpace(root);

    const dir = await scratch.prepare('job-1');
    writeFileSync(join(dir, 'source.mp4'), 'bytes');

    expect(dir).toBe(join(root, 'job-1'));
    expect(await scratch.exists('job-1')).toBe(true);

    await scratch.remove('job-1');

    expect(existsSync(dir)).toBe(false);
    expect(await scratch.exists('job-1')).toBe(false);
  });

  it('should not fail removing a directory that was never created', async () => {
    const scratch = new ScratchSpace(makeTempDir('scratch'));

    await expect(scratch.remove('never-made')).resolves.toBeUndefined();
  });

  it('should reject ids that could leave the root', () => {
    const scratch = new ScratchSpace(makeTempDir('scratch'));

    expect(() => scratch.dirFor('../etc')).toThrow('Invalid job id');
  });
});
