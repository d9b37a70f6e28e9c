import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';
import { toDisplayPath } from '../../../../src/cli/utils/display-path.ts';

describe('toDisplayPath', () => {
  const baseDir = path.resolve('/work/project');

  it('should show paths under the base directory relative to it', () => {
    assert.strictEqual(
      toDisplayPath(path.join(baseDir, '.balancer', 'config.json'), baseDir),
      path.join('.balancer', 'config.json'),
    );
    assert.strictEqual(toDisplayPath('reports/run.md', baseDir), path.join('reports', 'run.md'));
  });

  it('should show the base directory itself as a dot', () => {
    assert.strictEqual(toDisplayPath(baseDir, baseDir), '.');
  });

  it('should keep absolute paths outside the base directory', () => {
    assert.strictEqual(toDisplayPath('/tmp/report.md', baseDir), path.resolve('/tmp/report.md'));
  });
});
