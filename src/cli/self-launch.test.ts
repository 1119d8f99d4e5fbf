import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';

import { resolveSelfLaunch } from './self-launch.js';
import { makeTempDir, removeTempDir, touch } from '../test-support/fakes.js';

describe('resolveSelfLaunch', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('runs node with the entry script', () => {
    const script = join(root, 'dist', 'cli', 'index.js');
    touch(script);

    expect(resolveSelfLaunch(['/usr/bin/node', script], '/usr/bin/node')).toEqual({
      command: '/usr/bin/node',
      args: [script]
    });
  });

  it('runs the executable alone when the entry script is missing', () => {
    expect(resolveSelfLaunch(['/opt/applaunch', join(root, 'gone.js')], '/opt/applaunch')).toEqual({
      command: '/opt/applaunch',
      args: []
    });
    expect(resolveSelfLaunch(['/opt/applaunch'], '/opt/applaunch')).toEqual({ command: '/opt/applaunch', args: [] });
  });

  it('does not repeat a packaged executable as its own argument', () => {
    const executable = join(root, 'applaunch');
    touch(executable);

    expect(resolveSelfLaunch([executable, executable], executable)).toEqual({ command: executable, args: [] });
  });
});
