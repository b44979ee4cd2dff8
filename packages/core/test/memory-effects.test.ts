import { describe, it, expect } from 'vitest';

import { MemoryWorkspaceEffects } from '../src/memory-effects.js';

describe('MemoryWorkspaceEffects', () => {
  it('should create parent directories for files', () => {
    const effects = new MemoryWorkspaceEffects().addFile('/ws/a/b.txt', 3);

    expect(effects.isDirectory('/ws')).toBe(true);
    expect(effects.isDirectory('/ws/a')).toBe(true);
    expect(effects.isFile('/ws/a/b.txt')).toBe(true);
    expect(effects.listFiles('/ws/a')).toEqual([{ name: 'b.txt', sizeBytes: 3 }]);
  });

  it('should remove whole subtrees but not name-prefixed siblings', () => {
    const effects = new MemoryWorkspaceEffects()
      .addFile('/ws/build/x.txt')
      .addFile('/ws/build-tools/y.txt');

    effects.removeTree('/ws/build');

    expect(effects.listTree('/ws')).toEqual(['/ws/build-tools', '/ws/build-tools/y.txt']);
    expect(effects.removals).toEqual(['/ws/build']);
  });

  it('should list only direct files', () => {
    const effects = new MemoryWorkspaceEffects()
      .addFile('/out/a.whl', 1)
      .addFile('/out/sub/b.whl', 2)
      .addDirectory('/out/empty');

    expect(effects.listFiles('/out')).toEqual([{ name: 'a.whl', sizeBytes: 1 }]);
  });

  it('should list direct entries of both kinds', () => {
    const effects = new MemoryWorkspaceEffects()
      .addFile('/out/a.whl', 1)
      .addFile('/out/sub/b.whl', 2);

    expect(effects.listEntries('/out').sort()).toEqual(['a.whl', 'sub']);
    expect(effects.listEntries('/missing')).toEqual([]);
  });

  it('should simulate failures', () => {
    const effects = new MemoryWorkspaceEffects().addDirectory('/ws/build');
    effects.failRemovalFor.add('/ws/build');
    effects.failEnsureFor.add('/ws/dist');

    expect(() => effects.removeTree('/ws/build')).toThrow('EACCES');
    expect(() => effects.ensureDirectory('/ws/dist')).toThrow('EROFS');
    expect(() => effects.listFiles('/nope')).toThrow('ENOENT');
    expect(effects.isDirectory('/ws/build')).toBe(true);
  });
});
