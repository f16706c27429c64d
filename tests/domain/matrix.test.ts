import {
  ARCHITECTURES,
  TARGET_PLATFORMS,
  cellKey,
  expandMatrix,
  isArchitecture,
  isTargetPlatform,
} from '../../src/domain/matrix';

describe('matrix vocabulary', () => {
  test('architectures and platforms are listed in build order', () => {
    expect(ARCHITECTURES).toEqual(['x86_64', 'x86', 'arm64', 'arm']);
    expect(TARGET_PLATFORMS).toEqual(['linux', 'linux-static', 'windows', 'darwin', 'android']);
  });

  test('type guards accept only known values', () => {
    expect(isArchitecture('arm64')).toBe(true);
    expect(isArchitecture('mips')).toBe(false);
    expect(isTargetPlatform('linux-static')).toBe(true);
    expect(isTargetPlatform('freebsd')).toBe(false);
  });

  test('cellKey joins platform and architecture', () => {
    expect(cellKey({ platform: 'linux-static', arch: 'arm64' })).toBe('linux-static/arm64');
  });
});

describe('expandMatrix', () => {
  test('expands platform-major in selection order', () => {
    const cells = expandMatrix({ architectures: ['arm64', 'x86_64'], platforms: ['android', 'linux'] });
    expect(cells.map(cellKey)).toEqual(['android/arm64', 'android/x86_64', 'linux/arm64', 'linux/x86_64']);
  });

  test('keeps unknown architectures as cells', () => {
    const cells = expandMatrix({ architectures: ['mips'], platforms: ['linux-static'] });
    expect(cells).toEqual([{ platform: 'linux-static', arch: 'mips' }]);
  });

  test('drops repeated pairs', () => {
    const cells = expandMatrix({ architectures: ['arm', 'arm'], platforms: ['linux', 'linux'] });
    expect(cells).toHaveLength(1);
  });

  test('full matrix has twenty cells', () => {
    expect(expandMatrix({ architectures: [...ARCHITECTURES], platforms: [...TARGET_PLATFORMS] })).toHaveLength(20);
  });
});
