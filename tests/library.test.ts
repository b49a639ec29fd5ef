import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { NativeError, UnsupportedError } from '../src/exceptions.js';
import {
  LIBRARY_PATH_ENV,
  detectPlatform,
  libraryFileName,
  loadLibrary,
  resolveLibraryPath,
} from '../src/ffi/library.js';

describe('detectPlatform', () => {
  it.each<[string, string, string]>([
    ['linux', 'x64', 'linux-x64'],
    ['linux', 'arm64', 'linux-arm64'],
    ['darwin', 'arm64', 'darwin-arm64'],
    ['win32', 'x64', 'win32-x64'],
  ])('should map %s/%s to %s', (platform, arch, expected) => {
    expect(detectPlatform(platform, arch)).toBe(expected);
  });

  it('should reject platforms without a build', () => {
    expect(() => detectPlatform('freebsd', 'x64')).toThrow(UnsupportedError);
    expect(() => detectPlatform('freebsd', 'x64')).toThrow(
      'Unsupported operation: loadLibrary (no native build for freebsd-x64)'
    );
  });
});

describe('libraryFileName', () => {
  it('should follow each platform naming convention', () => {
    expect(libraryFileName('linux-x64')).toBe('libsignal_ffi.so');
    expect(libraryFileName('darwin-arm64')).toBe('libsignal_ffi.dylib');
    expect(libraryFileName('win32-x64')).toBe('signal_ffi.dll');
  });
});

describe('resolveLibraryPath', () => {
  it('should prefer an explicit path', () => {
    expect(
      resolveLibraryPath({ path: '/opt/signal/libsignal_ffi.so', env: { [LIBRARY_PATH_ENV]: '/env/lib.so' } })
    ).toBe('/opt/signal/libsignal_ffi.so');
  });

  it('should fall back to the environment', () => {
    expect(resolveLibraryPath({ env: { [LIBRARY_PATH_ENV]: '/env/lib.so' } })).toBe('/env/lib.so');
  });

  it('should default to the bundled build', () => {
    const platform = detectPlatform();
    const resolved = resolveLibraryPath({ env: {} });

    expect(resolved.endsWith(path.join('native', platform, libraryFileName(platform)))).toBe(true);
  });
});

describe('loadLibrary', () => {
  it('should report a missing library as a NativeError', () => {
    const missing = path.join('/nonexistent', 'libsignal_ffi.so');

    expect(() => loadLibrary({ path: missing })).toThrow(NativeError);
    expect(() => loadLibrary({ path: missing })).toThrow(`Error in load (code: 1): ${missing}`);
  });
});
