import { formatManifest, manifestFileName, parseManifest } from '../../src/domain/checksum';

describe('checksum manifest format', () => {
  test('manifest is named after the algorithm', () => {
    expect(manifestFileName('md5')).toBe('md5.txt');
    expect(manifestFileName('sha256')).toBe('sha256.txt');
  });

  test('one line per entry, two spaces between hash and path', () => {
    const text = formatManifest([
      { file: 'a.tar.gz', hash: 'aaa' },
      { file: 'sub/b.zip', hash: 'bbb' },
    ]);
    expect(text).toBe('aaa  a.tar.gz\nbbb  sub/b.zip\n');
  });

  test('empty manifest is empty text', () => {
    expect(formatManifest([])).toBe('');
  });

  test('parse reads back entries and ignores blank lines', () => {
    expect(parseManifest('aaa  a.tar.gz\n\nbbb  name with  spaces\n')).toEqual([
      { hash: 'aaa', file: 'a.tar.gz' },
      { hash: 'bbb', file: 'name with  spaces' },
    ]);
  });
});
