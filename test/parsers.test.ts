import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import { extractControl, validateControl } from '../src/parsers/deb';
import { parseArHeaders, extractArMember, findArEntry } from '../src/parsers/ar';
import { parseTar, findTarEntry } from '../src/parsers/tar';
import { parseControl, renderStanza, getField, omitFields } from '../src/parsers/control';
import { ParseError } from '../src/errors';
import {
  createArArchive,
  createTarArchive,
  createTarHeader,
  createDebPackage,
  createControl,
  concat,
  readFixture,
  text,
} from './helpers';

// ============================================================================
// parseArHeaders Tests
// ============================================================================

describe('parseArHeaders', () => {
  it('parses valid AR archive', () => {
    const archive = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name: 'control.tar.gz', content: text('abc') },
    ]);

    const entries = parseArHeaders(archive);

    expect(entries.map(e => e.name)).toEqual(['debian-binary', 'control.tar.gz']);
    expect(entries[0].size).toBe(4);
    expect(entries[0].offset).toBe(68);
    expect(entries[1].size).toBe(3);
    expect(entries[1].offset).toBe(8 + 60 + 4 + 60);
  });

  it('skips padding after odd-sized members', () => {
    const archive = createArArchive([
      { name: 'a', content: text('x') },
      { name: 'b', content: text('yz') },
    ]);

    const entries = parseArHeaders(archive);

    expect(entries[1].offset).toBe(8 + 60 + 1 + 1 + 60);
    expect(new TextDecoder().decode(extractArMember(archive, entries[1]))).toBe('yz');
  });

  it('reads BSD long names stored in the member data', () => {
    const name = 'control.tar.gz';
    const payload = text('data');
    const header =
      `#1/${name.length}`.padEnd(16, ' ') +
      '0'.padEnd(12, ' ') +
      '0'.padEnd(6, ' ') +
      '0'.padEnd(6, ' ') +
      '100644'.padEnd(8, ' ') +
      String(name.length + payload.length).padEnd(10, ' ') +
      '`\n';
    const archive = concat([text('!<arch>\n'), text(header), text(name), payload]);

    const [entry] = parseArHeaders(archive);

    expect(entry.name).toBe('control.tar.gz');
    expect(entry.size).toBe(4);
    expect(new TextDecoder().decode(extractArMember(archive, entry))).toBe('data');
  });

  it('throws ParseError on invalid magic', () => {
    expect(() => parseArHeaders(text('not an ar archive'))).toThrow(ParseError);
    expect(() => parseArHeaders(text('not an ar archive'))).toThrow('bad magic');
  });

  it('throws ParseError on a file shorter than the magic', () => {
    expect(() => parseArHeaders(text('!<a'))).toThrow('file too short');
  });

  it('throws ParseError on a truncated member', () => {
    const archive = createArArchive([{ name: 'control.tar.gz', content: new Uint8Array(100) }]);

    expect(() => parseArHeaders(archive.subarray(0, archive.length - 10))).toThrow('extends beyond end of file');
  });

  it('throws ParseError on a truncated header', () => {
    const archive = createArArchive([{ name: 'a', content: text('xy') }]);

    expect(() => parseArHeaders(concat([archive, text('partial')]))).toThrow('truncated member header');
  });

  it('throws ParseError on bad member magic', () => {
    const archive = createArArchive([{ name: 'a', content: text('xy') }]);
    archive[8 + 58] = 0x41;

    expect(() => parseArHeaders(archive)).toThrow('bad member header magic');
  });

  it('handles empty archive (just magic)', () => {
    expect(parseArHeaders(text('!<arch>\n'))).toEqual([]);
  });
});

describe('findArEntry', () => {
  const entries = parseArHeaders(
    createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name: 'control.tar.xz', content: text('x') },
    ])
  );

  it('finds by exact name', () => {
    expect(findArEntry(entries, 'debian-binary')?.name).toBe('debian-binary');
  });

  it('finds by pattern', () => {
    expect(findArEntry(entries, /^control\.tar/)?.name).toBe('control.tar.xz');
  });

  it('returns undefined when nothing matches', () => {
    expect(findArEntry(entries, 'data.tar.gz')).toBeUndefined();
  });
});

// ============================================================================
// parseTar Tests
// ============================================================================

describe('parseTar', () => {
  it('parses regular files and strips leading ./', () => {
    const archive = createTarArchive([
      { name: './control', content: text('Package: test') },
      { name: './md5sums', content: text('abc') },
    ]);

    const entries = parseTar(archive);

    expect(entries.map(e => e.name)).toEqual(['control', 'md5sums']);
    expect(new TextDecoder().decode(entries[0].data)).toBe('Package: test');
    expect(entries[0].size).toBe(13);
  });

  it('skips directories', () => {
    const archive = createTarArchive([
      { name: './', content: new Uint8Array(0), type: '5' },
      { name: './control', content: text('x') },
    ]);

    expect(parseTar(archive).map(e => e.name)).toEqual(['control']);
  });

  it('applies GNU long names to the following entry', () => {
    const longName = `./${'d'.repeat(120)}/control`;
    const archive = createTarArchive([
      { name: '././@LongLink', content: text(`${longName}\0`), type: 'L' },
      { name: 'truncated', content: text('x') },
    ]);

    expect(parseTar(archive).map(e => e.name)).toEqual([`${'d'.repeat(120)}/control`]);
  });

  it('handles files spanning multiple blocks', () => {
    const content = new Uint8Array(1500).fill(0x61);
    const archive = createTarArchive([
      { name: 'big', content },
      { name: 'after', content: text('z') },
    ]);

    const entries = parseTar(archive);

    expect(entries[0].data).toEqual(content);
    expect(entries[1].name).toBe('after');
  });

  it('throws ParseError on checksum mismatch', () => {
    const archive = createTarArchive([{ name: 'control', content: text('x') }]);
    archive[0] = 0x58;

    expect(() => parseTar(archive)).toThrow('checksum mismatch');
  });

  it('throws ParseError when an entry extends beyond the archive', () => {
    const header = createTarHeader('control', 2048);

    expect(() => parseTar(concat([header, new Uint8Array(512)]))).toThrow('extends beyond end of archive');
  });

  it('returns nothing for an empty archive', () => {
    expect(parseTar(new Uint8Array(1024))).toEqual([]);
  });
});

describe('findTarEntry', () => {
  const entries = parseTar(
    createTarArchive([
      { name: './sub/control', content: text('a') },
      { name: './postinst', content: text('b') },
    ])
  );

  it('matches by base name', () => {
    expect(findTarEntry(entries, 'control')?.name).toBe('sub/control');
  });

  it('matches by pattern against the full name', () => {
    expect(findTarEntry(entries, /^control$/)).toBeUndefined();
    expect(findTarEntry(entries, /^postinst$/)?.name).toBe('postinst');
  });
});

// ============================================================================
// parseControl Tests
// ============================================================================

describe('parseControl', () => {
  it('parses a simple control file', () => {
    const content = `Package: hello-world
Version: 1.0.0
Architecture: amd64
Maintainer: Test User <test@example.com>
Installed-Size: 1234
Depends: libc6 (>= 2.17)
Description: A test package
 This is a longer description
 that spans multiple lines.`;

    const stanza = parseControl(content);

    expect(stanza.map(f => f.name)).toEqual([
      'Package',
      'Version',
      'Architecture',
      'Maintainer',
      'Installed-Size',
      'Depends',
      'Description',
    ]);
    expect(getField(stanza, 'Depends')).toBe('libc6 (>= 2.17)');
    expect(getField(stanza, 'Description')).toBe(
      'A test package\n This is a longer description\n that spans multiple lines.'
    );
  });

  it('keeps continuation whitespace and paragraph separators', () => {
    const stanza = parseControl('Description: summary\n  indented\n .\n\tTabbed   \n');

    expect(getField(stanza, 'Description')).toBe('summary\n  indented\n .\n\tTabbed');
  });

  it('keeps fields whose first line is empty', () => {
    const stanza = parseControl('Conffiles:\n /etc/a 0123\n /etc/b 4567\n');

    expect(stanza).toEqual([{ name: 'Conffiles', value: '\n /etc/a 0123\n /etc/b 4567' }]);
  });

  it('trims the first-line value', () => {
    expect(parseControl('Package:    spaced   \n')).toEqual([{ name: 'Package', value: 'spaced' }]);
  });

  it('handles CRLF line endings and a byte order mark', () => {
    const stanza = parseControl('\uFEFFPackage: a\r\nVersion: 1\r\n');

    expect(stanza).toEqual([
      { name: 'Package', value: 'a' },
      { name: 'Version', value: '1' },
    ]);
  });

  it('skips comment lines', () => {
    const stanza = parseControl('# generated\nPackage: a\n# note\nVersion: 1\n');

    expect(stanza.map(f => f.name)).toEqual(['Package', 'Version']);
  });

  it('allows leading and trailing blank lines', () => {
    expect(parseControl('\n\nPackage: a\n\n\n')).toEqual([{ name: 'Package', value: 'a' }]);
  });

  it('rejects a second stanza', () => {
    expect(() => parseControl('Package: a\n\nPackage: b\n')).toThrow('more than one stanza');
  });

  it('rejects duplicate fields regardless of case', () => {
    expect(() => parseControl('Package: a\npackage: b\n')).toThrow('duplicate field "package" (line 2)');
  });

  it('rejects a continuation line before any field', () => {
    expect(() => parseControl(' orphan\nPackage: a\n')).toThrow('continuation line without a field (line 1)');
  });

  it('rejects lines without a colon', () => {
    expect(() => parseControl('Package: a\nnot a field\n')).toThrow('expected "Field: value" (line 2)');
  });

  it('rejects invalid field names', () => {
    expect(() => parseControl('Bad Name: x\n')).toThrow(ParseError);
    expect(() => parseControl('-Dash: x\n')).toThrow('invalid field name "-Dash"');
  });

  it('rejects an empty file', () => {
    expect(() => parseControl('')).toThrow('control file has no fields');
    expect(() => parseControl('# only a comment\n')).toThrow('control file has no fields');
  });
});

describe('renderStanza', () => {
  it('round-trips field order and values', () => {
    const content = [
      'Package: hello',
      'Version: 2:1.0-1',
      'Architecture: arm64',
      'Conffiles:',
      ' /etc/hello.conf 0123',
      'Description: greeting',
      '  verbatim block',
      ' .',
      ' second paragraph',
    ].join('\n');

    const stanza = parseControl(content);
    const rendered = renderStanza(stanza);

    expect(rendered).toBe(content);
    expect(parseControl(rendered)).toEqual(stanza);
  });
});

describe('getField / omitFields', () => {
  const stanza = parseControl('Package: a\nSHA256: deadbeef\nmd5sum: 00\nVersion: 1\n');

  it('looks fields up case-insensitively', () => {
    expect(getField(stanza, 'package')).toBe('a');
    expect(getField(stanza, 'MD5sum')).toBe('00');
    expect(getField(stanza, 'Missing')).toBeUndefined();
  });

  it('removes fields case-insensitively and keeps order', () => {
    expect(omitFields(stanza, ['MD5sum', 'sha256']).map(f => f.name)).toEqual(['Package', 'Version']);
  });
});

// ============================================================================
// extractControl Tests
// ============================================================================

describe('extractControl', () => {
  it('extracts the control stanza from a .deb with control.tar.gz', async () => {
    const control = createControl({ Depends: 'libc6' });

    const { stanza, controlText } = await extractControl(createDebPackage(control));

    expect(controlText).toBe(control);
    expect(stanza.map(f => f.name)).toEqual(['Package', 'Version', 'Architecture', 'Maintainer', 'Description', 'Depends']);
    expect(getField(stanza, 'Description')).toBe('A tool\n for testing');
  });

  it('extracts from an uncompressed control.tar', async () => {
    const { stanza } = await extractControl(createDebPackage(createControl(), { compression: 'none' }));

    expect(getField(stanza, 'Package')).toBe('mytool');
  });

  it('extracts from an xz-compressed control.tar.xz', async () => {
    const { stanza, controlText } = await extractControl(createDebPackage(createControl(), { compression: 'xz' }));

    expect(controlText).toBe(createControl());
    expect(stanza.map(f => f.name)).toEqual(['Package', 'Version', 'Architecture', 'Maintainer', 'Description']);
    expect(getField(stanza, 'Description')).toBe('A tool\n for testing');
  });

  it('extracts from a zstd-compressed control.tar.zst', async () => {
    const { stanza, controlText } = await extractControl(createDebPackage(createControl(), { compression: 'zst' }));

    expect(controlText).toBe(createControl());
    expect(stanza.map(f => f.name)).toEqual(['Package', 'Version', 'Architecture', 'Maintainer', 'Description']);
  });

  it.each(['control.tar.xz', 'control.tar.zst'])('rejects a corrupted %s', async name => {
    const member = readFixture(name);
    member[0] = 0x00;
    const deb = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name, content: member },
    ]);

    const error = await extractControl(deb).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(String(error)).toContain(name);
  });

  it('accepts a control file stored without a leading ./', async () => {
    const { stanza } = await extractControl(createDebPackage(createControl(), { controlName: 'control' }));

    expect(getField(stanza, 'Version')).toBe('1.0.0');
  });

  it('normalizes CRLF control text', async () => {
    const { controlText } = await extractControl(
      createDebPackage('Package: a1\r\nVersion: 1\r\nArchitecture: all\r\nDescription: d\r\n')
    );

    expect(controlText).toBe('Package: a1\nVersion: 1\nArchitecture: all\nDescription: d\n');
  });

  it('does not inspect the data member', async () => {
    const deb = createDebPackage(createControl(), { data: text('definitely not a tarball') });

    await expect(extractControl(deb)).resolves.toMatchObject({ controlText: createControl() });
  });

  it('rejects an archive without a control member', async () => {
    const deb = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name: 'data.tar.gz', content: text('x') },
    ]);

    await expect(extractControl(deb)).rejects.toThrow('no control archive found');
  });

  it('rejects a control tarball without a control file', async () => {
    const deb = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name: 'control.tar.gz', content: new Uint8Array(gzipSync(createTarArchive([{ name: './postinst', content: text('x') }]))) },
    ]);

    await expect(extractControl(deb)).rejects.toThrow('no control file found in control.tar.gz');
  });

  it('rejects a control member that does not decompress', async () => {
    const deb = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      { name: 'control.tar.gz', content: text('not gzip at all') },
    ]);

    const error = await extractControl(deb).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(String(error)).toContain('could not decompress control.tar.gz');
  });

  it('rejects control text that is not UTF-8', async () => {
    const deb = createArArchive([
      { name: 'debian-binary', content: text('2.0\n') },
      {
        name: 'control.tar',
        content: createTarArchive([{ name: './control', content: new Uint8Array([0x50, 0x3a, 0xff, 0xfe]) }]),
      },
    ]);

    await expect(extractControl(deb)).rejects.toThrow('control file is not valid UTF-8');
  });

  it('lists every missing required field', async () => {
    const deb = createDebPackage('Package: a1\nMaintainer: x\n');

    await expect(extractControl(deb)).rejects.toThrow('missing required fields: Version, Architecture, Description');
  });

  it('rejects garbage input', async () => {
    await expect(extractControl(text('garbage'))).rejects.toBeInstanceOf(ParseError);
  });
});

describe('validateControl', () => {
  it('accepts a minimal stanza', () => {
    expect(() => validateControl(parseControl(createControl()))).not.toThrow();
  });

  it('rejects multi-line identity fields', () => {
    const stanza = parseControl('Package: a1\nVersion: 1\n 2\nArchitecture: amd64\nDescription: d\n');

    expect(() => validateControl(stanza)).toThrow('field Version must be a single line');
  });

  it('rejects package names that are not Debian package names', () => {
    const stanza = parseControl(createControl({ Package: '../etc' }));

    expect(() => validateControl(stanza)).toThrow('invalid package name "../etc"');
  });

  it('rejects architectures that are not a path segment', () => {
    const stanza = parseControl(createControl({ Architecture: 'amd64/../x' }));

    expect(() => validateControl(stanza)).toThrow('invalid architecture "amd64/../x"');
  });
});
