import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findDescriptorFiles, findProjectDescriptorFile, loadManualStanzas, parseDependencyDescriptor } from '../src/manual';
import { makeTempDir, removeDir, writeFiles } from './helpers';

describe('parseDependencyDescriptor', () => {
  it('builds a manual stanza', () => {
    const outcome = parseDependencyDescriptor('name = libfoo\nyear = 2020\nauthor = Jane Doe\nlicense = MIT\n', 'libfoo.copyright_meta');
    expect(outcome).toEqual({
      ok: true,
      stanza: {
        name: 'libfoo',
        license: 'MIT',
        copyrightLine: 'Copyright: 2020 Jane Doe',
        origin: 'manual',
        source: 'libfoo.copyright_meta'
      }
    });
  });

  it('leaves out the copyright line when nothing is given', () => {
    const outcome = parseDependencyDescriptor('name = bare\nlicense = ISC\n', 'bare.copyright_meta');
    expect(outcome.ok && outcome.stanza.copyrightLine).toBeUndefined();
    expect(outcome.ok && 'copyrightLine' in outcome.stanza).toBe(false);
  });

  it('reports every missing required field', () => {
    expect(parseDependencyDescriptor('author = Nobody\n', 'x.copyright_meta')).toEqual({
      ok: false,
      failures: [
        { kind: 'MissingRequiredField', file: 'x.copyright_meta', field: 'name' },
        { kind: 'MissingRequiredField', file: 'x.copyright_meta', field: 'license' }
      ]
    });
  });

  it('indents continued author lines', () => {
    const outcome = parseDependencyDescriptor(
      'name = x\nyear = 2020\nauthor = Jane Doe\n  and John Roe\nlicense = MIT\n  with exception\n',
      'x.copyright_meta'
    );
    expect(outcome.ok && outcome.stanza.copyrightLine).toBe('Copyright: 2020 Jane Doe\n and John Roe');
    expect(outcome.ok && outcome.stanza.license).toBe('MIT\nwith exception');
  });

  it('reports syntax errors as unreadable', () => {
    expect(parseDependencyDescriptor('garbage', 'g.copyright_meta')).toEqual({
      ok: false,
      failures: [
        { kind: 'UnreadableDescriptor', file: 'g.copyright_meta', message: "line 1: expected 'key = value', got 'garbage'" }
      ]
    });
  });
});

describe('loadManualStanzas', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('loads flat and per-folder descriptors, skipping broken ones', async () => {
    await writeFiles(dir, {
      'libfoo.copyright_meta': 'name = libfoo\nyear = 2020\nauthor = Jane Doe\nlicense = MIT\n',
      'libbar.copyright_meta': 'name = libbar\ncopyright = Copyright 2019 ACME Corp\nlicense = Apache-2.0\n',
      'broken.copyright_meta': 'name = broken\nauthor = Nobody\n',
      'zlib/.copyright_meta': 'name = zlib\nauthor_year = 1995-2024 Jean-loup Gailly and Mark Adler\nlicense = Zlib\n',
      'zlib/LICENSE': 'zlib license text',
      'empty/README': 'nothing here',
      'notes.txt': 'not a descriptor'
    });

    const result = await loadManualStanzas(dir);

    expect(result.stanzas.map((s) => s.name)).toEqual(['zlib', 'libfoo', 'libbar']);
    expect(result.stanzas[0]).toEqual({
      name: 'zlib',
      license: 'Zlib',
      copyrightLine: 'Copyright: 1995-2024 Jean-loup Gailly and Mark Adler',
      origin: 'manual',
      source: path.join(dir, 'zlib', '.copyright_meta')
    });
    expect(result.stanzas[2].copyrightLine).toBe('Copyright: Copyright 2019 ACME Corp');
    expect(result.failures).toEqual([
      { kind: 'MissingRequiredField', file: path.join(dir, 'broken.copyright_meta'), field: 'license' }
    ]);
  });

  it('keeps the first descriptor of a duplicated name', async () => {
    await writeFiles(dir, {
      'a.copyright_meta': 'name = dup\nlicense = MIT\n',
      'b.copyright_meta': 'name = dup\nlicense = BSD-2-Clause\n'
    });

    const result = await loadManualStanzas(dir);

    expect(result.stanzas).toHaveLength(1);
    expect(result.stanzas[0].license).toBe('BSD-2-Clause');
    expect(result.failures).toEqual([]);
  });

  it('returns nothing for a missing folder', async () => {
    expect(await loadManualStanzas(path.join(dir, 'missing'))).toEqual({ stanzas: [], failures: [] });
  });

  it('adds the project descriptor after the third-party ones', async () => {
    await writeFiles(dir, {
      '.copyright_meta': 'name = widget\nlicense = Unlicense\n',
      LICENSE: 'license text',
      'thirdparty/libfoo.copyright_meta': 'name = libfoo\nlicense = MIT\n'
    });

    const result = await loadManualStanzas(path.join(dir, 'thirdparty'), dir);

    expect(result.stanzas.map((s) => s.name)).toEqual(['libfoo', 'widget']);
    expect(result.stanzas[1].source).toBe(path.join(dir, '.copyright_meta'));
  });

  it('reads the project descriptor even without a third-party folder', async () => {
    await writeFiles(dir, { '.copyright_meta': 'name = widget\n' });

    const result = await loadManualStanzas(path.join(dir, 'thirdparty'), dir);

    expect(result.stanzas).toEqual([]);
    expect(result.failures).toEqual([
      { kind: 'MissingRequiredField', file: path.join(dir, '.copyright_meta'), field: 'license' }
    ]);
  });

  it('does not read the project descriptor twice when the folder is the project root', async () => {
    await writeFiles(dir, { '.copyright_meta': 'name = widget\nlicense = MIT\n' });

    const result = await loadManualStanzas(dir, dir);

    expect(result.stanzas.map((s) => s.name)).toEqual(['widget']);
  });

  it('finds no project descriptor when there is none', async () => {
    expect(await findProjectDescriptorFile(dir)).toBeUndefined();
  });

  it('lists descriptor files only', async () => {
    await writeFiles(dir, {
      'one.copyright_meta': 'name = one\nlicense = MIT\n',
      'two/.copyright_meta': 'name = two\nlicense = MIT\n',
      'three/LICENSE': 'text'
    });
    expect(await findDescriptorFiles(dir)).toEqual([
      path.join(dir, 'two', '.copyright_meta'),
      path.join(dir, 'one.copyright_meta')
    ]);
  });
});
