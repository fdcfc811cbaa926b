import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AnnotationStore } from '../src/annotations.js';
import { SCHEMA_DIR, createTempDir, removeDir, writeFixture } from './helpers/campaign-fixture.js';

describe('AnnotationStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await createTempDir();
    path = join(dir, 'annotations.json');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns a saved annotation from a freshly loaded store', async () => {
    const writer = new AnnotationStore(path, SCHEMA_DIR);
    await writer.load();
    await expect(writer.put('12345', { birthPlace: 'Kyiv' })).resolves.toEqual({ ok: true });

    const reader = new AnnotationStore(path, SCHEMA_DIR);
    await expect(reader.load()).resolves.toEqual([]);

    expect(reader.get('12345')?.birthPlace).toBe('Kyiv');
    expect(reader.get('12345')).toEqual({ serialNumber: '12345', birthPlace: 'Kyiv' });
  });

  it('writes a versioned file with pilots in serial order', async () => {
    const store = new AnnotationStore(path, SCHEMA_DIR);
    await store.load();
    await store.put('2', { notes: 'Second' });
    await store.put('1', { birthDate: '1918-03-15' });

    const written: unknown = JSON.parse(await readFile(path, 'utf8'));

    expect(written).toEqual({
      version: 1,
      pilots: {
        '1': { serialNumber: '1', birthDate: '1918-03-15' },
        '2': { serialNumber: '2', notes: 'Second' }
      }
    });
  });

  it('starts empty when the file does not exist', async () => {
    const store = new AnnotationStore(path, SCHEMA_DIR);

    await expect(store.load()).resolves.toEqual([]);
    expect(store.snapshot().size).toBe(0);
  });

  it('resets to empty and reports a corrupt file', async () => {
    await writeFixture(dir, 'annotations.json', '{ not json');
    const store = new AnnotationStore(path, SCHEMA_DIR);

    const diagnostics = await store.load();

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe('annotation-store-corrupt');
    expect(diagnostics[0].path).toBe(path);
    expect(store.snapshot().size).toBe(0);
  });

  it('treats a file of the wrong shape as corrupt', async () => {
    await writeFixture(dir, 'annotations.json', { version: 2, pilots: {} });
    const store = new AnnotationStore(path, SCHEMA_DIR);

    const diagnostics = await store.load();

    expect(diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(['annotation-store-corrupt']);
  });

  it('rejects a birth date it cannot read and an empty serial', async () => {
    const store = new AnnotationStore(path, SCHEMA_DIR);
    await store.load();

    await expect(store.put('1', { birthDate: '31/02/1918' })).resolves.toEqual({
      ok: false,
      error: 'Birth date "31/02/1918" is not DD/MM/YYYY or YYYY-MM-DD'
    });
    await expect(store.put('  ', { notes: 'x' })).resolves.toEqual({ ok: false, error: 'Serial number is required' });
    expect(store.snapshot().size).toBe(0);
  });

  it('keeps every write when puts overlap', async () => {
    const store = new AnnotationStore(path, SCHEMA_DIR);
    await store.load();

    const results = await Promise.all([
      store.put('1', { notes: 'one' }),
      store.put('2', { notes: 'two' }),
      store.put('3', { notes: 'three' })
    ]);

    expect(results).toEqual([{ ok: true }, { ok: true }, { ok: true }]);
    const reader = new AnnotationStore(path, SCHEMA_DIR);
    await reader.load();
    expect([...reader.snapshot().keys()]).toEqual(['1', '2', '3']);
  });

  it('keeps a write that overlaps a reload of a large store', async () => {
    const pilots: Record<string, { serialNumber: string; notes: string }> = {};
    for (let i = 0; i < 3000; i++) pilots[`p${i}`] = { serialNumber: `p${i}`, notes: `entry ${i}` };
    await writeFixture(dir, 'annotations.json', { version: 1, pilots });
    const store = new AnnotationStore(path, SCHEMA_DIR);
    await store.load();

    const [loadDiagnostics, first] = await Promise.all([store.load(), store.put('A', { notes: 'first' })]);
    const second = await store.put('B', { notes: 'second' });
    const [putDuringLoad] = await Promise.all([store.put('C', { notes: 'third' }), store.load()]);

    expect(loadDiagnostics).toEqual([]);
    expect([first, second, putDuringLoad]).toEqual([{ ok: true }, { ok: true }, { ok: true }]);
    const reader = new AnnotationStore(path, SCHEMA_DIR);
    await reader.load();
    expect(reader.snapshot().size).toBe(3003);
    expect(reader.get('A')?.notes).toBe('first');
    expect(reader.get('B')?.notes).toBe('second');
    expect(reader.get('C')?.notes).toBe('third');
    expect(store.get('C')?.notes).toBe('third');
  });

  it('leaves an earlier snapshot untouched by later writes', async () => {
    const store = new AnnotationStore(path, SCHEMA_DIR);
    await store.load();
    await store.put('1', { notes: 'before' });
    const before = store.snapshot();

    await store.put('1', { notes: 'after' });

    expect(before.get('1')?.notes).toBe('before');
    expect(store.get('1')?.notes).toBe('after');
  });
});
