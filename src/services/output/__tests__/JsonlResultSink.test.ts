import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonlResultSink, formatRecordLine } from '../JsonlResultSink.js';
import { createAssertionRecord } from '../../../domain/package.js';

describe('formatRecordLine', () => {
  it('writes an empty record', () => {
    expect(formatRecordLine(createAssertionRecord('pkg', []))).toBe('{"pkg": []}\n');
  });

  it('escapes assertion text and separates entries', () => {
    const record = createAssertionRecord('pkgA', ['assert x > 0', 'assert s == "q"']);
    expect(formatRecordLine(record)).toBe('{"pkgA": ["assert x > 0", "assert s == \\"q\\""]}\n');
  });
});

describe('JsonlResultSink', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'assert-miner-sink-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('truncates an existing file on open', async () => {
    const path = join(root, 'results.json');
    await writeFile(path, '{"stale": []}\n');

    const sink = await JsonlResultSink.open(path);
    await sink.close();

    expect(await readFile(path, 'utf-8')).toBe('');
  });

  it('writes one whole line per record under concurrent appends', async () => {
    const path = join(root, 'results.json');
    const sink = await JsonlResultSink.open(path);

    const names = Array.from({ length: 50 }, (_, i) => `pkg${i}`);
    await Promise.all(names.map(name => sink.append(createAssertionRecord(name, [`assert ${name}`]))));
    await sink.close();

    const lines = (await readFile(path, 'utf-8')).split('\n').filter(line => line.length > 0);
    expect(lines).toHaveLength(50);
    const parsed: Record<string, string[]>[] = lines.map(line => JSON.parse(line));
    expect(new Set(parsed.flatMap(entry => Object.keys(entry)))).toEqual(new Set(names));
    expect(parsed.find(entry => 'pkg7' in entry)).toEqual({ pkg7: ['assert pkg7'] });
  });

  it('rejects appends after close', async () => {
    const sink = await JsonlResultSink.open(join(root, 'results.json'));
    await sink.close();
    await expect(sink.append(createAssertionRecord('late', []))).rejects.toThrow('already closed');
  });
});
