/* packages/pipeline/test/convert.spec.ts */
import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { BaseLogger } from 'pino';
import pino from 'pino';
import { FeatureError } from '@featflat/core';
import { convertFile, deriveOutputPath } from '../src';
import { directories, loadSampleRecord, makeTempDir, writeLines } from '../../../tests/helpers';

function recordLine(label: number, entropies: number[]): string {
  return JSON.stringify({
    md5: `md5-${label}`,
    label,
    section: { entry: '.text', sections: entropies.map((entropy) => ({ entropy, size: 10, vsize: 20 })) },
    datadirectories: directories(15)
  });
}

// pino writes JSON lines; keep them in memory
function memoryLogger(): { logger: BaseLogger; messages: () => string[] } {
  const chunks: string[] = [];
  const logger = pino({ level: 'info' }, { write: (chunk: string) => { chunks.push(chunk); } });
  return {
    logger,
    messages: () => chunks.map((c) => {
      const parsed: unknown = JSON.parse(c);
      return typeof parsed === 'object' && parsed !== null && 'msg' in parsed ? String(parsed.msg) : '';
    })
  };
}

describe('deriveOutputPath', () => {
  it('replaces the last extension with .csv', () => {
    expect(deriveOutputPath('/data/ember2018/train_features_0.jsonl')).toBe('/data/ember2018/train_features_0.csv');
    expect(deriveOutputPath('/data/v1.2/records')).toBe('/data/v1.2/records.csv');
    expect(deriveOutputPath('a.tar.jsonl')).toBe('a.tar.csv');
    expect(deriveOutputPath('./.jsonl')).toBe('./.jsonl.csv');
  });
});

describe('convertFile', () => {
  const features = ['label', 'md5', 'sections_max_entropy', 'sections_mean_entropy', 'iat_rva'];

  it('writes a header and one row per record, label last', async () => {
    const src = writeLines(path.join(makeTempDir(), 'train.jsonl'), [
      recordLine(1, [1.0, 3.5]),
      recordLine(0, [])
    ]);
    const res = await convertFile(src, { features });
    expect(res).toEqual({
      ok: true,
      sourcePath: src,
      outputPath: src.replace(/\.jsonl$/, '.csv'),
      lines: 2,
      rows: 2,
      failures: []
    });
    expect(fs.readFileSync(res.outputPath, 'utf-8')).toBe(
      'md5,sections_max_entropy,sections_mean_entropy,iat_rva,label\r\n' +
      'md5-1,3.5,2.25,1200,1\r\n' +
      'md5-0,0.0,0.0,1200,0\r\n'
    );
  });

  it('converts the sample record', async () => {
    const src = writeLines(path.join(makeTempDir(), 'sample.jsonl'), [JSON.stringify(loadSampleRecord())]);
    const res = await convertFile(src, { features: ['sha256', 'subsystem', 'debug_size', 'export_rva', 'label'] });
    expect(res.ok).toBe(true);
    expect(fs.readFileSync(res.outputPath, 'utf-8')).toBe(
      'sha256,subsystem,debug_size,export_rva,label\r\n' +
      'test-sample-0001,WINDOWS_GUI,28,120,1\r\n'
    );
  });

  it('honours an explicit output path and legacy directory fields', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'sample.jsonl'), [JSON.stringify(loadSampleRecord())]);
    const out = path.join(dir, 'legacy.csv');
    const res = await convertFile(src, { features: ['debug_size', 'export_rva'], outputPath: out, directoryFields: 'legacy' });
    expect(res.outputPath).toBe(out);
    expect(fs.readFileSync(out, 'utf-8')).toBe('debug_size,export_rva\r\n49664,120\r\n');
  });

  it('fails without touching anything when the source is missing', async () => {
    const dir = makeTempDir();
    const res = await convertFile(path.join(dir, 'nope.jsonl'), { features });
    expect(res).toMatchObject({ ok: false, reason: 'SOURCE_NOT_FOUND' });
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('refuses to overwrite an existing output', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [recordLine(1, [1])]);
    fs.writeFileSync(path.join(dir, 'train.csv'), 'previous run');
    const res = await convertFile(src, { features });
    expect(res).toMatchObject({ ok: false, reason: 'OUTPUT_EXISTS', message: `The file ${path.join(dir, 'train.csv')} already exists.` });
    expect(fs.readFileSync(path.join(dir, 'train.csv'), 'utf-8')).toBe('previous run');
  });

  it('aborts on the first bad record and deletes the partial output', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [
      recordLine(1, [1]),
      JSON.stringify({ md5: 'x', label: 0 }),
      recordLine(0, [2])
    ]);
    const res = await convertFile(src, { features });
    expect(res).toEqual({
      ok: false,
      reason: 'RECORD_FAILED',
      sourcePath: src,
      outputPath: path.join(dir, 'train.csv'),
      message: 'Line 2: Sections not found in the record',
      failure: { line: 2, kind: 'SectionsMissing', feature: 'sections_max_entropy', message: 'Sections not found in the record' }
    });
    expect(fs.existsSync(path.join(dir, 'train.csv'))).toBe(false);
  });

  it('aborts on a malformed line', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [recordLine(1, [1]), '{not json']);
    const res = await convertFile(src, { features });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.failure).toMatchObject({ line: 2, kind: 'MalformedRecord' });
    expect(res.failure?.feature).toBeUndefined();
    expect(fs.existsSync(res.outputPath)).toBe(false);
  });

  it('aborts on a non-scalar feature', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [recordLine(1, [1])]);
    const res = await convertFile(src, { features: ['sections', 'label'] });
    expect(res.ok ? null : res.failure).toEqual({
      line: 1, kind: 'NonScalarFeature', feature: 'sections', message: "Feature 'sections' is a complex object"
    });
  });

  it('skip-and-report keeps good rows and lists the bad ones', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [
      recordLine(1, [1]),
      'garbage',
      JSON.stringify({ md5: 'x', label: 0, sections: [], datadirectories: directories(3) }),
      recordLine(0, [4, 2])
    ]);
    const res = await convertFile(src, { features, errorMode: 'skip-and-report' });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.rows).toBe(2);
    expect(res.lines).toBe(4);
    expect(res.failures.map((f) => [f.line, f.kind, f.feature])).toEqual([
      [2, 'MalformedRecord', undefined],
      [3, 'DatadirectoryMalformed', 'iat_rva']
    ]);
    expect(fs.readFileSync(res.outputPath, 'utf-8')).toBe(
      'md5,sections_max_entropy,sections_mean_entropy,iat_rva,label\r\n' +
      'md5-1,1,1.0,1200,1\r\n' +
      'md5-0,4,3.0,1200,0\r\n'
    );
  });

  it('an empty source produces a header-only file', async () => {
    const dir = makeTempDir();
    const src = path.join(dir, 'empty.jsonl');
    fs.writeFileSync(src, '');
    const res = await convertFile(src, { features: ['md5'] });
    expect(res).toMatchObject({ ok: true, rows: 0, lines: 0 });
    expect(fs.readFileSync(path.join(dir, 'empty.csv'), 'utf-8')).toBe('md5\r\n');
  });

  it('rejects an invalid schema before creating output', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [recordLine(1, [1])]);
    await expect(convertFile(src, { features: ['md5', 'md5'] })).rejects.toBeInstanceOf(FeatureError);
    expect(fs.existsSync(path.join(dir, 'train.csv'))).toBe(false);
  });

  it('logs progress every N lines', async () => {
    const dir = makeTempDir();
    const src = writeLines(path.join(dir, 'train.jsonl'), [1, 0, 1, 0, 1].map((l) => recordLine(l, [1])));
    const { logger, messages } = memoryLogger();
    await convertFile(src, { features: ['md5'], progressEvery: 2, logger });
    const progress = messages().filter((m) => m.includes('lines processed'));
    expect(progress).toEqual([
      `[2] lines processed for ${src}`,
      `[4] lines processed for ${src}`
    ]);
    expect(messages()).toContain(`CSV file generated successfully at ${path.join(dir, 'train.csv')}`);
  });
});
