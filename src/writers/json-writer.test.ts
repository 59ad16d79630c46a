import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TubescribeError } from '../errors/custom-errors.js';
import { readJsonOutput, videoMetaFromJson, writeJson } from './json-writer.js';
import { sampleVideo } from './test-fixtures.js';

describe('JSON writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'json-writer-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write every documented key with two-space indentation', async () => {
    const path = join(dir, 'out.json');
    await writeJson(sampleVideo(), path, new Date('2026-01-28T10:00:00.000Z'));

    const content = await readFile(path, 'utf-8');
    const doc = JSON.parse(content);

    expect(Object.keys(doc)).toEqual([
      'id',
      'url',
      'title',
      'channel',
      'channel_url',
      'upload_date',
      'upload_date_formatted',
      'duration',
      'duration_formatted',
      'view_count',
      'like_count',
      'channel_follower_count',
      'description',
      'chapters',
      'links',
      'transcript',
      'transcript_entries',
      'processed_at',
      'saved_as',
    ]);
    expect(content.startsWith('{\n  "id": "abc123def45",\n')).toBe(true);
    expect(doc).toMatchObject({
      upload_date: '20170115',
      upload_date_formatted: '2017-01-15',
      duration_formatted: '1:02:05',
      transcript_entries: 3,
      processed_at: '2026-01-28T10:00:00.000Z',
      saved_as: { author: 'Jordan Peterson', topic: 'Maps of Meaning', year: '2017' },
    });
    expect(doc.chapters).toEqual([
      { title: 'Intro', start_time: 0, end_time: 60 },
      { title: 'Part 1', start_time: 75 },
    ]);
  });

  it('should keep non-ASCII text unescaped', async () => {
    const path = join(dir, 'out.json');
    await writeJson(sampleVideo({ title: 'Лекция 1' }), path);

    expect(await readFile(path, 'utf-8')).toContain('"title": "Лекция 1"');
  });

  it('should round-trip every serializable field', async () => {
    const video = sampleVideo({ proposedAuthor: 'JBP', proposedTopic: 'Lecture 1', proposedYear: '2016' });
    const path = join(dir, 'out.json');
    await writeJson(video, path);

    expect(videoMetaFromJson(await readJsonOutput(path))).toEqual(video);
  });

  it('should round-trip a metadata-only video', async () => {
    const video = sampleVideo({ transcript: [], links: [], chapters: [] });
    const path = join(dir, 'out.json');
    await writeJson(video, path);

    expect(videoMetaFromJson(await readJsonOutput(path))).toEqual(video);
  });

  it('should reject documents of another shape', async () => {
    const path = join(dir, 'other.json');
    await writeFile(path, '{"id": 1}');

    await expect(readJsonOutput(path)).rejects.toBeInstanceOf(TubescribeError);
    await expect(readJsonOutput(join(dir, 'missing.json'))).rejects.toThrow(/Failed to read/);
  });
});
