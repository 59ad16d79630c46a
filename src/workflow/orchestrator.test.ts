import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { validateConfig } from '../config/config-schema.js';
import { WorkflowError } from '../errors/custom-errors.js';
import { SessionMetrics } from '../metrics/metrics.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { BatchPhase } from '../state/batch-state.js';
import { ProcessStatus } from '../types/process-result.types.js';
import { sanitizeForFilename } from '../utils/filename-sanitizer.js';
import { readJsonOutput } from '../writers/json-writer.js';
import { Orchestrator } from './orchestrator.js';
import { createSessionContext, type SharedUtilities } from './session-context.js';
import { fakeId, fakeUrl, InMemoryVideoSource, RecordingNotifier } from './test-helpers.js';

const TRANSCRIPT = [
  { timestamp: '[00:01]', text: 'hello' },
  { timestamp: '[00:04]', text: 'world' },
];

describe('Orchestrator', () => {
  let dir: string;
  let source: InMemoryVideoSource;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'orchestrator-test-'));
    source = new InMemoryVideoSource();
    notifier = new RecordingNotifier();
    for (let n = 1; n <= 12; n++) {
      source.add(fakeId(n), {
        title: `Lecture ${n}`,
        channel: 'Test Channel',
        uploadDate: '20240301',
        description: `Notes: https://example.com/${n}`,
        transcript: TRANSCRIPT,
      });
    }
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createOrchestrator(config: Record<string, unknown> = {}, utilities?: SharedUtilities) {
    const context = createSessionContext({
      config: validateConfig({ output_base: dir, ...config }),
      notifier,
      source,
      utilities,
    });
    return new Orchestrator(context);
  }

  async function runBatch(orchestrator: Orchestrator, urls: string[]) {
    await orchestrator.submitUrls(urls);
    await orchestrator.fetchAll();
    orchestrator.review();
    return orchestrator.saveAll();
  }

  describe('submitUrls', () => {
    it('should skip blanks, comments, invalid lines and duplicate videos', async () => {
      const orchestrator = createOrchestrator();
      const text = [
        fakeUrl(1),
        '',
        '# later',
        'https://example.com/page',
        `https://www.youtube.com/watch?v=${fakeId(1)}`,
        fakeUrl(2),
      ].join('\n');

      const entries = await orchestrator.submitUrls(text);

      expect(entries.map((entry) => entry.videoId)).toEqual([fakeId(1), fakeId(2)]);
      expect(notifier.at(NotificationLevel.WARNING)).toEqual(['Skipping invalid URL: https://example.com/page']);
      expect(notifier.at(NotificationLevel.INFO)).toEqual([
        `Skipping duplicate video: https://www.youtube.com/watch?v=${fakeId(1)}`,
      ]);
    });

    it('should truncate 11 URLs to 10 and warn', async () => {
      const orchestrator = createOrchestrator();
      const urls = Array.from({ length: 11 }, (_, i) => fakeUrl(i + 1));

      const entries = await orchestrator.submitUrls(urls);

      expect(entries).toHaveLength(10);
      expect(entries.at(-1)?.videoId).toBe(fakeId(10));
      expect(notifier.at(NotificationLevel.WARNING)).toEqual(['Batch limit is 10: ignoring the last 1 URL(s)']);
    });

    it('should respect a smaller batch_max_size', async () => {
      const orchestrator = createOrchestrator({ batch_max_size: 3 });

      const entries = await orchestrator.submitUrls([fakeUrl(1), fakeUrl(2), fakeUrl(3), fakeUrl(4)]);

      expect(entries).toHaveLength(3);
    });

    it('should fail when nothing valid remains', async () => {
      const orchestrator = createOrchestrator();

      await expect(orchestrator.submitUrls('# only a comment\nhttps://example.com')).rejects.toBeInstanceOf(
        WorkflowError,
      );
      expect(orchestrator.batch.phase).toBe(BatchPhase.INPUT);
    });
  });

  describe('fetchAll', () => {
    it('should record an unreachable URL and fetch the other nine', async () => {
      source.add(fakeId(5), { unreachable: true });
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls(Array.from({ length: 10 }, (_, i) => fakeUrl(i + 1)));

      const progress = await orchestrator.fetchAll();

      expect(progress).toEqual({ total: 10, fetched: 9, failed: 1, selected: 9, succeeded: 0 });
      expect(orchestrator.batch.phase).toBe(BatchPhase.FETCHED);
      expect(orchestrator.batch.entries[4]?.failure).toEqual({
        kind: 'FetchError',
        message: `Video unavailable: ${fakeUrl(5)}`,
      });
      expect(notifier.at(NotificationLevel.ERROR)).toEqual([
        `Failed to fetch ${fakeUrl(5)}: Video unavailable: ${fakeUrl(5)}`,
      ]);
      expect(source.metadataRequests).toHaveLength(10);
    });

    it('should reach fetched even when every URL fails', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(99)]);

      const progress = await orchestrator.fetchAll();

      expect(progress.failed).toBe(1);
      expect(orchestrator.batch.phase).toBe(BatchPhase.FETCHED);
    });
  });

  describe('review', () => {
    it('should apply edits and preview the output paths', async () => {
      source.add(fakeId(1), {
        title: 'EP 3: Maps of Meaning',
        channel: 'Jordan Peterson',
        uploadDate: '20170115',
        transcript: TRANSCRIPT,
      });
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(1), fakeUrl(2)]);
      await orchestrator.fetchAll();

      const preview = orchestrator.review([{ index: 1, selected: false }]);

      expect(orchestrator.batch.phase).toBe(BatchPhase.REVIEWED);
      expect(preview).toEqual([
        {
          index: 0,
          title: 'EP 3: Maps of Meaning',
          path: 'Jordan_Peterson/Jordan_Peterson_Maps_of_Meaning_2017.{md,docx,json}',
        },
      ]);
    });

    it('should restore the proposal when an edit clears a field', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(1)]);
      await orchestrator.fetchAll();

      orchestrator.edit({ index: 0, author: 'Someone Else' });
      const video = orchestrator.edit({ index: 0, author: '   ' });

      expect(video.proposedAuthor).toBe('Test Channel');
    });

    it('should not review before fetching', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(1)]);

      expect(() => orchestrator.review()).toThrow(WorkflowError);
    });
  });

  describe('saveAll', () => {
    it('should write md, docx and json under the author folder', async () => {
      source.add(fakeId(1), {
        title: 'Maps of Meaning',
        channel: 'Jordan Peterson',
        uploadDate: '20170115',
        transcript: TRANSCRIPT,
      });
      const orchestrator = createOrchestrator();

      const [result] = await runBatch(orchestrator, [fakeUrl(1)]);

      const stem = join(dir, 'Jordan_Peterson', 'Jordan_Peterson_Maps_of_Meaning_2017');
      expect(result).toEqual({
        videoId: fakeId(1),
        url: fakeUrl(1),
        status: ProcessStatus.SUCCESS,
        message: 'Saved 3 files',
        title: 'Maps of Meaning',
        files: [`${stem}.md`, `${stem}.docx`, `${stem}.json`],
      });
      expect(Object.isFrozen(result)).toBe(true);
      expect(orchestrator.batch.phase).toBe(BatchPhase.SAVED);
      expect(await readFile(`${stem}.md`, 'utf-8')).toContain('**[00:01]** hello');
    });

    it('should save metadata only when there is no transcript', async () => {
      source.add(fakeId(1), { title: 'Silent Film', channel: 'Archive', uploadDate: '19270101' });
      const orchestrator = createOrchestrator();

      const [result] = await runBatch(orchestrator, [fakeUrl(1)]);

      expect(result?.status).toBe(ProcessStatus.SUCCESS);
      expect(result?.message).toBe('Saved 3 files (metadata only)');
      expect(notifier.at(NotificationLevel.WARNING)).toEqual([
        'Silent Film: no transcript available, saving metadata only',
      ]);

      const stem = join(dir, 'Archive', 'Archive_Silent_Film_1927');
      expect(await readFile(`${stem}.md`, 'utf-8')).toContain('*No transcript available*');
      const doc = await readJsonOutput(`${stem}.json`);
      expect(doc.transcript_entries).toBe(0);
    });

    it('should finish a batch of ten with one unreachable URL', async () => {
      source.add(fakeId(5), { unreachable: true });
      const metrics = new SessionMetrics(new Date(2026, 0, 28, 10, 0, 0));
      const orchestrator = createOrchestrator({}, { metrics });

      const results = await runBatch(
        orchestrator,
        Array.from({ length: 10 }, (_, i) => fakeUrl(i + 1)),
      );

      expect(results).toHaveLength(10);
      expect(results.filter((r) => r.status === ProcessStatus.SUCCESS)).toHaveLength(9);
      expect(results[4]).toMatchObject({ status: ProcessStatus.ERROR, errorKind: 'FetchError', files: [] });
      expect(metrics.snapshot()).toMatchObject({ tasksSucceeded: 9, tasksFailed: 1, filesCreated: 27 });
      expect(notifier.at(NotificationLevel.HIGHLIGHT)).toEqual([
        'Session tubescribe_20260128_100000: 9 succeeded · 1 failed (FetchError: 1) · 27 files',
      ]);
    });

    it('should record unselected entries as skipped without fetching transcripts', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(1), fakeUrl(2)]);
      await orchestrator.fetchAll();
      orchestrator.review([{ index: 0, selected: false }]);

      const results = await orchestrator.saveAll();

      expect(results.map((r) => r.status)).toEqual([ProcessStatus.SKIPPED, ProcessStatus.SUCCESS]);
      expect(source.transcriptRequests).toEqual([fakeId(2)]);
    });

    it('should extract description links unless disabled', async () => {
      const withLinks = createOrchestrator();
      await runBatch(withLinks, [fakeUrl(1)]);
      const linked = await readJsonOutput(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024.json'));
      expect(linked.links).toEqual([{ url: 'https://example.com/1', context: 'Notes:' }]);

      const withoutLinks = createOrchestrator({ include_links_default: false });
      await runBatch(withoutLinks, [fakeUrl(2)]);
      const unlinked = await readJsonOutput(join(dir, 'Test_Channel', 'Test_Channel_Lecture_2_2024.json'));
      expect(unlinked.links).toEqual([]);
    });

    it('should add a numeric suffix when overwrite is off', async () => {
      await runBatch(createOrchestrator({ overwrite: false }), [fakeUrl(1)]);
      const [second] = await runBatch(createOrchestrator({ overwrite: false }), [fakeUrl(1)]);

      expect(second?.files[0]).toBe(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024_2.md'));
    });

    it('should replace existing files when overwrite is on', async () => {
      await runBatch(createOrchestrator(), [fakeUrl(1)]);
      const [second] = await runBatch(createOrchestrator(), [fakeUrl(1)]);

      expect(second?.files[0]).toBe(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024.md'));
      expect(existsSync(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024_2.md'))).toBe(false);
    });

    it('should give entries that share a name their own files', async () => {
      for (const n of [20, 21]) {
        source.add(fakeId(n), {
          title: 'Q&A',
          channel: 'Chan',
          uploadDate: '20240101',
          transcript: [{ timestamp: '[00:01]', text: `video ${n}` }],
        });
      }
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(20), fakeUrl(21)]);
      await orchestrator.fetchAll();

      expect(orchestrator.review().map((line) => line.path)).toEqual([
        'Chan/Chan_QA_2024.{md,docx,json}',
        'Chan/Chan_QA_2024_2.{md,docx,json}',
      ]);

      const [first, second] = await orchestrator.saveAll();

      expect(first?.files[0]).toBe(join(dir, 'Chan', 'Chan_QA_2024.md'));
      expect(second?.files[0]).toBe(join(dir, 'Chan', 'Chan_QA_2024_2.md'));
      expect(await readFile(join(dir, 'Chan', 'Chan_QA_2024.md'), 'utf-8')).toContain('**[00:01]** video 20');
      expect(await readFile(join(dir, 'Chan', 'Chan_QA_2024_2.md'), 'utf-8')).toContain('**[00:01]** video 21');
    });

    it('should still replace files from an earlier run when names repeat within a batch', async () => {
      await runBatch(createOrchestrator(), [fakeUrl(1)]);
      source.add(fakeId(20), {
        title: 'Lecture 1',
        channel: 'Test Channel',
        uploadDate: '20240301',
        transcript: TRANSCRIPT,
      });

      const [first, second] = await runBatch(createOrchestrator(), [fakeUrl(1), fakeUrl(20)]);

      expect(first?.files[0]).toBe(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024.md'));
      expect(second?.files[0]).toBe(join(dir, 'Test_Channel', 'Test_Channel_Lecture_1_2024_2.md'));
    });

    it('should use an injected sanitizer', async () => {
      const sanitizer = (text: string, maxLength?: number) => sanitizeForFilename(text, maxLength).toUpperCase();
      const orchestrator = createOrchestrator({}, { sanitizer });

      const [result] = await runBatch(orchestrator, [fakeUrl(1)]);

      expect(result?.files[0]).toBe(join(dir, 'TEST_CHANNEL', 'TEST_CHANNEL_LECTURE_1_2024.md'));
    });

    it('should report a write failure as an error result', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory');
      const orchestrator = createOrchestrator({ output_base: blocker });

      const [result] = await runBatch(orchestrator, [fakeUrl(1)]);

      expect(result).toMatchObject({ status: ProcessStatus.ERROR, errorKind: 'WriteError', files: [] });
    });

    it('should not save before review', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.submitUrls([fakeUrl(1)]);
      await orchestrator.fetchAll();

      await expect(orchestrator.saveAll()).rejects.toBeInstanceOf(WorkflowError);
    });
  });

  it('should start a new batch after reset', async () => {
    const orchestrator = createOrchestrator();
    await runBatch(orchestrator, [fakeUrl(1)]);

    orchestrator.reset();
    const entries = await orchestrator.submitUrls([fakeUrl(2)]);

    expect(entries.map((entry) => entry.videoId)).toEqual([fakeId(2)]);
    expect(orchestrator.batch.phase).toBe(BatchPhase.INPUT);
  });
});
