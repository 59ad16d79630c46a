import * as readline from 'node:readline/promises';
import { errorMessage, WorkflowError } from '../errors/custom-errors.js';
import type { BatchEntry, ReviewEdit } from '../state/batch-state.js';
import type { Orchestrator } from './orchestrator.js';

export type ReviewCommand =
  | { kind: 'edit'; edit: ReviewEdit }
  | { kind: 'toggle'; index: number }
  | { kind: 'preview' }
  | { kind: 'confirm' }
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string };

export const REVIEW_HELP = [
  'Commands:',
  '  a <n> <text>   set author of entry n',
  '  t <n> <text>   set topic of entry n',
  '  y <n> <year>   set year of entry n',
  '  s <n>          toggle selection of entry n',
  '  p              preview output paths',
  '  ok             confirm and save',
  '  q              quit without saving',
].join('\n');

const EDIT_COMMAND = /^([aty])\s+(\d+)(?:\s+(.*))?$/i;
const TOGGLE_COMMAND = /^s\s+(\d+)$/i;

/**
 * Parse one line typed at the review prompt. Entry numbers are 1-based.
 */
export function parseReviewCommand(line: string, entryCount: number): ReviewCommand {
  const text = line.trim();
  const lower = text.toLowerCase();

  if (lower === '' || lower === 'h' || lower === '?' || lower === 'help') return { kind: 'help' };
  if (lower === 'ok') return { kind: 'confirm' };
  if (lower === 'q') return { kind: 'quit' };
  if (lower === 'p') return { kind: 'preview' };

  const toIndex = (value: string | undefined): number | undefined => {
    const n = Number(value);
    return Number.isInteger(n) && n >= 1 && n <= entryCount ? n - 1 : undefined;
  };

  const editMatch = text.match(EDIT_COMMAND);
  if (editMatch) {
    const [, letter = '', number, value = ''] = editMatch;
    const index = toIndex(number);
    if (index === undefined) return { kind: 'invalid', message: `No entry ${number}` };

    const edit: ReviewEdit = { index };
    switch (letter.toLowerCase()) {
      case 'a':
        edit.author = value.trim();
        break;
      case 't':
        edit.topic = value.trim();
        break;
      default:
        edit.year = value.trim();
    }
    return { kind: 'edit', edit };
  }

  const toggleMatch = text.match(TOGGLE_COMMAND);
  if (toggleMatch) {
    const index = toIndex(toggleMatch[1]);
    if (index === undefined) return { kind: 'invalid', message: `No entry ${toggleMatch[1]}` };
    return { kind: 'toggle', index };
  }

  return { kind: 'invalid', message: `Unknown command: ${text}` };
}

function fit(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);
}

/**
 * Review table: number, selection, author, topic, year, title
 */
export function renderReviewTable(entries: readonly BatchEntry[]): string {
  const header = `${fit('#', 3)} ${fit('Sel', 4)} ${fit('Author', 20)} ${fit('Topic', 30)} ${fit('Year', 7)} Title`;
  const rows = entries.map((entry, i) => {
    const number = fit(String(i + 1), 3);
    const video = entry.video;
    if (!video) {
      return `${number} ${fit('--', 4)} failed: ${entry.failure?.message ?? 'not fetched'}`;
    }
    return [
      number,
      fit(video.selected ? '[x]' : '[ ]', 4),
      fit(video.proposedAuthor, 20),
      fit(video.proposedTopic, 30),
      fit(video.proposedYear, 7),
      fit(video.title, 40).trimEnd(),
    ].join(' ');
  });

  return [header, '-'.repeat(header.length), ...rows].join('\n');
}

export type ReviewIO = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

/**
 * Interactive review on the terminal
 *
 * @returns true when the user confirmed (the batch is then reviewed), false on quit or end of input
 */
export async function runInteractiveReview(orchestrator: Orchestrator, io: ReviewIO = {}): Promise<boolean> {
  const output = io.output ?? process.stdout;
  const rl = readline.createInterface({ input: io.input ?? process.stdin, output });
  const write = (text: string) => output.write(`${text}\n`);

  write(renderReviewTable(orchestrator.batch.entries));
  write(REVIEW_HELP);
  rl.setPrompt('review> ');
  rl.prompt();

  try {
    for await (const line of rl) {
      const command = parseReviewCommand(line, orchestrator.batch.entries.length);

      switch (command.kind) {
        case 'confirm':
          for (const preview of orchestrator.review()) {
            write(`  ${preview.path}`);
          }
          return true;
        case 'quit':
          return false;
        case 'help':
          write(REVIEW_HELP);
          break;
        case 'invalid':
          write(command.message);
          break;
        case 'preview': {
          const previews = orchestrator.preview();
          write(previews.length > 0 ? previews.map((preview) => `  ${preview.path}`).join('\n') : 'Nothing selected');
          break;
        }
        case 'edit':
        case 'toggle':
          try {
            if (command.kind === 'edit') {
              orchestrator.edit(command.edit);
            } else {
              const video = orchestrator.batch.entries[command.index]?.video;
              orchestrator.edit({ index: command.index, selected: !video?.selected });
            }
            write(renderReviewTable(orchestrator.batch.entries));
          } catch (error) {
            if (!(error instanceof WorkflowError)) throw error;
            write(errorMessage(error));
          }
          break;
      }

      rl.prompt();
    }

    return false;
  } finally {
    rl.close();
  }
}
