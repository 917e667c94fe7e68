import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';

/**
 * Column contracts. New columns may be appended; existing ones never move.
 */
export const PULL_REQUEST_COLUMNS = [
  'number',
  'title',
  'state',
  'created_at',
  'merged_at',
  'author',
  'merge_commit_sha',
  'commits_count',
  'reviews_count',
  'description',
  'url',
] as const;

export const FILE_HISTORY_COLUMNS = [
  'repo',
  'file_path',
  'commit_sha',
  'html_url',
  'commit_url',
  'commit_date',
  'author_login',
  'author_name',
  'author_email',
  'committer_login',
  'message',
  'status',
  'previous_filename',
  'additions',
  'deletions',
  'changes',
] as const;

export type CsvRow<Columns extends readonly string[]> = Record<Columns[number], string | number>;

export type PullRequestRow = CsvRow<typeof PULL_REQUEST_COLUMNS>;
export type FileHistoryRow = CsvRow<typeof FILE_HISTORY_COLUMNS>;

type CsvRecord = Readonly<Record<string, string | number>>;

/**
 * Header line first, `\n` between records, quotes only where a field needs them
 */
export function toCsv(columns: readonly string[], rows: readonly CsvRecord[]): string {
  const header = stringify([columns.slice()]);
  const body = stringify(rows.map((row) => columns.map((column) => row[column])));
  return header + body;
}

/**
 * Write a CSV file in one piece. The content lands in a sibling `.partial`
 * file first and is renamed into place, so the target path only ever holds a
 * complete file.
 */
export async function writeCsvFile(
  filePath: string,
  columns: readonly string[],
  rows: readonly CsvRecord[]
): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const partial = `${filePath}.partial`;
  await fs.writeFile(partial, toCsv(columns, rows), 'utf8');
  await fs.rename(partial, filePath);
  return filePath;
}
