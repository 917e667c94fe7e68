import {
  buildCommandPreview,
  parseCredential,
  parseExtractionRequest,
} from '../src/application/services/ExtractionRequest.js';
import { ValidationError } from '../src/core/errors.js';
import { normalizeDateBound } from '../src/utils/dates.js';

function validationIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('Date bounds', () => {
  test('a bare date covers the whole UTC day', () => {
    expect(normalizeDateBound('2024-01-01', 'start')).toBe('2024-01-01T00:00:00.000Z');
    expect(normalizeDateBound('2024-01-31', 'end')).toBe('2024-01-31T23:59:59.999Z');
  });

  test('full timestamps are normalized to UTC', () => {
    expect(normalizeDateBound('2024-01-01T12:30:00+02:00', 'start')).toBe('2024-01-01T10:30:00.000Z');
  });

  test('invalid dates are rejected', () => {
    expect(normalizeDateBound('2024-02-30', 'start')).toBeNull();
    expect(normalizeDateBound('yesterday', 'end')).toBeNull();
  });
});

describe('Extraction request validation', () => {
  test('applies pull request defaults', () => {
    const request = parseExtractionRequest('pr-extractor', { org: 'acme', repos: 'widgets, gadgets' });

    expect(request).toEqual({
      tool: 'pr-extractor',
      args: {
        org: 'acme',
        repos: ['widgets', 'gadgets'],
        since: undefined,
        until: undefined,
        verbose: false,
        state: 'closed',
        mergedOnly: true,
      },
    });
  });

  test('accepts snake_case form fields and tool aliases', () => {
    const request = parseExtractionRequest('file-commit-history', {
      org: 'acme',
      repos: ['widgets'],
      file_path: '/src/index.ts',
      since: '2024-01-01',
    });

    expect(request.tool).toBe('file-history-extractor');
    expect(request.args).toMatchObject({
      filePath: 'src/index.ts',
      since: '2024-01-01T00:00:00.000Z',
    });
  });

  test('lists every issue', () => {
    const issues = validationIssues(() => parseExtractionRequest('pr-extractor', { org: '', repos: [] }));

    expect(issues).toEqual(['org: Organization must not be empty', 'repos: At least 1 repository is required']);
  });

  test('rejects a file history request without a path', () => {
    const issues = validationIssues(() =>
      parseExtractionRequest('file-history-extractor', { org: 'acme', repos: ['widgets'], filePath: '/' })
    );
    expect(issues).toEqual(['filePath: File path is required']);
  });

  test('rejects since after until', () => {
    const issues = validationIssues(() =>
      parseExtractionRequest('pr-extractor', {
        org: 'acme',
        repos: ['widgets'],
        since: '2024-02-01',
        until: '2024-01-01',
      })
    );
    expect(issues).toEqual([
      'since: since (2024-02-01T00:00:00.000Z) is after until (2024-01-01T23:59:59.999Z)',
    ]);
  });

  test('rejects an unparseable date', () => {
    const issues = validationIssues(() =>
      parseExtractionRequest('pr-extractor', { org: 'acme', repos: ['widgets'], until: 'soon' })
    );
    expect(issues).toEqual(['until: Invalid date format: soon. Use YYYY-MM-DD or full ISO.']);
  });

  test('rejects an unknown tool', () => {
    expect(() => parseExtractionRequest('issue-extractor', { org: 'acme', repos: ['widgets'] })).toThrow(
      ValidationError
    );
  });

  test('requires a credential', () => {
    expect(() => parseCredential('  ')).toThrow('GitHub token is required');
    expect(parseCredential(' "test-secret" ')).toBe('test-secret');
  });

  test('the command preview never carries the credential', () => {
    const request = parseExtractionRequest('pr-extractor', {
      org: 'acme',
      repos: ['widgets'],
      since: '2024-01-01',
      until: '2024-01-31',
    });

    expect(buildCommandPreview(request)).toEqual([
      'pr-extractor',
      '--org',
      'acme',
      '--repos',
      'widgets',
      '--since',
      '2024-01-01T00:00:00.000Z',
      '--until',
      '2024-01-31T23:59:59.999Z',
      '--state',
      'closed',
      '--merged-only',
      '--token',
      '[TOKEN]',
    ]);
  });
});
