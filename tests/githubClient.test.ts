import { GitHubApiClient, FetchLike } from '../src/infrastructure/http/GitHubApiClient.js';
import { collect } from '../src/infrastructure/http/Paginator.js';
import { ApiResponseError, AuthError, TransportError } from '../src/core/errors.js';
import { FakeGitHub, commitDetail, pullRequest } from './helpers/fakeGitHub.js';

const NOW_MS = 1_700_000_000_000;
const NOW_S = NOW_MS / 1000;

function setup(fake: FakeGitHub, fetchImpl: FetchLike = fake.fetch) {
  const lines: string[] = [];
  const sleep = jest.fn(async (_ms: number) => undefined);
  const client = new GitHubApiClient('test-secret', {
    fetchImpl,
    log: (line) => lines.push(line),
    backoff: { sleep, now: () => NOW_MS },
  });
  return { client, lines, sleep };
}

describe('GitHubApiClient', () => {
  test('sends the bearer credential and API version headers', async () => {
    const fake = new FakeGitHub().paged('/repos/acme/widgets/pulls', []);
    const seen: Array<Record<string, string>> = [];
    const { client } = setup(fake, (url, init) => {
      seen.push(init.headers);
      return fake.fetch(url, init);
    });

    await collect(client.listPullRequests('acme', 'widgets', 'all'));

    expect(seen[0]).toMatchObject({
      Authorization: 'Bearer test-secret',
      'X-GitHub-Api-Version': '2022-11-28',
    });
  });

  test('a 401 is an AuthError and is not retried', async () => {
    const fake = new FakeGitHub().on('/repos/acme/widgets/pulls', { status: 401, body: { message: 'Bad credentials' } });
    const { client, sleep } = setup(fake);

    await expect(collect(client.listPullRequests('acme', 'widgets', 'closed'))).rejects.toBeInstanceOf(AuthError);
    expect(fake.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('a 403 with quota left is an AuthError', async () => {
    const fake = new FakeGitHub().on('/repos/acme/widgets/pulls', {
      status: 403,
      headers: { 'x-ratelimit-remaining': '42', 'x-ratelimit-reset': String(NOW_S + 60) },
    });
    const { client } = setup(fake);

    await expect(collect(client.listPullRequests('acme', 'widgets', 'closed'))).rejects.toThrow(
      'GitHub rejected the credential (HTTP 403)'
    );
  });

  test('sleeps through an exhausted quota and retries the same page', async () => {
    const fake = new FakeGitHub().on('/repos/acme/widgets/pulls', (_url, call) =>
      call === 1
        ? {
            status: 403,
            headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(NOW_S + 2) },
            body: { message: 'API rate limit exceeded' },
          }
        : { body: [pullRequest(1)] }
    );
    const { client, lines, sleep } = setup(fake);

    const pulls = await collect(client.listPullRequests('acme', 'widgets', 'closed'));

    expect(pulls.map((pr) => pr.number)).toEqual([1]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0][0]).toBeGreaterThanOrEqual(2000);
    expect(lines).toEqual(['[rate limit] sleeping 3s until reset...']);
    expect(fake.requests.map((url) => url.searchParams.get('page'))).toEqual(['1', '1']);
  });

  test('a page rate-limited mid-listing is retried without repeating earlier pages', async () => {
    const items = Array.from({ length: 150 }, (_, i) => pullRequest(i + 1));
    let limitedOnce = false;
    const fake = new FakeGitHub().on('/repos/acme/widgets/pulls', (url) => {
      const page = Number(url.searchParams.get('page'));
      if (page === 2 && !limitedOnce) {
        limitedOnce = true;
        return { status: 403, headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(NOW_S + 2) } };
      }
      return { body: items.slice((page - 1) * 100, page * 100) };
    });
    const { client, sleep } = setup(fake);

    const pulls = await collect(client.listPullRequests('acme', 'widgets', 'all'));

    expect(pulls).toHaveLength(150);
    expect(new Set(pulls.map((pr) => pr.number)).size).toBe(150);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(fake.requests.map((url) => url.searchParams.get('page'))).toEqual(['1', '2', '2']);
  });

  test('a secondary rate limit waits for retry-after', async () => {
    const fake = new FakeGitHub().on('/repos/acme/widgets/commits/abc123', (_url, call) =>
      call === 1 ? { status: 429, headers: { 'retry-after': '30' } } : { body: commitDetail('abc123', []) }
    );
    const { client, sleep } = setup(fake);

    await expect(client.getCommit('acme', 'widgets', 'abc123')).resolves.toEqual({ sha: 'abc123', files: [] });
    expect(sleep).toHaveBeenCalledWith(31000);
  });

  test('other failures carry the status and the API message', async () => {
    const fake = new FakeGitHub();
    const { client } = setup(fake);

    const failure = client.getCommit('acme', 'widgets', 'missing');
    await expect(failure).rejects.toBeInstanceOf(ApiResponseError);
    await expect(failure).rejects.toThrow(
      'HTTP 404 for https://api.github.com/repos/acme/widgets/commits/missing: Not Found'
    );
  });

  test('a network failure is a TransportError', async () => {
    const { client } = setup(new FakeGitHub(), async () => {
      throw new Error('socket hang up');
    });

    await expect(client.getCommit('acme', 'widgets', 'abc')).rejects.toBeInstanceOf(TransportError);
  });

  test('counts paginated commits and reviews', async () => {
    const commits = Array.from({ length: 130 }, (_, i) => ({ sha: `c${i}` }));
    const fake = new FakeGitHub()
      .paged('/repos/acme/widgets/pulls/5/commits', commits)
      .paged('/repos/acme/widgets/pulls/5/reviews', [{ id: 1 }, { id: 2 }]);
    const { client } = setup(fake);

    expect(await client.countPullRequestCommits('acme', 'widgets', 5)).toBe(130);
    expect(await client.countPullRequestReviews('acme', 'widgets', 5)).toBe(2);
    expect(fake.requestsTo('/repos/acme/widgets/pulls/5/commits')).toHaveLength(2);
  });

  test('passes path and window filters to the commit listing', async () => {
    const fake = new FakeGitHub().paged('/repos/acme/widgets/commits', []);
    const { client } = setup(fake);

    await collect(
      client.listCommitsForPath('acme', 'widgets', 'src/index.ts', { since: '2024-01-01T00:00:00.000Z', sha: 'main' })
    );

    const query = fake.requests[0].searchParams;
    expect(query.get('path')).toBe('src/index.ts');
    expect(query.get('since')).toBe('2024-01-01T00:00:00.000Z');
    expect(query.get('sha')).toBe('main');
    expect(query.has('until')).toBe(false);
  });
});
