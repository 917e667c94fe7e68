import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { JobService } from '../src/application/services/JobService.js';
import { JobQueue } from '../src/infrastructure/queue/JobQueue.js';
import { AuditLog } from '../src/infrastructure/audit/AuditLog.js';
import { FakeGitHub, pullRequest } from './helpers/fakeGitHub.js';
import { connectTo, makeTempDir, removeDir } from './helpers/recorder.js';

const TOKEN = 'test-secret-0001';

describe('WebServer', () => {
  let dir: string;
  let auditFile: string;
  let jobService: JobService;
  let server: WebServer;
  let tokensSeen: string[];

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = makeTempDir();
    auditFile = path.join(dir, 'audit-log.jsonl');

    const fake = new FakeGitHub()
      .paged('/repos/acme/widgets/pulls', [pullRequest(1)])
      .paged('/repos/acme/widgets/pulls/1/commits', [{ sha: 'a' }])
      .paged('/repos/acme/widgets/pulls/1/reviews', []);
    tokensSeen = [];

    const auditLog = new AuditLog(auditFile);
    const queue = new JobQueue({ outputRoot: path.join(dir, 'output'), auditLog });
    jobService = new JobService(queue, (credential) => {
      tokensSeen.push(credential);
      return connectTo(fake);
    });
    server = new WebServer(jobService, auditLog);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  async function submitAndWait(): Promise<string> {
    const res = await request(server.getApp())
      .post('/api/extract')
      .send({ type: 'pr-extractor', token: TOKEN, args: { org: 'acme', repos: ['widgets'] } });
    expect(res.status).toBe(201);
    const jobId: string = res.body.jobId;
    await jobService.waitFor(jobId);
    return jobId;
  }

  test('GET /health', async () => {
    const res = await request(server.getApp()).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  test('submits a job and reports its final status', async () => {
    const jobId = await submitAndWait();

    const res = await request(server.getApp()).get(`/api/status/${jobId}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      jobId,
      tool: 'pr-extractor',
      status: 'succeeded',
      progress: 100,
      message: 'Done.',
      outputs: ['widgets-pull-requests.csv'],
    });
    expect(tokensSeen).toEqual([TOKEN]);
  });

  test('rejects a request without a token before creating a job', async () => {
    const res = await request(server.getApp())
      .post('/api/extract')
      .send({ type: 'pr-extractor', args: { org: 'acme', repos: ['widgets'] } });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'GitHub token is required', issues: ['token: Required'] });
    expect(jobService.list()).toEqual([]);
  });

  test('rejects invalid arguments with the list of issues', async () => {
    const res = await request(server.getApp())
      .post('/api/extract')
      .send({ type: 'file-history-extractor', token: TOKEN, args: { org: 'acme', repos: ['widgets'] } });

    expect(res.status).toBe(400);
    expect(res.body.issues).toEqual(['filePath: File path is required']);
  });

  test('a malformed JSON body is a 400', async () => {
    const res = await request(server.getApp())
      .post('/api/extract')
      .set('Content-Type', 'application/json')
      .send('{bad');

    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/JSON/);
    expect(console.error).not.toHaveBeenCalledWith('[WebServer] Request failed:', expect.anything());
    expect(jobService.list()).toEqual([]);
  });

  test('an unknown job is a 404', async () => {
    const res = await request(server.getApp()).get('/api/status/unknown');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Unknown job_id: unknown' });
  });

  test('downloads a listed output file', async () => {
    const jobId = await submitAndWait();

    const res = await request(server.getApp()).get(`/api/download/${jobId}/widgets-pull-requests.csv`);

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="widgets-pull-requests.csv"');
    expect(res.text.split('\n')[0]).toBe(
      'number,title,state,created_at,merged_at,author,merge_commit_sha,commits_count,reviews_count,description,url'
    );
  });

  test('files the job does not list cannot be downloaded', async () => {
    const jobId = await submitAndWait();

    const res = await request(server.getApp()).get(`/api/download/${jobId}/..%2F..%2Faudit-log.jsonl`);
    expect(res.status).toBe(404);
  });

  test('lists jobs with statistics and outputs per job', async () => {
    const jobId = await submitAndWait();

    const jobs = await request(server.getApp()).get('/api/jobs?status=succeeded');
    expect(jobs.body.statistics).toEqual({ total: 1, queued: 0, running: 0, succeeded: 1, failed: 0 });
    expect(jobs.body.jobs).toHaveLength(1);

    const outputs = await request(server.getApp()).get(`/api/outputs/${jobId}`);
    expect(outputs.body).toEqual({ jobId, outputs: ['widgets-pull-requests.csv'] });
  });

  test('an unknown status filter is a 400', async () => {
    const res = await request(server.getApp()).get('/api/jobs?status=done');
    expect(res.status).toBe(400);
  });

  test('the audit trail records the job with a masked credential', async () => {
    const jobId = await submitAndWait();

    const res = await request(server.getApp()).get('/api/audit');

    expect(res.status).toBe(200);
    expect(res.body.entries.map((entry: { status: string }) => entry.status)).toEqual(['started', 'succeeded']);
    expect(res.body.entries[0]).toMatchObject({ jobId, credentialMasked: 'test********0001' });
    expect(res.body.entries[1]).toMatchObject({ jobId, rowsWritten: 1, outputs: ['widgets-pull-requests.csv'] });
    expect(fs.readFileSync(auditFile, 'utf8')).not.toContain(TOKEN);
  });
});
