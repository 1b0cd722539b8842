import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { exitCodeFor, runPipeline, type PipelineDeps } from '../pipeline/run.js';
import { CompletionClient, type FetchLike } from '../llm/client.js';
import { encryptToken, generateKey } from '../secrets/fernet.js';

const DOCUMENT = `---
author: scriptdoc
notebook: sales_load
created: 2026-01-01T00:00:00
---

# sales_load
`;

describe('runPipeline', () => {
  let testDir: string;
  let cwd: string;
  let key: string;
  let chunks: string[];
  let fetchMock: Mock<FetchLike>;
  let stderr: MockInstance<typeof console.error>;
  let deps: PipelineDeps;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'scriptdoc-pipeline-test-'));
    cwd = join(testDir, 'work');
    await mkdir(join(cwd, 'templates'), { recursive: true });
    await writeFile(join(cwd, 'templates', 'prompt.md'), 'TEMPLATE');
    await writeFile(join(cwd, 'notebook.py'), 'x = 1');

    key = generateKey();
    chunks = [];
    fetchMock = vi.fn<FetchLike>();
    stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    deps = {
      client: new CompletionClient({ baseUrl: 'https://llm.example.test/v1', fetch: fetchMock }),
      output: { write: (chunk: string) => chunks.push(chunk) },
      env: {},
      packageRoot: join(testDir, 'pkg', 'root'),
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  async function writeEnv(lines: string[]) {
    await writeFile(join(cwd, '.env'), lines.join('\n') + '\n');
  }

  it('should emit exactly the completion text and exit 0', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);
    fetchMock.mockResolvedValueOnce(Response.json({ choices: [{ message: { role: 'assistant', content: DOCUMENT } }] }));

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toEqual({ state: 'done', text: DOCUMENT });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(chunks).toEqual([DOCUMENT]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [, init] = fetchMock.mock.calls[0];
    expect(init.headers).toMatchObject({ Authorization: 'Bearer sk-test-123' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'gpt-5-mini',
      messages: [{ role: 'user', content: 'TEMPLATE\n\nHier is de Notebook.py:\n\nx = 1' }],
    });
  });

  it('should pass the requested model through', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);
    fetchMock.mockResolvedValueOnce(Response.json({ choices: [{ message: { content: DOCUMENT } }] }));

    await runPipeline({ filePath: 'notebook.py', cwd, model: 'gpt-4o' }, deps);

    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init.body))).toMatchObject({ model: 'gpt-4o' });
  });

  it('should fail at configuration when the decryption key is missing', async () => {
    await writeEnv([`OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toMatchObject({
      state: 'failed',
      stage: 'start',
      error: { code: 'MISSING_KEY', key: 'ENCRYPTION_PASSWORD' },
    });
    expect(exitCodeFor(outcome)).toBe(1);
    expect(chunks).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith('✗ Loading configuration failed: Missing required entry ENCRYPTION_PASSWORD');
  });

  it('should fail at decryption when the credential was encrypted under another key', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(generateKey(), 'sk-test-123')}`]);

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toMatchObject({ state: 'failed', stage: 'config-loaded', error: { code: 'INVALID_TOKEN' } });
    expect(chunks).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith('✗ Decrypting credential failed: Decryption failed');
  });

  it('should fail at decryption when the key is not a Fernet key', async () => {
    await writeEnv(['ENCRYPTION_PASSWORD=test-secret', `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toMatchObject({ state: 'failed', stage: 'config-loaded', error: { code: 'INVALID_KEY' } });
  });

  it('should fail before the request when the source file is unreadable', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);

    const outcome = await runPipeline({ filePath: 'missing.py', cwd }, deps);

    expect(outcome).toMatchObject({
      state: 'failed',
      stage: 'credential-decrypted',
      error: { code: 'READ_FAILED', path: join(cwd, 'missing.py') },
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(chunks).toEqual([]);
  });

  it('should report the HTTP status without leaking the credential', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);
    fetchMock.mockResolvedValueOnce(Response.json({ error: { message: 'Incorrect API key provided: sk-test-123' } }, { status: 401 }));

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toMatchObject({
      state: 'failed',
      stage: 'prompt-built',
      error: { code: 'HTTP_STATUS', status: 401 },
    });
    expect(chunks).toEqual([]);
    expect(stderr).toHaveBeenCalledWith('✗ Requesting completion failed: Completion service returned HTTP 401');
    for (const call of stderr.mock.calls) {
      expect(call.join(' ')).not.toContain('sk-test-123');
    }
  });

  it('should fail on an empty choices list without writing output', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);
    fetchMock.mockResolvedValueOnce(Response.json({ choices: [] }));

    const outcome = await runPipeline({ filePath: 'notebook.py', cwd }, deps);

    expect(outcome).toMatchObject({ state: 'failed', stage: 'prompt-built', error: { code: 'MALFORMED_RESPONSE' } });
    expect(chunks).toEqual([]);
  });

  it('should rethrow errors that are not classified', async () => {
    await writeEnv([`ENCRYPTION_PASSWORD=${key}`, `OPENAI_API_KEY_ENC=${encryptToken(key, 'sk-test-123')}`]);
    fetchMock.mockResolvedValueOnce(Response.json({ choices: [{ message: { content: DOCUMENT } }] }));
    const broken: PipelineDeps = {
      ...deps,
      output: {
        write: () => {
          throw new Error('EPIPE');
        },
      },
    };

    await expect(runPipeline({ filePath: 'notebook.py', cwd }, broken)).rejects.toThrow('EPIPE');
  });
});
