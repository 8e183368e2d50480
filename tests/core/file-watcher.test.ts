import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileWatcher } from '../../src/core/file-watcher';
import { join } from 'node:path';
import { mkdtemp, rm, writeFile, appendFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('FileWatcher', () => {
  let tempDir: string;
  let testFile: string;
  let watcher: FileWatcher;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'watcher-test-'));
    testFile = join(tempDir, 'access.log');
    await writeFile(testFile, 'first line\n');
    watcher = new FileWatcher();
  });

  afterEach(async () => {
    watcher.stop();
    await rm(tempDir, { recursive: true, force: true });
  });

  test('fires onChange when content changes', async () => {
    const onChange = vi.fn();

    await watcher.start(testFile, { pollInterval: 20, onChange, onError: vi.fn() });
    await appendFile(testFile, 'second line\n');

    await vi.waitFor(() => expect(onChange).toHaveBeenCalledTimes(1));
  });

  test('does not fire when the content is rewritten unchanged', async () => {
    const onChange = vi.fn();

    await watcher.start(testFile, { pollInterval: 20, onChange, onError: vi.fn() });
    await writeFile(testFile, 'first line\n');
    await sleep(150);

    expect(onChange).not.toHaveBeenCalled();
  });

  test('compares against initialContent when given', async () => {
    const onChange = vi.fn();

    await watcher.start(testFile, {
      pollInterval: 20,
      initialContent: Buffer.from(''),
      onChange,
      onError: vi.fn(),
    });

    await vi.waitFor(() => expect(onChange).toHaveBeenCalledTimes(1));
  });

  test('rejects when the file does not exist', async () => {
    await expect(
      watcher.start(join(tempDir, 'missing.log'), { onChange: vi.fn(), onError: vi.fn() })
    ).rejects.toThrow(/ENOENT/);
  });

  test('reports a removed file once and stops', async () => {
    const onError = vi.fn();

    await watcher.start(testFile, { pollInterval: 20, onChange: vi.fn(), onError });
    await rm(testFile);

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    await writeFile(testFile, 'back again\n');
    await sleep(100);

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
  });

  test('reports errors thrown by onChange', async () => {
    const onError = vi.fn();

    await watcher.start(testFile, {
      pollInterval: 20,
      onChange: async () => {
        throw new Error('render failed');
      },
      onError,
    });
    await appendFile(testFile, 'more\n');

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError.mock.calls[0]?.[0]).toHaveProperty('message', 'render failed');
  });

  test('stop prevents further notifications', async () => {
    const onChange = vi.fn();

    await watcher.start(testFile, { pollInterval: 20, onChange, onError: vi.fn() });
    watcher.stop();
    await appendFile(testFile, 'ignored\n');
    await sleep(100);

    expect(onChange).not.toHaveBeenCalled();
  });
});
