import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { Chalk } from 'chalk';
import { Readable } from 'node:stream';
import { stripVTControlCharacters } from 'node:util';
import { join } from 'node:path';
import { appendFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { run } from '../../src/run';
import type { CliOptions } from '../../src/core/types';
import type { Tailer } from '../../src/core/tailer';
import { createBuiltinRegistry } from '../../src/plugins/builtins';
import { PluginDiscovery } from '../../src/plugins/discovery';
import { logger } from '../../src/utils/logger';

const SAMPLE = '127.0.0.1 - frank [10/Oct/2000:13:55:36 -0700] "GET /apache_pb.gif HTTP/1.0" 200 2326';

function options(overrides: Partial<CliOptions> = {}): CliOptions {
  return {
    pollInterval: 2000,
    pluginDirs: [],
    listPlugins: false,
    verbose: false,
    ...overrides,
  };
}

describe('run', () => {
  let tempDir: string;
  let output: string[];
  let tailer: Tailer | undefined;

  const context = () => ({
    registry: createBuiltinRegistry({ colors: new Chalk({ level: 0 }) }),
    discovery: PluginDiscovery.withPaths([]),
    output: (line: string) => output.push(stripVTControlCharacters(line)),
    onTailer: (created: Tailer) => {
      tailer = created;
    },
  });

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'run-test-'));
    output = [];
    tailer = undefined;
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    tailer?.stop();
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('stdin mode', () => {
    test('renders structured lines and exits 0 at end of input', async () => {
      const input = Readable.from([`${SAMPLE}\n`, 'not a log line\n', '\n']);

      const exitCode = await run(options({ mode: 'clf' }), { ...context(), input });

      expect(exitCode).toBe(0);
      expect(output).toEqual([SAMPLE]);
    });

    test('highlights by default', async () => {
      const input = Readable.from(['GET  /health 200\n']);

      const exitCode = await run(options(), { ...context(), input });

      expect(exitCode).toBe(0);
      expect(output).toEqual(['GET /health 200']);
    });
  });

  describe('file mode', () => {
    test('prints appended lines and exits 1 when the file disappears', async () => {
      const logFile = join(tempDir, 'access.log');
      await writeFile(logFile, `${SAMPLE}\n`);

      const exitCode = run(options({ mode: 'clf', path: logFile, pollInterval: 20 }), context());

      await vi.waitFor(() => expect(tailer?.getState()).toBeTruthy());
      await appendFile(logFile, `${SAMPLE.replace('frank', 'alice')}\n`);
      await vi.waitFor(() => expect(output).toEqual([SAMPLE.replace('frank', 'alice')]));

      await rm(logFile);
      expect(await exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('exits 1 when the file cannot be opened', async () => {
      const exitCode = await run(options({ path: join(tempDir, 'missing.log') }), context());

      expect(exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('--list-plugins', () => {
    test('prints registered plugins and discovered files', async () => {
      const pluginDir = join(tempDir, 'plugins');
      await mkdir(pluginDir);
      await writeFile(join(pluginDir, 'libapache.so'), '');
      await writeFile(join(pluginDir, 'notes.txt'), '');

      const exitCode = await run(options({ listPlugins: true, pluginDirs: [pluginDir] }), context());

      expect(exitCode).toBe(0);
      expect(output).toEqual([
        'Registered plugins:',
        '  ad-hoc 1.0.0 - Highlights numbers, IP addresses, HTTP verbs, quotes and brackets',
        '  clf 1.0.0 - Common Log Format (web access log) field extractor',
        'Plugin files:',
        `  ${join(pluginDir, 'libapache.so')}`,
        `Searched: ${pluginDir}`,
      ]);
    });

    test('marks disabled plugins and reports an empty search', async () => {
      const ctx = context();
      ctx.registry.disable('clf');

      const exitCode = await run(options({ listPlugins: true }), ctx);

      expect(exitCode).toBe(0);
      expect(output).toContain('  clf 1.0.0 (disabled) - Common Log Format (web access log) field extractor');
      expect(output.slice(-2)).toEqual(['  (none found)', 'Searched: (no search paths)']);
    });
  });

  describe('unknown mode', () => {
    test('warns when a plugin file matches but still highlights', async () => {
      const pluginDir = join(tempDir, 'plugins');
      await mkdir(pluginDir);
      await writeFile(join(pluginDir, 'libsyslog.so'), '');
      const input = Readable.from(['hello world\n']);

      const exitCode = await run(options({ mode: 'syslog', pluginDirs: [pluginDir] }), { ...context(), input });

      expect(exitCode).toBe(0);
      expect(output).toEqual(['hello world']);
      expect(logger.warn).toHaveBeenCalledWith(
        `Found plugin file ${join(pluginDir, 'libsyslog.so')} for mode "syslog", but dynamic loading is not supported; using ad-hoc`
      );
    });
  });
});
