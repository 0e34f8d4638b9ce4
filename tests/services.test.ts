import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SessionLogHolder, SessionLogger } from '../src/server/services/session-log.js';
import { DEFAULT_SETTINGS, SettingsStore, validateSettings } from '../src/server/services/settings.js';
import { UploadStore, sanitizeFilename } from '../src/server/services/uploads.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'gdb-assist-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function readLines(path: string): Promise<Array<Record<string, unknown>>> {
  const raw = await readFile(path, 'utf-8');
  return raw.trim().split('\n').map(line => JSON.parse(line));
}

describe('validateSettings', () => {
  it('fills missing fields from the base and trims values', () => {
    expect(validateSettings({ model: ' gpt-4o ', provider: 'openai' })).toEqual({
      valid: true,
      settings: { provider: 'openai', model: 'gpt-4o', apiKey: '' },
    });
  });

  it('rejects an unknown provider', () => {
    expect(validateSettings({ provider: 'bogus' })).toEqual({ valid: false, error: 'Unsupported provider: bogus' });
  });

  it('rejects a blank model', () => {
    expect(validateSettings({ model: '   ' })).toEqual({ valid: false, error: 'Model is required' });
  });

  it('rejects a non-object payload', () => {
    expect(validateSettings(['anthropic'])).toEqual({ valid: false, error: 'Settings must be a JSON object' });
  });
});

describe('SettingsStore', () => {
  it('uses the defaults when no file exists', async () => {
    const store = new SettingsStore(join(dir, 'settings.json'));
    expect(await store.load()).toEqual(DEFAULT_SETTINGS);
  });

  it('persists an update with owner-only permissions', async () => {
    const path = join(dir, 'nested', 'settings.json');
    const store = new SettingsStore(path);

    const result = await store.update({ provider: 'openrouter', model: 'router/model', apiKey: ' test-secret ' });

    expect(result).toEqual({
      valid: true,
      settings: { provider: 'openrouter', model: 'router/model', apiKey: 'test-secret' },
    });
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({
      provider: 'openrouter',
      model: 'router/model',
      apiKey: 'test-secret',
    });
    expect((await stat(path)).mode & 0o777).toBe(0o600);
    expect(store.get().model).toBe('router/model');
  });

  it('keeps the fields a partial update leaves out', async () => {
    const store = new SettingsStore(join(dir, 'settings.json'));
    await store.update({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-secret' });

    await store.update({ model: 'gpt-4o-mini' });

    expect(store.get()).toEqual({ provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-secret' });
  });

  it('leaves the file alone on an invalid update', async () => {
    const path = join(dir, 'settings.json');
    const store = new SettingsStore(path);

    expect(await store.update({ provider: 'bogus' })).toEqual({ valid: false, error: 'Unsupported provider: bogus' });
    await expect(stat(path)).rejects.toMatchObject({ code: 'ENOENT' });
    expect(store.get()).toEqual(DEFAULT_SETTINGS);
  });

  it('refuses a corrupt settings file', async () => {
    const path = join(dir, 'settings.json');
    await writeFile(path, '{not json');
    const store = new SettingsStore(path);

    await expect(store.load()).rejects.toThrow(`Settings file ${path} is not valid JSON`);
  });

  it('hands out snapshots that later updates do not change', async () => {
    const store = new SettingsStore(join(dir, 'settings.json'));
    const before = store.get();

    await store.update({ model: 'claude-test' });

    expect(before.model).toBe(DEFAULT_SETTINGS.model);
    expect(Object.isFrozen(store.get())).toBe(true);
  });
});

describe('sanitizeFilename', () => {
  it.each([
    ['app', 'app'],
    ['../../etc/passwd', 'passwd'],
    ['C:\\Users\\dev\\crash.exe', 'crash.exe'],
    ['my prog!.bin', 'my_prog_.bin'],
    ['.hidden', 'hidden'],
    ['...', 'executable'],
    ['', 'executable'],
  ])('%j becomes %j', (input, expected) => {
    expect(sanitizeFilename(input)).toBe(expected);
  });
});

describe('UploadStore', () => {
  it('writes an executable file and remembers it', async () => {
    const store = new UploadStore(join(dir, 'uploads'));

    const stored = await store.save('../a.out', Buffer.from('\x7fELF'));

    expect(stored).toEqual({ filename: 'a.out', filepath: join(dir, 'uploads', 'a.out'), size: 4 });
    expect(store.lastUpload).toEqual(stored);
    expect((await stat(stored.filepath)).mode & 0o777).toBe(0o755);
    expect(await readFile(stored.filepath, 'latin1')).toBe('\x7fELF');
  });
});

describe('SessionLogger', () => {
  it('writes one JSON object per line', async () => {
    const logger = SessionLogger.open(join(dir, 'logs'), 'session-1');

    logger.logCommand('break main', 'user');
    logger.logLLMResponse('primary', '{"text":"ok"}', 'full_json');
    await logger.close();

    const lines = await readLines(join(dir, 'logs', 'session-1.log'));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: 'INFO',
      'session.id': 'session-1',
      'event.type': 'gdb.command',
      message: 'Sending command to GDB',
      'gdb.command': 'break main',
      'gdb.source': 'user',
    });
    expect(typeof lines[0].timestamp).toBe('string');
    expect(lines[1]).toMatchObject({
      'event.type': 'llm.response',
      'llm.turn': 'primary',
      'llm.response.body': '{"text":"ok"}',
      'llm.response.parse_method': 'full_json',
    });
  });

  it('records errors with their message', async () => {
    const logger = SessionLogger.open(dir, 'session-2');

    logger.logError(new Error('capture failed'), 'Executing GDB command: bt');
    await logger.close();

    const [entry] = await readLines(join(dir, 'session-2.log'));
    expect(entry).toMatchObject({
      level: 'ERROR',
      'event.type': 'error',
      message: 'Executing GDB command: bt',
      'error.message': 'capture failed',
    });
  });

  it('names the file after a generated session id by default', async () => {
    const logger = SessionLogger.open(dir);
    await logger.close();

    expect(logger.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(logger.filePath).toBe(join(dir, `${logger.sessionId}.log`));
  });
});

describe('SessionLogHolder', () => {
  it('closes the previous logger when replaced', async () => {
    const holder = new SessionLogHolder();
    const first = SessionLogger.open(dir, 'first');
    await holder.replace(first);
    first.logEvent('INFO', 'file.upload', 'Executable uploaded');

    await holder.replace(SessionLogger.open(dir, 'second'));
    first.logEvent('INFO', 'gdb.command', 'late write');

    expect(holder.current()?.sessionId).toBe('second');
    const lines = await readLines(join(dir, 'first.log'));
    expect(lines.map(line => line['event.type'])).toEqual(['file.upload']);

    await holder.close();
    expect(holder.current()).toBeUndefined();
  });
});
