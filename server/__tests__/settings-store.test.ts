import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SettingsFileError, YamlSettingsStore } from '../settings-store';

describe('YamlSettingsStore', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('starts empty when the file does not exist', async () => {
    const store = await YamlSettingsStore.load(path.join(dir, 'missing.yaml'));

    expect(store.all()).toEqual({});
    expect(store.has('web', 'http_port')).toBe(false);
  });

  it('reads sections from YAML', async () => {
    const file = path.join(dir, 'settings.yaml');
    fs.writeFileSync(file, 'web:\n  http_port: 8095\nplayer_settings:\n  kitchen:\n    enabled: true\n');

    const store = await YamlSettingsStore.load(file);

    expect(store.get('web', 'http_port')).toBe(8095);
    expect(store.get('player_settings', 'kitchen')).toEqual({ enabled: true });
    expect(store.has('web', 'https_port')).toBe(false);
    expect(store.get('web', 'https_port')).toBeUndefined();
  });

  it('treats an empty file as an empty document', async () => {
    const file = path.join(dir, 'settings.yaml');
    fs.writeFileSync(file, '');

    const store = await YamlSettingsStore.load(file);

    expect(store.all()).toEqual({});
  });

  it('rejects a document that is not a mapping of sections', async () => {
    const file = path.join(dir, 'settings.yaml');
    fs.writeFileSync(file, '- just\n- a list\n');

    await expect(YamlSettingsStore.load(file)).rejects.toBeInstanceOf(SettingsFileError);
  });

  it('does not treat inherited properties as entries', () => {
    const store = new YamlSettingsStore(path.join(dir, 'settings.yaml'), { web: {} });

    expect(store.has('web', 'toString')).toBe(false);
    expect(store.has('__proto__', 'toString')).toBe(false);
    expect(store.has('constructor', 'name')).toBe(false);
    expect(store.get('__proto__', 'toString')).toBeUndefined();
  });

  it('keeps sections named after prototype members as plain entries', () => {
    const store = new YamlSettingsStore(path.join(dir, 'settings.yaml'), { web: {} });

    store.set('__proto__', 'toString', 'replaced');
    store.set('web', '__proto__', 'replaced');

    expect(store.get('__proto__', 'toString')).toBe('replaced');
    expect(store.get('web', '__proto__')).toBe('replaced');
    expect(typeof Object.prototype.toString).toBe('function');
  });

  it('returns a copy from all()', () => {
    const store = new YamlSettingsStore(path.join(dir, 'settings.yaml'), { web: { http_port: 8095 } });

    const snapshot = store.all();
    snapshot.web.http_port = 1;

    expect(store.get('web', 'http_port')).toBe(8095);
  });

  it('saves to a new directory and reloads the same values', async () => {
    const file = path.join(dir, 'nested', 'settings.yaml');
    const store = new YamlSettingsStore(file);
    store.set('web', 'http_port', 9000);
    store.set('player_settings', 'kitchen', { name: 'Kitchen', enabled: false });

    await store.save();
    const reloaded = await YamlSettingsStore.load(file);

    expect(reloaded.all()).toEqual({
      web: { http_port: 9000 },
      player_settings: { kitchen: { name: 'Kitchen', enabled: false } },
    });
  });
});
