import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SessionStore } from './sessionStore';

describe('SessionStore', () => {
  let dir: string;
  let store: SessionStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessions-'));
    store = new SessionStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should create and read back a session', async () => {
    const created = await store.create({ name: 'a.vtt', format: 'vtt', content: 'WEBVTT\n' });
    const loaded = await store.get(created.id);

    expect(loaded).not.toBeNull();
    expect(loaded?.name).toBe('a.vtt');
    expect(loaded?.format).toBe('vtt');
    expect(loaded?.content).toBe('WEBVTT\n');
    expect(loaded?.position).toBe(0);
    expect(loaded?.createdAt).toBeInstanceOf(Date);
    expect(fs.existsSync(path.join(dir, `${created.id}.json`))).toBe(true);
  });

  it('should store the content and cursor of an edit', async () => {
    const created = await store.create({ name: 'a.srt', format: 'srt', content: '' });
    await store.update(created.id, '1\n', 2);

    const loaded = await store.get(created.id);
    expect(loaded?.content).toBe('1\n');
    expect(loaded?.position).toBe(2);
  });

  it('should fail to update an unknown session', async () => {
    await expect(store.update('0000-missing', '', 0)).rejects.toThrow('Session 0000-missing not found');
  });

  it('should list and delete sessions', async () => {
    const first = await store.create({ name: 'one.ass', format: 'ass', content: 'abc' });
    await store.create({ name: 'two.vtt', format: 'vtt', content: '' });

    const listed = await store.list();
    expect(listed).toHaveLength(2);
    expect(listed.find((item) => item.id === first.id)?.size).toBe(3);

    expect(await store.delete(first.id)).toBe(true);
    expect(await store.delete(first.id)).toBe(false);
    expect(await store.list()).toHaveLength(1);
  });

  it('should ignore ids that are not uuids', async () => {
    expect(await store.get('../secrets')).toBeNull();
  });

  it('should skip files with an unexpected shape', async () => {
    fs.writeFileSync(path.join(dir, 'abc.json'), JSON.stringify({ id: 'abc' }));
    expect(await store.get('abc')).toBeNull();
    expect(await store.list()).toEqual([]);
  });
});
