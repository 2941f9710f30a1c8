import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import { createArtifactPaths, type ArtifactPaths } from '../src/config/settings.js';
import { NoActiveProjectError, ProjectMismatchError } from '../src/errors/index.js';
import {
  ContextManager,
  formatRecentContext,
  importanceScore,
  pruneMessages,
  type ConversationMessage
} from '../src/managers/context-manager.js';
import { makeTempDir, recordingLogger, rmWithRetries, type RecordedLog } from './test-helpers.js';

const NOW = new Date('2025-03-08T00:00:00.000Z');
const hoursAgo = (hours: number) => new Date(NOW.getTime() - hours * 3_600_000).toISOString();

describe('context scoring', () => {
  it('combines recency with keyword, length and role boosts', () => {
    expect(importanceScore({ role: 'user', content: 'an error occurred', timestamp: hoursAgo(0) }, NOW)).toBe(1);
    expect(importanceScore({ role: 'assistant', content: 'ok', timestamp: hoursAgo(84) }, NOW)).toBe(0.5);
    expect(importanceScore({ role: 'system', content: 'x'.repeat(201), timestamp: hoursAgo(336) }, NOW)).toBe(0.2);
  });

  it('keeps the highest-scoring messages in their original order', () => {
    const messages: ConversationMessage[] = [
      { role: 'user', content: 'remember the deploy key', timestamp: hoursAgo(168) },
      { role: 'assistant', content: 'ok', timestamp: hoursAgo(144) },
      { role: 'assistant', content: 'sure', timestamp: hoursAgo(24) },
      { role: 'user', content: 'hi', timestamp: hoursAgo(0) }
    ];

    expect(pruneMessages(messages, 3, NOW).map((m) => m.content)).toEqual([
      'remember the deploy key',
      'sure',
      'hi'
    ]);
    expect(pruneMessages(messages, 10, NOW)).toBe(messages);
  });

  it('formats the newest messages that fit, oldest first', () => {
    const messages: ConversationMessage[] = [
      { role: 'user', content: 'a', timestamp: hoursAgo(3) },
      { role: 'assistant', content: 'bb', timestamp: hoursAgo(2) },
      { role: 'user', content: 'ccc', timestamp: hoursAgo(1) }
    ];
    expect(formatRecentContext(messages, 24)).toBe('assistant: bb\nuser: ccc\n');
    expect(formatRecentContext(messages, 5)).toBe('');
  });
});

describe('ContextManager', () => {
  let dataDir: string;
  let paths: ArtifactPaths;
  let records: RecordedLog[];
  let manager: ContextManager;

  beforeEach(async () => {
    dataDir = await makeTempDir('context');
    paths = createArtifactPaths(dataDir);
    records = [];
    manager = new ContextManager({ paths, logger: recordingLogger(records), now: () => NOW });
  });

  afterEach(async () => {
    await rmWithRetries(dataDir);
  });

  it('starts with an empty history for a new project', async () => {
    expect(await manager.switchProject('alpha')).toBe(true);
    expect(manager.current()).toBe('alpha');
    expect(manager.status()).toBe('loaded');
    expect(manager.getHistory()).toEqual([]);
    expect(manager.getRecentContext()).toBe('');
  });

  it('persists messages and reloads them in a new instance', async () => {
    await manager.switchProject('alpha');
    await manager.addMessage('user', 'How is billing wired?');
    await manager.addMessage('assistant', 'Through the invoice service.');

    const file = JSON.parse(await fs.readFile(paths.context('alpha'), 'utf-8'));
    expect(file).toMatchObject({ version: 1, projectId: 'alpha', updatedAt: NOW.toISOString() });
    expect(file.messages).toHaveLength(2);

    const reopened = new ContextManager({ paths, logger: recordingLogger() });
    await reopened.switchProject('alpha');
    expect(reopened.getRecentContext()).toBe(
      'user: How is billing wired?\nassistant: Through the invoice service.\n'
    );
    expect(reopened.getHistory(1).map((m) => m.content)).toEqual(['Through the invoice service.']);
  });

  it('keeps contexts separate per project', async () => {
    await manager.switchProject('alpha');
    await manager.addMessage('user', 'alpha question');
    await manager.switchProject('beta');
    expect(manager.getHistory()).toEqual([]);
    await manager.addMessage('user', 'beta question');

    await manager.switchProject('alpha');
    expect(manager.getHistory().map((m) => m.content)).toEqual(['alpha question']);
  });

  it('binds a message to the project that was current when it was added', async () => {
    await manager.switchProject('alpha');
    const pending = manager.addMessage('user', 'for alpha');
    await manager.switchProject('beta');
    await pending;

    expect(manager.getHistory()).toEqual([]);
    await manager.switchProject('alpha');
    expect(manager.getHistory().map((m) => m.content)).toEqual(['for alpha']);
  });

  it('prunes to the configured size', async () => {
    let clock = NOW.getTime();
    const pruning = new ContextManager({
      paths,
      maxMessages: 2,
      logger: recordingLogger(),
      now: () => new Date(clock)
    });
    await pruning.switchProject('alpha');
    await pruning.addMessage('assistant', 'first');
    clock += 48 * 3_600_000;
    await pruning.addMessage('assistant', 'second');
    clock += 48 * 3_600_000;
    await pruning.addMessage('assistant', 'third');

    expect(pruning.getHistory().map((m) => m.content)).toEqual(['second', 'third']);
  });

  it('requires an active project', async () => {
    await expect(manager.addMessage('user', 'hello')).rejects.toBeInstanceOf(NoActiveProjectError);
    expect(() => manager.getRecentContext()).toThrow(
      'No active project: getRecentContext requires a loaded project (use switch_project first)'
    );
  });

  it('starts fresh when the context file is corrupt or belongs to another project', async () => {
    await fs.mkdir(paths.projectDir('alpha'), { recursive: true });
    await fs.writeFile(paths.context('alpha'), '{"version":1,');
    await fs.mkdir(paths.projectDir('beta'), { recursive: true });
    await fs.writeFile(
      paths.context('beta'),
      JSON.stringify({ version: 1, projectId: 'alpha', updatedAt: NOW.toISOString(), messages: [] })
    );

    expect(await manager.switchProject('alpha')).toBe(true);
    expect(manager.getHistory()).toEqual([]);
    expect(await manager.switchProject('beta')).toBe(true);
    expect(records.filter((r) => r.level === 'warn').map((r) => r.message)).toEqual([
      'Context file is not valid JSON; starting fresh',
      'Context file failed validation; starting fresh'
    ]);
  });

  it('reports an error when the context cannot be read', async () => {
    // a directory where the file should be
    await fs.mkdir(paths.context('alpha'), { recursive: true });

    expect(await manager.switchProject('alpha')).toBe(false);
    expect(manager.status()).toBe('error');
    expect(manager.current()).toBe('alpha');
    expect(manager.lastError()).toMatch(/EISDIR/);
    await expect(manager.addMessage('user', 'x')).rejects.toBeInstanceOf(NoActiveProjectError);
  });

  it('bounds the number of resident contexts without evicting the current one', async () => {
    const bounded = new ContextManager({ paths, maxActiveContexts: 2, logger: recordingLogger() });
    await bounded.switchProject('a1');
    await bounded.switchProject('b2');
    await bounded.switchProject('c3');
    expect(bounded.loadedContexts()).toEqual(['b2', 'c3']);

    bounded.forget('c3');
    bounded.forget('b2');
    expect(bounded.loadedContexts()).toEqual(['c3']);
  });

  it('checks the current project', async () => {
    await manager.switchProject('alpha');
    expect(() => manager.assertCurrent('alpha')).not.toThrow();
    expect(() => manager.assertCurrent('beta')).toThrow(ProjectMismatchError);
  });

  it('clears the history and unloads', async () => {
    await manager.switchProject('alpha');
    await manager.addMessage('user', 'soon gone');
    await manager.clear();
    expect(manager.getHistory()).toEqual([]);

    await manager.unload();
    expect(manager.current()).toBeNull();
    expect(manager.status()).toBe('unloaded');
    expect(manager.loadedContexts()).toEqual([]);
  });

  it('rejects an empty project id', async () => {
    await expect(manager.switchProject('')).rejects.toBeInstanceOf(TypeError);
  });
});
