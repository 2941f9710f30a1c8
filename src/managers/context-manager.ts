import { Mutex } from 'async-mutex';
import { z } from 'zod';

import { CONTEXT_FORMAT_VERSION } from '../constants/switchboard.js';
import type { ArtifactPaths } from '../config/settings.js';
import { NoActiveProjectError, ProjectMismatchError, errorMessage } from '../errors/index.js';
import { readJsonFile, writeJsonAtomic } from '../utils/atomic-write.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { assertProjectId, type ManagerStatus, type ResourceManager } from './types.js';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

const ConversationMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  timestamp: z.string().datetime()
});

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

const ContextFileSchema = z.object({
  version: z.literal(CONTEXT_FORMAT_VERSION),
  projectId: z.string(),
  updatedAt: z.string().datetime(),
  messages: z.array(ConversationMessageSchema)
});

type ContextFile = z.infer<typeof ContextFileSchema>;

interface ProjectContext {
  projectId: string;
  messages: ConversationMessage[];
}

export const DEFAULT_MAX_MESSAGES = 50;
export const DEFAULT_MAX_ACTIVE_CONTEXTS = 10;
export const DEFAULT_RECENT_CONTEXT_CHARS = 4000;

const RECENCY_WINDOW_HOURS = 168;
const IMPORTANT_KEYWORDS = ['error', 'important', 'remember'];

/**
 * Pruning weight in [0, 1]: linear recency decay over a week,
 * plus boosts for flagged keywords, long content and user turns.
 */
export function importanceScore(message: ConversationMessage, now: Date): number {
  const ageHours = (now.getTime() - Date.parse(message.timestamp)) / 3_600_000;
  const recency = Math.max(0, 1 - ageHours / RECENCY_WINDOW_HOURS);

  let boost = 0;
  const lower = message.content.toLowerCase();
  if (IMPORTANT_KEYWORDS.some((keyword) => lower.includes(keyword))) boost += 0.3;
  if (message.content.length > 200) boost += 0.2;
  if (message.role === 'user') boost += 0.1;

  return Math.min(1, recency + boost);
}

/** Keeps the `maxMessages` highest-scoring messages, in their original order. */
export function pruneMessages(
  messages: ConversationMessage[],
  maxMessages: number,
  now: Date
): ConversationMessage[] {
  if (messages.length <= maxMessages) return messages;

  const keep = new Set(
    messages
      .map((message, index) => ({ index, score: importanceScore(message, now) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, maxMessages)
      .map((entry) => entry.index)
  );
  return messages.filter((_, index) => keep.has(index));
}

export function formatRecentContext(messages: ConversationMessage[], maxChars: number): string {
  const parts: string[] = [];
  let total = 0;
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (!message) continue;
    const line = `${message.role}: ${message.content}\n`;
    if (total + line.length > maxChars) break;
    parts.unshift(line);
    total += line.length;
  }
  return parts.join('');
}

export interface ContextManagerOptions {
  paths: ArtifactPaths;
  maxMessages?: number;
  maxActiveContexts?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Per-project conversation buffer persisted as JSON next to the project's other artifacts.
 *
 * addMessage binds to the project that is current when it is called, before any await,
 * so a message can never land in the context of a project switched to afterwards.
 */
export class ContextManager implements ResourceManager {
  readonly name = 'context' as const;

  private readonly paths: ArtifactPaths;
  private readonly maxMessages: number;
  private readonly maxActiveContexts: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly contexts = new Map<string, ProjectContext>();
  private readonly writeMutex = new Mutex();

  private currentProjectId: string | null = null;
  private currentStatus: ManagerStatus = 'unloaded';
  private error: string | null = null;

  constructor(options: ContextManagerOptions) {
    this.paths = options.paths;
    this.maxMessages = Math.max(1, options.maxMessages ?? DEFAULT_MAX_MESSAGES);
    this.maxActiveContexts = Math.max(1, options.maxActiveContexts ?? DEFAULT_MAX_ACTIVE_CONTEXTS);
    this.logger = options.logger ?? createLogger('context');
    this.now = options.now ?? (() => new Date());
  }

  async switchProject(projectId: string): Promise<boolean> {
    assertProjectId(projectId);
    if (this.currentProjectId === projectId && this.currentStatus === 'loaded') {
      return true;
    }

    this.currentProjectId = projectId;
    try {
      const context = this.contexts.get(projectId) ?? (await this.load(projectId));
      this.remember(context);
      this.currentStatus = 'loaded';
      this.error = null;
      this.logger.debug('Context loaded', { projectId, messages: context.messages.length });
      return true;
    } catch (error) {
      this.currentStatus = 'error';
      this.error = errorMessage(error);
      this.logger.warn('Context load failed', { projectId, error: this.error });
      return false;
    }
  }

  current(): string | null {
    return this.currentProjectId;
  }

  status(): ManagerStatus {
    return this.currentStatus;
  }

  lastError(): string | null {
    return this.error;
  }

  async addMessage(role: MessageRole, content: string): Promise<ConversationMessage> {
    const context = this.requireCurrent('addMessage');
    const message: ConversationMessage = { role, content, timestamp: this.now().toISOString() };
    context.messages.push(message);
    context.messages = pruneMessages(context.messages, this.maxMessages, this.now());
    await this.persist(context);
    return { ...message };
  }

  /**
   * Most recent messages, oldest first, as `role: content` lines fitting in `maxChars`.
   */
  getRecentContext(maxChars = DEFAULT_RECENT_CONTEXT_CHARS): string {
    const context = this.requireCurrent('getRecentContext');
    return formatRecentContext(context.messages, maxChars);
  }

  getHistory(limit?: number): ConversationMessage[] {
    const { messages } = this.requireCurrent('getHistory');
    const slice = limit === undefined ? messages : messages.slice(Math.max(0, messages.length - limit));
    return slice.map((message) => ({ ...message }));
  }

  async clear(): Promise<void> {
    const context = this.requireCurrent('clear');
    context.messages = [];
    await this.persist(context);
  }

  /**
   * Throws ProjectMismatchError unless `projectId` is the loaded project.
   */
  assertCurrent(projectId: string): void {
    if (projectId !== this.currentProjectId || this.currentStatus !== 'loaded') {
      throw new ProjectMismatchError(projectId, this.currentProjectId);
    }
  }

  forget(projectId: string): void {
    if (projectId === this.currentProjectId) return;
    this.contexts.delete(projectId);
  }

  loadedContexts(): string[] {
    return [...this.contexts.keys()];
  }

  async unload(): Promise<void> {
    // let queued writes finish before forgetting the buffers
    await this.writeMutex.waitForUnlock();
    this.contexts.clear();
    this.currentProjectId = null;
    this.currentStatus = 'unloaded';
    this.error = null;
  }

  private requireCurrent(operation: string): ProjectContext {
    const projectId = this.currentProjectId;
    const context = projectId ? this.contexts.get(projectId) : undefined;
    if (!projectId || this.currentStatus !== 'loaded' || !context) {
      throw new NoActiveProjectError(operation);
    }
    return context;
  }

  private async load(projectId: string): Promise<ProjectContext> {
    const contextPath = this.paths.context(projectId);
    let json: unknown;
    try {
      json = await readJsonFile(contextPath);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      this.logger.warn('Context file is not valid JSON; starting fresh', { projectId });
      return { projectId, messages: [] };
    }
    if (json === null) return { projectId, messages: [] };

    const parsed = ContextFileSchema.safeParse(json);
    if (!parsed.success || parsed.data.projectId !== projectId) {
      this.logger.warn('Context file failed validation; starting fresh', { projectId });
      return { projectId, messages: [] };
    }
    return { projectId, messages: parsed.data.messages };
  }

  private remember(context: ProjectContext): void {
    this.contexts.delete(context.projectId);
    this.contexts.set(context.projectId, context);
    for (const projectId of this.contexts.keys()) {
      if (this.contexts.size <= this.maxActiveContexts) break;
      if (projectId === this.currentProjectId) continue;
      this.contexts.delete(projectId);
    }
  }

  private async persist(context: ProjectContext): Promise<void> {
    await this.writeMutex.runExclusive(async () => {
      const file: ContextFile = {
        version: CONTEXT_FORMAT_VERSION,
        projectId: context.projectId,
        updatedAt: this.now().toISOString(),
        messages: context.messages
      };
      await writeJsonAtomic(this.paths.context(context.projectId), file);
    });
  }
}
