/**
 * Role-Adaptive Prompt Assembly
 *
 * Each mentoring persona ("Executive", "Engineer", ...) has its own prompt
 * template. Templates live in config/prompts.json so they can be edited
 * without touching code, and are loaded once at startup.
 *
 * Slots are written as {name}. Role templates may use {role}, {history},
 * {message} and {context}; the topic-prompts template {topic}, {role} and
 * {context}; the session-intro template {role} and {context}.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { ChatTurn } from './history.js';

const ROLE_SLOTS = ['role', 'history', 'message', 'context'] as const;
const TOPIC_SLOTS = ['topic', 'role', 'context'] as const;
const INTRO_SLOTS = ['role', 'context'] as const;

const SLOT_PATTERN = /\{(\w+)\}/g;

// A template is one string or a list of lines, whichever reads better in the file.
const templateSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((t) => (Array.isArray(t) ? t.join('\n') : t));

const promptFileSchema = z.object({
  defaultRole: z.string().min(1),
  roles: z.record(templateSchema),
  topicPrompts: templateSchema,
  introPrompts: templateSchema,
});

export interface RoleProfile {
  name: string;
  template: string;
}

export interface PromptConfig {
  defaultRole: string;
  roles: ReadonlyMap<string, RoleProfile>;
  topicPrompts: string;
  introPrompts: string;
}

export type HistoryLine = Pick<ChatTurn, 'role' | 'content'>;

function slotsIn(template: string): string[] {
  return [...template.matchAll(SLOT_PATTERN)].map((m) => m[1]);
}

function checkSlots(label: string, template: string, allowed: readonly string[], required: string): void {
  const slots = slotsIn(template);
  const unknown = slots.filter((s) => !allowed.includes(s));
  if (unknown.length > 0) {
    throw new ConfigError(`${label} uses unknown slot(s): ${unknown.map((s) => `{${s}}`).join(', ')}`);
  }
  if (!slots.includes(required)) {
    throw new ConfigError(`${label} has no {${required}} slot`);
  }
}

/** Validate raw prompt configuration. Throws ConfigError on any problem. */
export function parsePromptConfig(raw: unknown): PromptConfig {
  const result = promptFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Malformed prompt configuration: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const { defaultRole, roles, topicPrompts, introPrompts } = result.data;
  const entries = Object.entries(roles);
  if (entries.length === 0) {
    throw new ConfigError('Prompt configuration defines no roles');
  }
  if (!Object.hasOwn(roles, defaultRole)) {
    throw new ConfigError(`Default role "${defaultRole}" has no template`);
  }

  const profiles = new Map<string, RoleProfile>();
  for (const [name, template] of entries) {
    checkSlots(`Template for role "${name}"`, template, ROLE_SLOTS, 'message');
    profiles.set(name, Object.freeze({ name, template }));
  }
  checkSlots('Topic prompts template', topicPrompts, TOPIC_SLOTS, 'topic');
  checkSlots('Session intro template', introPrompts, INTRO_SLOTS, 'context');

  return Object.freeze({ defaultRole, roles: profiles, topicPrompts, introPrompts });
}

/** Read and validate the prompt file. */
export function loadPromptConfig(file: string): PromptConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(`Could not read prompt configuration at ${file}`, { cause: error });
  }
  const config = parsePromptConfig(raw);
  console.log(`Loaded ${config.roles.size} role profile(s) from`, file);
  return config;
}

/** Single pass: substituted values are never scanned for slots themselves. */
function fill(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(SLOT_PATTERN, (marker: string, name: string) => values[name] ?? marker);
}

/** Flat transcript, oldest first. */
export function renderHistory(history: readonly HistoryLine[]): string {
  if (history.length === 0) return '(no previous messages)';
  return history
    .map((turn) => `${turn.role === 'user' ? 'Learner' : 'Mentor'}: ${turn.content}`)
    .join('\n');
}

export class PromptAssembler {
  constructor(private readonly config: PromptConfig) {}

  /**
   * Exact role name first, then a case-insensitive match, then the default role.
   */
  profileFor(role: string | undefined): RoleProfile {
    const { roles, defaultRole } = this.config;
    if (role) {
      const exact = roles.get(role);
      if (exact) return exact;

      const wanted = role.trim().toLowerCase();
      for (const profile of roles.values()) {
        if (profile.name.toLowerCase() === wanted) return profile;
      }
    }

    const fallback = roles.get(defaultRole);
    if (!fallback) {
      // parsePromptConfig guarantees the default exists
      throw new ConfigError(`Default role "${defaultRole}" has no template`);
    }
    return fallback;
  }

  /** Full prompt for one chat turn. `message` is inserted verbatim. */
  build(role: string | undefined, history: readonly HistoryLine[], message: string, context: string = ''): string {
    const profile = this.profileFor(role);
    return fill(profile.template, {
      role: role?.trim() || profile.name,
      history: renderHistory(history),
      message,
      context,
    });
  }

  buildTopicPrompt(topic: string, role: string | undefined, context: string = ''): string {
    return fill(this.config.topicPrompts, {
      topic,
      role: role?.trim() || this.config.defaultRole,
      context,
    });
  }

  /** Greeting, topic plan and first suggestions for a new session. */
  buildIntroPrompt(role: string | undefined, context: string = ''): string {
    return fill(this.config.introPrompts, {
      role: role?.trim() || this.config.defaultRole,
      context,
    });
  }

  listRoles(): string[] {
    return [...this.config.roles.keys()];
  }
}
