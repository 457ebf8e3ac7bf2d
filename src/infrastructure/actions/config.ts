import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from 'pino';

/** Action handler configuration loaded from YAML. */
export interface ActionsConfig {
  slack: { enabled: boolean; webhook_url: string };
  email: { enabled: boolean; smtp_host: string; recipients: string[] };
  /** Service name → base URL for the `service` action type. */
  services: Record<string, string>;
}

/** Slack and email disabled, no services. */
export const DEFAULT_CONFIG: ActionsConfig = {
  slack: { enabled: false, webhook_url: '' },
  email: { enabled: false, smtp_host: '', recipients: [] },
  services: {},
};

type Section = Record<string, string | boolean | string[]>;

function parseScalar(raw: string): string | boolean | string[] {
  if (raw === '[]') return [];
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw.charAt(0))) {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Parser for the two-level YAML subset used by config/actions.yaml:
 * top-level sections holding indented scalars, `[]` and `- item` lists.
 * Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let section: Section | undefined;
  let lastKey: string | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const indented = line.startsWith(' ') || line.startsWith('\t');

    if (!indented && trimmed.includes(':')) {
      const name = trimmed.slice(0, trimmed.indexOf(':')).trim();
      section = {};
      result[name] = section;
      lastKey = undefined;
      continue;
    }

    if (section === undefined) continue;

    if (trimmed.startsWith('- ')) {
      const list = lastKey !== undefined ? section[lastKey] : undefined;
      if (Array.isArray(list)) list.push(String(parseScalar(trimmed.slice(2).trim())));
      continue;
    }

    const colon = trimmed.indexOf(':');
    if (colon === -1) continue;

    const key = trimmed.slice(0, colon).trim();
    const value = trimmed.slice(colon + 1).trim();
    // `key:` with nothing after it opens a block list.
    section[key] = value === '' ? [] : parseScalar(value);
    lastKey = key;
  }

  return result;
}

function readBoolean(section: Section, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(section: Section, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Loads action handler configuration.
 *
 * A missing or unreadable file yields DEFAULT_CONFIG; loaded values are
 * merged over the defaults key by key.
 */
export function loadActionsConfig(configPath?: string, log?: Logger): ActionsConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'actions.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    log?.warn({ err, path: filePath }, 'Actions config not readable, using defaults');
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  const slack = parsed['slack'] ?? {};
  const email = parsed['email'] ?? {};
  const services = parsed['services'] ?? {};

  const recipients = email['recipients'];

  const serviceUrls: Record<string, string> = {};
  for (const [name, url] of Object.entries(services)) {
    if (typeof url === 'string' && url !== '') serviceUrls[name] = url;
  }

  return {
    slack: {
      enabled: readBoolean(slack, 'enabled', DEFAULT_CONFIG.slack.enabled),
      webhook_url: readString(slack, 'webhook_url', DEFAULT_CONFIG.slack.webhook_url),
    },
    email: {
      enabled: readBoolean(email, 'enabled', DEFAULT_CONFIG.email.enabled),
      smtp_host: readString(email, 'smtp_host', DEFAULT_CONFIG.email.smtp_host),
      recipients: Array.isArray(recipients) ? [...recipients] : [...DEFAULT_CONFIG.email.recipients],
    },
    services: serviceUrls,
  };
}
