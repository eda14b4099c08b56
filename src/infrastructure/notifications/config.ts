import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Relay configuration: deep-link settings for Backlog and the chat
 * webhook each source posts to.
 */
export interface RelayConfig {
  backlog: { base_url: string; project_prefix: string; webhook_url: string };
  kibela: { webhook_url: string };
  delivery: { user_agent: string };
}

/**
 * Default configuration — no webhook URLs, so nothing is delivered until
 * one is configured.
 */
export const DEFAULT_CONFIG: RelayConfig = {
  backlog: { base_url: '', project_prefix: '', webhook_url: '' },
  kibela: { webhook_url: '' },
  delivery: { user_agent: 'hook-relay/1.0' },
};

type YamlSections = Record<string, Record<string, unknown>>;

/**
 * Minimal YAML parser for the flat relay config structure.
 *
 * Handles only the subset of YAML used in config/relay.yaml: top-level
 * section keys with indented scalar values. Not a general-purpose YAML
 * parser.
 */
function parseSimpleYaml(content: string): YamlSections {
  const result: YamlSections = {};
  let section: Record<string, unknown> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t') && line.includes(':')) {
      const name = line.slice(0, line.indexOf(':')).trim();
      section = {};
      result[name] = section;
      continue;
    }

    if (section && line.includes(':')) {
      const colonIdx = line.indexOf(':');
      const key = line.slice(0, colonIdx).trim();
      let value: unknown = line.slice(colonIdx + 1).trim();

      if (value === 'true') {
        value = true;
      } else if (value === 'false') {
        value = false;
      } else if (value === '""' || value === "''") {
        value = '';
      } else if (typeof value === 'string' && /^(["']).*\1$/.test(value)) {
        value = value.slice(1, -1);
      }

      section[key] = value;
    }
  }

  return result;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/** Drops trailing slashes so links can be joined with `/`. */
function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Applies environment overrides on top of the file configuration.
 *
 * Only non-empty variables override; unset ones keep the file value.
 */
function applyEnv(config: RelayConfig, env: NodeJS.ProcessEnv): RelayConfig {
  const pick = (name: string, current: string): string => {
    const value = env[name];
    return value !== undefined && value !== '' ? value : current;
  };

  return {
    backlog: {
      base_url: trimBaseUrl(pick('BACKLOG_BASE_URL', config.backlog.base_url)),
      project_prefix: pick('PROJECT_PREFIX', config.backlog.project_prefix),
      webhook_url: pick('BACKLOG_WEBHOOK_URL', config.backlog.webhook_url),
    },
    kibela: {
      webhook_url: pick('KIBELA_WEBHOOK_URL', config.kibela.webhook_url),
    },
    delivery: {
      user_agent: pick('RELAY_USER_AGENT', config.delivery.user_agent),
    },
  };
}

function readConfigFile(filePath: string): RelayConfig {
  try {
    const parsed = parseSimpleYaml(readFileSync(filePath, 'utf-8'));

    const backlog = parsed['backlog'] ?? {};
    const kibela = parsed['kibela'] ?? {};
    const delivery = parsed['delivery'] ?? {};

    return {
      backlog: {
        base_url: stringOr(backlog['base_url'], DEFAULT_CONFIG.backlog.base_url),
        project_prefix: stringOr(backlog['project_prefix'], DEFAULT_CONFIG.backlog.project_prefix),
        webhook_url: stringOr(backlog['webhook_url'], DEFAULT_CONFIG.backlog.webhook_url),
      },
      kibela: {
        webhook_url: stringOr(kibela['webhook_url'], DEFAULT_CONFIG.kibela.webhook_url),
      },
      delivery: {
        user_agent: stringOr(delivery['user_agent'], DEFAULT_CONFIG.delivery.user_agent),
      },
    };
  } catch {
    return DEFAULT_CONFIG;
  }
}

/**
 * Loads relay configuration from the YAML file, then the environment.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Environment variables (BACKLOG_BASE_URL, PROJECT_PREFIX,
 * BACKLOG_WEBHOOK_URL, KIBELA_WEBHOOK_URL, RELAY_USER_AGENT) win over
 * file values.
 */
export function loadRelayConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): RelayConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'relay.yaml');
  return applyEnv(readConfigFile(filePath), env);
}
