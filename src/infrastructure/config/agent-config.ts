import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseAgentOptions } from '../../application/agent-options.js';
import type { AgentOptions } from '../../application/agent-options.js';

const SECTION = 'pushover';

/**
 * Minimal YAML reader for the flat agent config.
 *
 * Handles only what config/pushover.yaml uses: top-level section keys with
 * indented `key: value` scalars, optionally quoted. Comments and blank
 * lines are ignored. Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  let currentSection = '';

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    if (!line.startsWith(' ') && !line.startsWith('\t') && line.includes(':')) {
      currentSection = line.slice(0, line.indexOf(':')).trim();
      result[currentSection] = {};
      continue;
    }

    const section = result[currentSection];
    if (section === undefined || !line.includes(':')) continue;

    const colonIdx = line.indexOf(':');
    const key = line.slice(0, colonIdx).trim();
    section[key] = unquote(line.slice(colonIdx + 1).trim());
  }

  return result;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Loads and validates the agent options.
 *
 * Reads the `pushover:` section of the YAML file (default
 * `config/pushover.yaml`, or `PUSHOVER_CONFIG`), then applies the
 * `PUSHOVER_TOKEN` and `PUSHOVER_USER` environment overrides. Only the
 * default file may be missing, in which case the environment alone
 * configures the agent; a path that was asked for must exist.
 * Throws when the file cannot be read or the merged options fail validation.
 */
export function loadAgentConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): AgentOptions {
  const explicitPath = configPath ?? env['PUSHOVER_CONFIG'];
  const filePath = explicitPath ?? resolve(process.cwd(), 'config', 'pushover.yaml');

  let fileOptions: Record<string, string> = {};
  try {
    fileOptions = parseSimpleYaml(readFileSync(filePath, 'utf-8'))[SECTION] ?? {};
  } catch (err: unknown) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (!missing) throw err;
    if (explicitPath !== undefined) {
      throw new Error(`Pushover config file not found: ${filePath}`, { cause: err });
    }
  }

  const raw: Record<string, string> = { ...fileOptions };
  const token = env['PUSHOVER_TOKEN'];
  const user = env['PUSHOVER_USER'];
  if (token) raw['token'] = token;
  if (user) raw['user'] = user;

  return parseAgentOptions(raw);
}
