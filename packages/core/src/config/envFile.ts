/**
 * Secrets File
 *
 * Reading and editing the line-oriented KEY=VALUE secrets file (.env).
 * Parsing follows dotenv; edits work on raw lines so comments, ordering and
 * unrelated keys survive a rewrite.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import dotenv from 'dotenv';
import { PLACEHOLDER_MARKERS } from './defaults.js';

export interface EnvFileContents {
  /** Raw file text */
  content: string;
  /** Parsed key/value pairs */
  values: Record<string, string>;
}

export function parseEnvFile(content: string): Record<string, string> {
  return dotenv.parse(content);
}

/**
 * Read a secrets file, or null if it does not exist
 */
export function readEnvFile(filePath: string): EnvFileContents | null {
  if (!existsSync(filePath)) {
    return null;
  }
  const content = readFileSync(filePath, 'utf8');
  return { content, values: parseEnvFile(content) };
}

/**
 * Trimmed value for a key; empty values count as absent
 */
export function getEnvValue(values: Record<string, string>, key: string): string | undefined {
  const value = values[key]?.trim();
  return value ? value : undefined;
}

function definesKey(line: string, key: string): boolean {
  const statement = line.trimStart().replace(/^export\s+/, '');
  if (!statement.startsWith(key)) {
    return false;
  }
  const rest = statement.slice(key.length).trimStart();
  return rest === '' || rest.startsWith('=');
}

/**
 * Remove every assignment of `key` and append a single `key=value` line.
 * Other lines keep their order; the result always ends with a newline.
 */
export function upsertEnvValue(content: string, key: string, value: string): string {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  const kept = lines.filter((line) => !definesKey(line, key));
  kept.push(`${key}=${value}`);
  return `${kept.join('\n')}\n`;
}

export function writeEnvValue(filePath: string, key: string, value: string): void {
  const content = existsSync(filePath) ? readFileSync(filePath, 'utf8') : '';
  writeFileSync(filePath, upsertEnvValue(content, key, value));
}

/**
 * True for empty values and unfilled template values such as
 * `sk-proj-your-openai-key-here`
 */
export function isPlaceholder(value: string | undefined): boolean {
  if (!value || !value.trim()) {
    return true;
  }
  const lower = value.toLowerCase();
  return PLACEHOLDER_MARKERS.some((marker) => lower.includes(marker));
}
