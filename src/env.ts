import fs from 'fs/promises';
import path from 'path';

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const withoutExport = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;
    const idx = withoutExport.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = withoutExport.slice(0, idx).trim();
    values[key] = unquote(withoutExport.slice(idx + 1).trim());
  }
  return values;
}

/**
 * Copies `.env` entries into `process.env` without overriding variables the
 * shell already set. Returns the keys that were applied.
 */
export async function loadDotEnv(envPath = path.join(process.cwd(), '.env')): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!process.env[key]) {
      process.env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
