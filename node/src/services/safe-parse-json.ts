/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used by the language-model gateway before schema validation.
 */
import { logger } from '@/services/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

/** The parsed object, or null when the text holds no JSON object. */
export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }

  const parsed = tryParse(txt) ?? tryParse(txt.replace(/'/g, '"')); // models sometimes answer {'key': 'value'}
  if (isRecord(parsed)) return parsed;

  logger.warn(parsed === undefined ? 'safeParseJson:parse_error' : 'safeParseJson:non_object', {
    context,
    raw: txt.slice(0, 300),
  });
  return null;
}
