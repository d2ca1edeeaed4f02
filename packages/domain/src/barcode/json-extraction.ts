/**
 * Two-stage decode of language-model output
 *
 * Stage one takes the text between the first `{` and the last `}` and parses
 * it strictly. Stage two validates the parsed value against a schema. A
 * failure at either stage yields the `unstructured` variant carrying the raw
 * text; nothing here throws.
 */
import type { z } from 'zod';
import type { AiExtraction } from '@rxstock/types';

/**
 * Substring from the first `{` to the last `}`, or null when there is none
 */
export function findJsonObjectText(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

export function extractJsonObject<S extends z.ZodTypeAny>(
  rawText: string,
  schema: S
): AiExtraction<z.output<S>> {
  const candidate = findJsonObjectText(rawText);
  if (candidate === null) {
    return { kind: 'unstructured', rawText };
  }

  const parsed = parseJson(candidate);
  if (!parsed.ok || typeof parsed.value !== 'object' || parsed.value === null || Array.isArray(parsed.value)) {
    return { kind: 'unstructured', rawText };
  }

  const validated = schema.safeParse(parsed.value);
  if (!validated.success) {
    return { kind: 'unstructured', rawText };
  }

  return { kind: 'structured', data: validated.data, rawText };
}
