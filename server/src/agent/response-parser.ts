import { DecisionSchema, type Decision } from './types.js';
import { formatIssues } from '../lib/validate.js';

const JSON_FENCE = /```json\s*([\s\S]*?)```/;
const ANY_FENCE = /```\s*([\s\S]*?)```/;

/** Greedy first-`{` to last-`}` span, so nested objects stay whole. */
function outermostObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

/**
 * Pull the JSON payload out of raw model text. Tries, in order: the first
 * ```json fence, the first plain fence, a bare object anywhere in the text.
 * Falls back to the trimmed input. Pure and deterministic.
 */
export function extractJsonPayload(raw: string): string {
  for (const fence of [JSON_FENCE, ANY_FENCE]) {
    const match = fence.exec(raw);
    if (match) {
      const candidate = outermostObject(match[1]);
      if (candidate) return candidate;
    }
  }

  return outermostObject(raw) ?? raw.trim();
}

export type DecodeResult =
  | { ok: true; decision: Decision }
  | { ok: false; reason: string };

/** Parse extracted text into a Decision. Never throws. */
export function decodeDecision(payload: string): DecodeResult {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (err) {
    return { ok: false, reason: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = DecisionSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: `Decision validation failed: ${formatIssues(parsed.error.issues).join('; ')}` };
  }
  return { ok: true, decision: Object.freeze(parsed.data) };
}

/** Serialized form stored as the assistant turn */
export function serializeDecision(decision: Decision): string {
  return JSON.stringify({
    thought: decision.thought,
    tool_name: decision.tool_name,
    parameters: decision.parameters,
  });
}
