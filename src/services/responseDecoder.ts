/**
 * Decoding of free-text model output that is expected to carry a JSON object,
 * possibly wrapped in a markdown code fence.
 */

export type DecodeResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; raw: string };

export interface SummaryFields {
  summary: string;
  remedy: string;
}

/**
 * Contents of the first ```json fence, else of the first plain ``` fence, else the text itself
 */
export function stripCodeFence(text: string): string {
  const jsonFence = text.split('```json');
  if (jsonFence.length > 1) {
    return jsonFence[1].split('```')[0].trim();
  }
  const fence = text.split('```');
  if (fence.length > 1) {
    return fence[1].trim();
  }
  return text.trim();
}

export function decodeModelJson(text: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch {
    return { ok: false, raw: text };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, raw: text };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(parsed)) };
}

function stringField(value: Record<string, unknown>, key: string): string {
  const field = value[key];
  return typeof field === 'string' ? field : '';
}

/**
 * Undecodable output is kept whole as the summary with an empty remedy
 */
export function toSummaryFields(result: DecodeResult): SummaryFields {
  if (!result.ok) {
    return { summary: result.raw, remedy: '' };
  }
  return {
    summary: stringField(result.value, 'summary'),
    remedy: stringField(result.value, 'remedy'),
  };
}

export function toCommandList(result: DecodeResult): string[] {
  if (!result.ok) return [];
  const commands = result.value.commands;
  if (!Array.isArray(commands)) return [];
  return commands.filter(cmd => Boolean(cmd)).map(cmd => String(cmd));
}
