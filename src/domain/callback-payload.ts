/**
 * Provider callback payload decoding.
 *
 * The provider reports results in one of two encodings depending on the
 * model family:
 *
 *   direct:   { code, data: { taskId, info: { resultUrls: [...] } } }
 *   embedded: { code, data: { taskId, state, resultJson: "{\"resultUrls\":[...]}" } }
 *
 * Decoding never throws. A payload that matches neither encoding yields a
 * failed decoding with a reason, which the ingestor treats as an empty result.
 */

import { z } from 'zod';

/**
 * Every envelope field falls back to undefined on its own, so a null or
 * mistyped side field never hides the task id.
 */
const callbackEnvelope = z
  .object({
    code: z.union([z.number(), z.string()]).optional().catch(undefined),
    msg: z.string().optional().catch(undefined),
    data: z
      .object({
        taskId: z.string().min(1).optional().catch(undefined),
        state: z.string().optional().catch(undefined),
        failMsg: z.string().optional().catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

const directResult = z.object({
  info: z.object({
    resultUrls: z.array(z.string()),
  }),
});

const embeddedResult = z.object({
  resultJson: z.string().min(1),
});

const embeddedContent = z.object({
  resultUrls: z.array(z.string()),
});

export type ResultEncoding = 'direct' | 'embedded';

export interface ResultReference {
  encoding: ResultEncoding;
  urls: string[];
}

export type ResultDecoding =
  | { ok: true; reference: ResultReference }
  | { ok: false; reason: string };

export interface ParsedCallback {
  taskId: string | null;
  /** Provider status code; null when the payload carries none. */
  code: number | null;
  /** Provider task state (embedded encoding only), e.g. "success" or "fail". */
  state: string | null;
  /** Provider failure message or envelope msg, for logs. */
  message: string | null;
  result: ResultDecoding;
}

/** Outcome of interpreting a parsed callback. */
export type CallbackVerdict =
  | { kind: 'succeeded'; resultUrl: string; encoding: ResultEncoding }
  | { kind: 'failed'; reason: string };

function normalizeCode(code: number | string | undefined): number | null {
  if (code === undefined) return null;
  const value = typeof code === 'number' ? code : Number.parseInt(code, 10);
  return Number.isFinite(value) ? value : null;
}

/** Try both result encodings against the `data` object. */
export function decodeResultReference(data: unknown): ResultDecoding {
  const direct = directResult.safeParse(data);
  if (direct.success) {
    return { ok: true, reference: { encoding: 'direct', urls: direct.data.info.resultUrls } };
  }

  const embedded = embeddedResult.safeParse(data);
  if (!embedded.success) {
    return { ok: false, reason: 'payload carries neither info.resultUrls nor resultJson' };
  }

  let content: unknown;
  try {
    content = JSON.parse(embedded.data.resultJson);
  } catch {
    return { ok: false, reason: 'resultJson is not valid JSON' };
  }

  const parsed = embeddedContent.safeParse(content);
  if (!parsed.success) {
    return { ok: false, reason: 'resultJson has no resultUrls list' };
  }
  return { ok: true, reference: { encoding: 'embedded', urls: parsed.data.resultUrls } };
}

export function parseCallbackPayload(raw: unknown): ParsedCallback {
  const envelope = callbackEnvelope.safeParse(raw);
  if (!envelope.success) {
    return {
      taskId: null,
      code: null,
      state: null,
      message: null,
      result: { ok: false, reason: 'payload is not a callback envelope' },
    };
  }

  const { code, msg, data } = envelope.data;
  return {
    taskId: data?.taskId ?? null,
    code: normalizeCode(code),
    state: data?.state ?? null,
    message: data?.failMsg ?? msg ?? null,
    result: decodeResultReference(data),
  };
}

/**
 * Decide whether a callback reports a usable result. Only the first URL is
 * ever downloaded; blank entries are ignored.
 */
export function judgeCallback(parsed: ParsedCallback): CallbackVerdict {
  if (parsed.code !== null && parsed.code !== 200) {
    return { kind: 'failed', reason: `provider reported code ${parsed.code}` };
  }
  if (parsed.state === 'fail') {
    return { kind: 'failed', reason: `provider reported failure${parsed.message ? `: ${parsed.message}` : ''}` };
  }
  if (!parsed.result.ok) {
    return { kind: 'failed', reason: parsed.result.reason };
  }

  const url = parsed.result.reference.urls.find((candidate) => candidate.trim().length > 0);
  if (!url) {
    return { kind: 'failed', reason: 'result URL list is empty' };
  }
  return { kind: 'succeeded', resultUrl: url, encoding: parsed.result.reference.encoding };
}
