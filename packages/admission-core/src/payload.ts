// packages/admission-core/src/payload.ts

import type { AdmissionDecision } from "./source";

export const DEFAULT_MAX_PAYLOAD_BYTES = 10 * 1024 * 1024;

/**
 * Parse a Content-Length header. Anything that is not a plain
 * non-negative integer is treated as absent.
 */
export function parseContentLength(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return Number(raw.trim());
}

/**
 * Both the declared length and the bytes actually received must fit.
 */
export function checkPayloadSize(
  maxBytes: number,
  sizes: { declared?: number; actual?: number }
): AdmissionDecision {
  const { declared, actual } = sizes;
  if (declared !== undefined && declared > maxBytes) {
    return { ok: false, reason: `declared payload of ${declared} bytes exceeds ${maxBytes}` };
  }
  if (actual !== undefined && actual > maxBytes) {
    return { ok: false, reason: `payload of ${actual} bytes exceeds ${maxBytes}` };
  }
  return { ok: true };
}
