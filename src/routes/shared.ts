/**
 * Shared helpers for the pipeline routes.
 *
 * These routes read the raw body as text and parse it themselves, so each
 * one answers malformed JSON with its own status and message.
 */

import express from 'express';

export const rawBody = express.text({ type: () => true, limit: '10mb' });

export type JsonBody = { ok: true; data: unknown } | { ok: false };

export function parseJsonBody(body: unknown): JsonBody {
  if (typeof body !== 'string') {
    return { ok: false };
  }
  try {
    const data: unknown = JSON.parse(body);
    return { ok: true, data };
  } catch {
    return { ok: false };
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
