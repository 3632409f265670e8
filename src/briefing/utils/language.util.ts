import { PipelineError } from '../errors/briefing.errors';

const LANGUAGE_TAG_RE = /^[a-z]{2,3}(-[a-z0-9]+)*$/;

/** Lowercased language tag (`EN` → `en`, `pt-BR` → `pt-br`). */
export function normalizeLanguage(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!LANGUAGE_TAG_RE.test(normalized)) {
    throw new PipelineError(`invalid language: ${value}`);
  }
  return normalized;
}
