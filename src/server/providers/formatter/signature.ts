/**
 * Signature guard: a rendered line may only differ from its source in
 * whitespace. Anything else falls back to the normalized source line.
 */

import { normalizeLine, signature } from '../../../shared/textUtils';

export interface GuardedLine {
  line: string;
  failed: boolean;
}

export function sameSignature(original: string, rendered: string): boolean {
  return signature(original) === signature(rendered);
}

export function guardLine(original: string, rendered: string, tabWidth: number): GuardedLine {
  if (sameSignature(original, rendered)) {
    return { line: rendered, failed: false };
  }
  return { line: normalizeLine(original, tabWidth), failed: true };
}
