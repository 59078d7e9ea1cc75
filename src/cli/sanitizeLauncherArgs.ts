import { logger } from '@/ui/logger';

import type { LaunchSession } from './session';

// Store launchers append their own tokens, which the grammar cannot parse.
export const FOREIGN_LAUNCHER_MARKERS: readonly string[] = ['-epicapp='];

// macOS adds a process serial number to apps that still carry the quarantine flag.
export const QUARANTINE_MARKERS: readonly string[] = ['-psn'];

export type SanitizeResult =
  | { kind: 'untouched' }
  | { kind: 'foreign-launcher'; preserved: string[] }
  | { kind: 'quarantine' };

function hasMarkedToken(tokens: readonly string[], markers: readonly string[]): boolean {
  for (const token of tokens) {
    const lower = token.toLowerCase();
    if (markers.some((marker) => lower.startsWith(marker))) {
      return true;
    }
  }
  return false;
}

/**
 * Truncates argv to the program name when a foreign launcher injected tokens.
 * Returns the removed tail, or null when argv was left alone.
 */
export function cleanForeignLauncherArgs(argv: string[]): string[] | null {
  const tail = argv.slice(1);
  if (!hasMarkedToken(tail, FOREIGN_LAUNCHER_MARKERS)) {
    return null;
  }
  argv.splice(1);
  return tail;
}

/**
 * Truncates argv to the program name when a quarantine token is present.
 * Nothing is preserved.
 */
export function cleanQuarantineArgs(argv: string[]): boolean {
  if (!hasMarkedToken(argv.slice(1), QUARANTINE_MARKERS)) {
    return false;
  }
  argv.splice(1);
  return true;
}

export function sanitizeLauncherArgs(argv: string[], session: LaunchSession): SanitizeResult {
  const preserved = cleanForeignLauncherArgs(argv);
  if (preserved) {
    session.launcherArgs = preserved;
    logger.debug('[sanitize] Cleared foreign launcher arguments:', preserved);
    return { kind: 'foreign-launcher', preserved };
  }

  if (cleanQuarantineArgs(argv)) {
    logger.debug('[sanitize] Cleared quarantine arguments');
    return { kind: 'quarantine' };
  }

  return { kind: 'untouched' };
}
