import { ScriptError } from '../errors/script-error.js';
import type { Migration } from './types.js';

export const DEFAULT_TICKET_KEY_PATTERN = '[A-Z]{2}';

export interface TicketInputs {
  override?: string;
  branch?: string;
  /** Chronological list as it stands after any migration creation */
  migrations: Migration[];
  keyPattern: string;
}

export type TicketSource = 'override' | 'branch' | 'migration-name' | 'migration-timestamp';

export interface TicketCandidate {
  source: TicketSource;
  resolve(inputs: TicketInputs): string | undefined;
}

export interface ResolvedTicket {
  token: string;
  source: TicketSource;
}

const UNSAFE_FILENAME_CHARS = /[\\/<>:"|?*\x00-\x1f]/;

export function isFilesystemSafe(token: string): boolean {
  return (
    token.length > 0 &&
    token.trim() === token &&
    token !== '.' &&
    token !== '..' &&
    !UNSAFE_FILENAME_CHARS.test(token)
  );
}

/**
 * Build the matcher for `<KEY><separator><digits>`. The key must start at a
 * word boundary and the number may not continue with a digit.
 */
export function compileTicketPattern(keyPattern: string, separators: '-' | '-_'): RegExp {
  return new RegExp(`(?<![A-Za-z0-9_])(?<key>${keyPattern})[${separators}](?<number>\\d+)(?!\\d)`, 'i');
}

/**
 * Throws ConfigurationInvalid when the key pattern does not compile
 */
export function assertValidTicketKeyPattern(keyPattern: string): void {
  try {
    compileTicketPattern(keyPattern, '-_');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ScriptError.configurationInvalid(`Invalid ticket key pattern "${keyPattern}": ${reason}`);
  }
}

export function matchTicket(text: string, keyPattern: string, separators: '-' | '-_'): string | undefined {
  const groups = compileTicketPattern(keyPattern, separators).exec(text)?.groups;
  if (!groups?.key || !groups.number) {
    return undefined;
  }
  return `${groups.key.toUpperCase()}-${groups.number}`;
}

function latest(migrations: Migration[]): Migration | undefined {
  return migrations[migrations.length - 1];
}

export const TICKET_CANDIDATES: readonly TicketCandidate[] = [
  {
    source: 'override',
    resolve: ({ override }) => {
      if (override === undefined) {
        return undefined;
      }
      if (!isFilesystemSafe(override)) {
        throw ScriptError.ticketResolutionFailed(`"${override}" cannot be used as a file name`);
      }
      return override;
    },
  },
  {
    source: 'branch',
    resolve: ({ branch, keyPattern }) => (branch ? matchTicket(branch, keyPattern, '-') : undefined),
  },
  {
    source: 'migration-name',
    resolve: ({ migrations, keyPattern }) => {
      const last = latest(migrations);
      return last ? matchTicket(last.name, keyPattern, '-_') : undefined;
    },
  },
  {
    source: 'migration-timestamp',
    resolve: ({ migrations }) => latest(migrations)?.timestamp,
  },
];

/**
 * First candidate producing a non-empty, file-name-safe token wins
 */
export function resolveTicket(
  inputs: TicketInputs,
  candidates: readonly TicketCandidate[] = TICKET_CANDIDATES
): ResolvedTicket {
  for (const candidate of candidates) {
    const token = candidate.resolve(inputs);
    if (token && isFilesystemSafe(token)) {
      return { token, source: candidate.source };
    }
  }
  throw ScriptError.ticketResolutionFailed('no ticket in the branch name and no migrations to fall back on');
}
