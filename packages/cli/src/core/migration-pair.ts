import { ScriptError } from '../errors/script-error.js';
import { requireAtLeast } from './migration-lister.js';
import { BEGINNING_OF_HISTORY, type Migration, type MigrationPair, type MigrationRef, migrationRefToString } from './types.js';

export interface PairOverrides {
  from?: string;
  to?: string;
}

/** CLI spelling of the beginning of history, same as the migration tool's */
export const BEGINNING_OF_HISTORY_ID = '0';

function locate(migrations: Migration[], reference: string, side: 'from' | 'to'): Migration {
  const found = migrations.find(m => m.id === reference) ?? migrations.find(m => m.name === reference);
  if (!found) {
    throw ScriptError.migrationNotFound(reference, side);
  }
  return found;
}

export function precedes(from: MigrationRef, to: Migration): boolean {
  return from === BEGINNING_OF_HISTORY || from.timestamp < to.timestamp;
}

/**
 * Choose the (from, to) bounds of the script.
 *
 * Without overrides the last two migrations are used. With `to` only, `from`
 * is the migration right before it (or the beginning of history); with `from`
 * only, `to` is the latest migration.
 */
export function selectMigrationPair(migrations: Migration[], overrides: PairOverrides = {}): MigrationPair {
  if (overrides.from === undefined && overrides.to === undefined) {
    requireAtLeast(migrations, 2);
    return {
      from: migrations[migrations.length - 2],
      to: migrations[migrations.length - 1],
    };
  }

  requireAtLeast(migrations, 1);

  const to = overrides.to !== undefined
    ? locate(migrations, overrides.to, 'to')
    : migrations[migrations.length - 1];

  let from: MigrationRef;
  if (overrides.from === BEGINNING_OF_HISTORY_ID) {
    from = BEGINNING_OF_HISTORY;
  } else if (overrides.from !== undefined) {
    from = locate(migrations, overrides.from, 'from');
  } else {
    const toIndex = migrations.indexOf(to);
    from = toIndex > 0 ? migrations[toIndex - 1] : BEGINNING_OF_HISTORY;
  }

  if (!precedes(from, to)) {
    throw ScriptError.configurationInvalid(`--from ${migrationRefToString(from)} must come before --to ${to.id}`, [
      'Swap the two migrations, or pick an earlier --from',
    ]);
  }

  return { from, to };
}
