// ---------------------------------------------------------------------------
// taxograph inspect -- Store Diagnostics
// ---------------------------------------------------------------------------
// Reports the database engine version and the tables present in the store.
// Useful for checking a configuration before running an export.
// ---------------------------------------------------------------------------

import { listTables, logRows, serverVersion } from '../extract/extractor.js';
import { debug } from '../shared/debug.js';
import type { ConnectionConfigInput } from '../shared/types.js';
import { connect } from '../storage/connection.js';
import type { CommandResult } from './types.js';

export function handleInspectCommand(config: ConnectionConfigInput): CommandResult {
  debug('cmd', 'handleInspectCommand');

  const connected = connect(config);
  if (!connected.ok) {
    return { success: false, message: `${connected.error.kind}: ${connected.error.message}` };
  }
  const connection = connected.value;

  try {
    const version = serverVersion(connection);
    if (!version.ok) {
      return { success: false, message: `${version.error.kind}: ${version.error.message}` };
    }

    const tables = listTables(connection);
    if (!tables.ok) {
      return { success: false, message: `${tables.error.kind}: ${tables.error.message}` };
    }
    logRows(tables.value.map((name) => ({ name })));

    const tableList = tables.value.length > 0 ? tables.value.join(', ') : '(none)';
    return {
      success: true,
      message: `Server: ${version.value}\nTables: ${tableList}`,
    };
  } finally {
    connection.close();
  }
}
