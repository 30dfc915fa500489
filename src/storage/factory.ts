import type { Config, StorageBackendName } from '../shared/config.js';
import type { StorageBackend } from './backend.js';
import { SqliteStorage } from './sqlite.js';
import { CsvStorage } from './csv.js';

export function openStorage(
  config: Config['storage'],
  backend: StorageBackendName = config.backend,
): StorageBackend {
  switch (backend) {
    case 'sqlite':
      return SqliteStorage.open(config.sqlite_path);
    case 'csv':
      return new CsvStorage(config.csv_path);
  }
}
