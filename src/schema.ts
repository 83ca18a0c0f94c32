import type { Connection } from './db';

const schema = `
  /* 1. Content-addressed rows */
  CREATE TABLE IF NOT EXISTS geometry (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    hash TEXT NOT NULL UNIQUE CHECK (length(hash) = 64),
    symbols TEXT NOT NULL,
    coordinates BLOB NOT NULL,
    charge INTEGER NOT NULL DEFAULT 0,
    spin INTEGER NOT NULL DEFAULT 0,
    units TEXT NOT NULL DEFAULT 'angstrom' CHECK (units = 'angstrom')
  );

  CREATE TABLE IF NOT EXISTS calculation (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    hash TEXT NOT NULL UNIQUE CHECK (length(hash) = 64),
    geometry_id INTEGER NOT NULL,
    program TEXT NOT NULL,
    method TEXT NOT NULL,
    basis TEXT,
    calctype TEXT,
    program_version TEXT,
    input TEXT,
    keywords TEXT NOT NULL DEFAULT '{}',
    cmdline_args TEXT NOT NULL DEFAULT '[]',
    files TEXT NOT NULL DEFAULT '{}',
    /* Provenance: stored, never hashed */
    scratch_dir TEXT,
    wall_time REAL,
    hostname TEXT,
    hostcpus INTEGER,
    hostmem INTEGER,
    extras TEXT NOT NULL DEFAULT '{}',
    FOREIGN KEY (geometry_id) REFERENCES geometry(id)
  );
  CREATE INDEX IF NOT EXISTS idx_calculation_geometry ON calculation(geometry_id);

  /* 2. Named hashes of each calculation */
  CREATE TABLE IF NOT EXISTS calculation_hash (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    calculation_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    value TEXT NOT NULL CHECK (length(value) = 64),
    UNIQUE (calculation_id, name),
    FOREIGN KEY (calculation_id) REFERENCES calculation(id) ON DELETE CASCADE
  );
  CREATE INDEX IF NOT EXISTS idx_calculation_hash_lookup ON calculation_hash(name, value);

  /* 3. Results */
  CREATE TABLE IF NOT EXISTS energy (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    calculation_id INTEGER NOT NULL UNIQUE,
    geometry_id INTEGER NOT NULL,
    value REAL NOT NULL,
    FOREIGN KEY (calculation_id) REFERENCES calculation(id),
    FOREIGN KEY (geometry_id) REFERENCES geometry(id)
  );
  CREATE INDEX IF NOT EXISTS idx_energy_geometry ON energy(geometry_id);
`;

export const TABLES = ['geometry', 'calculation', 'calculation_hash', 'energy'] as const;

export type TableName = (typeof TABLES)[number];

export const initSchema = (db: Connection): void => {
  db.exec(schema);
};
