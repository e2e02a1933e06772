import Database from 'better-sqlite3';
import { Element } from '../model/element.js';
import { ThermoDatabase, type DatabaseOptions } from '../model/database.js';
import { Parameter } from '../model/parameter.js';
import { Phase } from '../model/phase.js';
import { Species } from '../model/species.js';
import { Sublattice } from '../model/sublattice.js';
import { parseFunction } from '../function/parser.js';
import { ModelError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Functions and parameters are stored as raw text and re-parsed on load.
 */
const MIGRATION_V1 = `
-- Elements: ELEMENT declarations
CREATE TABLE IF NOT EXISTS elements (
  name TEXT PRIMARY KEY,
  atomic_number INTEGER NOT NULL,
  mass REAL NOT NULL,
  reference_state TEXT NOT NULL,
  h298 REAL NOT NULL,
  s298 REAL NOT NULL
);

-- Species: name + formula as a JSON object
CREATE TABLE IF NOT EXISTS species (
  name TEXT PRIMARY KEY,
  formula_json TEXT NOT NULL
);

-- Phases, in declaration order
CREATE TABLE IF NOT EXISTS phases (
  name TEXT PRIMARY KEY,
  position INTEGER NOT NULL
);

-- Sublattices of each phase, ordered by index
CREATE TABLE IF NOT EXISTS sublattices (
  phase TEXT NOT NULL REFERENCES phases(name),
  idx INTEGER NOT NULL,
  site_ratio REAL NOT NULL,
  constituents_json TEXT NOT NULL,
  PRIMARY KEY (phase, idx)
);

-- FUNCTION definitions (raw function text)
CREATE TABLE IF NOT EXISTS functions (
  name TEXT PRIMARY KEY,
  source TEXT NOT NULL
);

-- Parameters, in insertion order. phase + suffix name either a phase
-- declared as PHASE_SUFFIX or one declared as PHASE alone.
CREATE TABLE IF NOT EXISTS parameters (
  parameter_id INTEGER PRIMARY KEY,
  type TEXT NOT NULL,
  phase TEXT NOT NULL,
  suffix TEXT NOT NULL DEFAULT '',
  constituents_json TEXT NOT NULL,
  degree INTEGER NOT NULL DEFAULT 0,
  source TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_parameters_phase ON parameters(phase, suffix);
CREATE INDEX IF NOT EXISTS idx_parameters_type ON parameters(type);
`;

interface ElementRow {
    name: string;
    atomic_number: number;
    mass: number;
    reference_state: string;
    h298: number;
    s298: number;
}

interface SpeciesRow {
    name: string;
    formula_json: string;
}

interface SublatticeRow {
    phase: string;
    idx: number;
    site_ratio: number;
    constituents_json: string;
}

interface FunctionRow {
    name: string;
    source: string;
}

interface ParameterRow {
    type: string;
    phase: string;
    suffix: string;
    constituents_json: string;
    degree: number;
    source: string;
}

export interface ArchiveOptions {
    /** Fail instead of creating an empty archive when `dbPath` does not exist */
    mustExist?: boolean;
}

export interface ArchiveStats {
    elements: number;
    species: number;
    phases: number;
    functions: number;
    parameters: number;
    parametersByType: Record<string, number>;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parseFormula(json: string, species: string): Record<string, number> {
    const value: unknown = JSON.parse(json);
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new ModelError(`Archived formula of ${species} is not an object`);
    }
    const formula: Record<string, number> = {};
    for (const [element, count] of Object.entries(value)) {
        if (typeof count !== 'number') {
            throw new ModelError(`Archived formula of ${species} has a non-numeric count for ${element}`);
        }
        formula[element] = count;
    }
    return formula;
}

function parseConstituents(json: string): string[] {
    const value: unknown = JSON.parse(json);
    if (!isStringArray(value)) {
        throw new ModelError(`Archived constituent list is malformed: ${json}`);
    }
    return value;
}

function parseConstituentArray(json: string): string[][] {
    const value: unknown = JSON.parse(json);
    if (!Array.isArray(value) || !value.every(isStringArray)) {
        throw new ModelError(`Archived constituent array is malformed: ${json}`);
    }
    return value;
}

/**
 * Thermodynamic database archive backed by better-sqlite3.
 * Handles schema migration and WAL mode; `save` replaces the archive contents
 * in one transaction.
 */
export class DatabaseArchive {
    private db: Database.Database;

    constructor(dbPath: string, options: ArchiveOptions = {}) {
        this.db = new Database(dbPath, { fileMustExist: options.mustExist ?? false });

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Archive opened');
    }

    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Archive migrated to v1');
        }
    }

    /**
     * Write `database` into the archive, replacing what was there.
     * Every FUNCTION and parameter must carry its source text.
     */
    save(database: ThermoDatabase): void {
        const insertElement = this.db.prepare(`
      INSERT INTO elements (name, atomic_number, mass, reference_state, h298, s298)
      VALUES (@name, @atomic_number, @mass, @reference_state, @h298, @s298)
    `);
        const insertSpecies = this.db.prepare('INSERT INTO species (name, formula_json) VALUES (?, ?)');
        const insertPhase = this.db.prepare('INSERT INTO phases (name, position) VALUES (?, ?)');
        const insertSublattice = this.db.prepare(`
      INSERT INTO sublattices (phase, idx, site_ratio, constituents_json)
      VALUES (?, ?, ?, ?)
    `);
        const insertFunction = this.db.prepare('INSERT INTO functions (name, source) VALUES (?, ?)');
        const insertParameter = this.db.prepare(`
      INSERT INTO parameters (type, phase, suffix, constituents_json, degree, source)
      VALUES (@type, @phase, @suffix, @constituents_json, @degree, @source)
    `);

        const saveAll = this.db.transaction(() => {
            this.db.exec(
                'DELETE FROM parameters; DELETE FROM functions; DELETE FROM sublattices; DELETE FROM phases; DELETE FROM species; DELETE FROM elements;'
            );

            for (const element of database.elements()) {
                insertElement.run({
                    name: element.name,
                    atomic_number: element.atomicNumber,
                    mass: element.mass,
                    reference_state: element.referenceState,
                    h298: element.H298,
                    s298: element.S298,
                });
            }

            for (const species of database.allSpecies()) {
                insertSpecies.run(species.name, JSON.stringify(species.toJSON().formula));
            }

            database.phases().forEach((phase, position) => {
                insertPhase.run(phase.name, position);
                phase.sublattices().forEach((sublattice, idx) => {
                    insertSublattice.run(phase.name, idx, sublattice.siteRatio, JSON.stringify(sublattice.constituents));
                });
            });

            for (const name of database.functions.names()) {
                const source = database.functions.source(name);
                if (source === undefined) {
                    throw new ModelError(`FUNCTION ${name} has no source text to archive`);
                }
                insertFunction.run(name, source);
            }

            for (const parameter of database.parameters) {
                if (parameter.source === undefined) {
                    throw new ModelError(`Parameter ${parameter.descriptor} has no source text to archive`);
                }
                insertParameter.run({
                    type: parameter.type,
                    phase: parameter.phase,
                    suffix: parameter.suffix,
                    constituents_json: JSON.stringify(parameter.constituentArray),
                    degree: parameter.degree,
                    source: parameter.source,
                });
            }
        });

        saveAll();
        getLogger().info(database.stats(), 'Database archived');
    }

    /**
     * Rebuild a database from the archive, re-parsing every function text.
     * The result is frozen unless `freeze` is false.
     */
    load(options: DatabaseOptions & { freeze?: boolean } = {}): ThermoDatabase {
        const { freeze = true, ...databaseOptions } = options;
        const database = new ThermoDatabase(databaseOptions);

        const elements = this.db.prepare<[], ElementRow>('SELECT * FROM elements ORDER BY name').all();
        for (const row of elements) {
            database.addElement(
                new Element({
                    name: row.name,
                    atomicNumber: row.atomic_number,
                    mass: row.mass,
                    referenceState: row.reference_state,
                    H298: row.h298,
                    S298: row.s298,
                })
            );
        }

        const species = this.db.prepare<[], SpeciesRow>('SELECT * FROM species ORDER BY name').all();
        for (const row of species) {
            database.addSpecies(new Species(row.name, parseFormula(row.formula_json, row.name)));
        }

        const phaseNames = this.db.prepare<[], { name: string }>('SELECT name FROM phases ORDER BY position').all();
        const sublatticeStmt = this.db.prepare<[string], SublatticeRow>(
            'SELECT * FROM sublattices WHERE phase = ? ORDER BY idx'
        );
        for (const { name } of phaseNames) {
            const sublattices = sublatticeStmt
                .all(name)
                .map((row) => new Sublattice(row.site_ratio, parseConstituents(row.constituents_json)));
            database.addPhase(new Phase(name, sublattices));
        }

        const functions = this.db.prepare<[], FunctionRow>('SELECT * FROM functions ORDER BY name').all();
        for (const row of functions) {
            database.defineFunction(row.name, row.source);
        }

        const parameters = this.db.prepare<[], ParameterRow>('SELECT * FROM parameters ORDER BY parameter_id').all();
        for (const row of parameters) {
            database.addParameter(
                new Parameter({
                    phase: row.phase,
                    suffix: row.suffix,
                    type: row.type,
                    constituentArray: parseConstituentArray(row.constituents_json),
                    degree: row.degree,
                    function: parseFunction(row.source, databaseOptions.parse),
                    source: row.source,
                })
            );
        }

        if (freeze) database.freeze();
        getLogger().debug(database.stats(), 'Database loaded from archive');
        return database;
    }

    getStats(): ArchiveStats {
        const count = (table: string): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        const typeRows = this.db
            .prepare<[], { type: string; count: number }>('SELECT type, COUNT(*) as count FROM parameters GROUP BY type ORDER BY type')
            .all();
        const parametersByType: Record<string, number> = {};
        for (const row of typeRows) {
            parametersByType[row.type] = row.count;
        }

        return {
            elements: count('elements'),
            species: count('species'),
            phases: count('phases'),
            functions: count('functions'),
            parameters: count('parameters'),
            parametersByType,
        };
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Archive closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
