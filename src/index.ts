/**
 * Public API: the TDB function language, the database entity model and the
 * dual-indexed parameter store.
 */
export * from './types/index.js';
export * from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export type { LoggerOptions } from './utils/logger.js';
export { resolveConfig, sanitizeConfig, toParseOptions, toEvaluateOptions } from './utils/config.js';

export { Lexer, tokenize } from './function/lexer.js';
export type { Token, Punctuator } from './function/lexer.js';
export { parseFunction, parseParameterDescriptor, DEFAULT_STATE_VARIABLES } from './function/parser.js';
export type { ParseOptions, ParameterDescriptor } from './function/parser.js';
export { MacroTable, collectMacroReferences } from './function/macros.js';
export { evaluate, evaluateFunction, selectSegment } from './function/evaluator.js';
export type { EvaluateOptions } from './function/evaluator.js';
export { StateConditions, readStateVariable, domainOf, STATE_VARIABLE_DOMAINS } from './function/conditions.js';
export type { ConditionsLookup, StateVariableDomain } from './function/conditions.js';

export { Element } from './model/element.js';
export type { ElementData } from './model/element.js';
export { Species } from './model/species.js';
export type { ChemicalFormula } from './model/species.js';
export { Sublattice } from './model/sublattice.js';
export { Phase } from './model/phase.js';
export { Parameter } from './model/parameter.js';
export type { ParameterData, ConstituentArray } from './model/parameter.js';
export { ThermoDatabase } from './model/database.js';
export type { DatabaseOptions } from './model/database.js';

export { ParameterStore, ParameterView } from './storage/parameter-store.js';
export type { ParameterPredicate } from './storage/parameter-store.js';
export { DatabaseArchive } from './storage/archive.js';
export type { ArchiveOptions, ArchiveStats } from './storage/archive.js';
