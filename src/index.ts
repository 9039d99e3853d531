export { SymbolType, symbolTypeName, hex, type uint4, type int4 } from './core/types.js';
export { LowlevelError, InconsistentInputError, ConfigError } from './core/error.js';
export { loadConfig, DEFAULT_NAME_LIMIT, type Config, type LogLevel } from './core/config.js';
export { createLogger, type Logger } from './core/log.js';
export { SortedMap, numericOrder, type Comparator } from './util/sorted-map.js';
export { SymbolRecord, MatchInfo } from './compare/record.js';
export type { OrigRow, RecompRow, ArrayRow } from './compare/schema.js';
export { RecordStore, THUNK_SIZE, MANGLED_PREFIX, thunkName } from './compare/store.js';
export { MatchOptionsStore, OPT_STUB, OPT_SKIP, type MatchOptionValue } from './compare/options.js';
export { QueryLayer } from './compare/query.js';
export {
  MatchingEngine,
  vftableName,
  vftableForName,
  isStaticOf,
  truncateName,
  type MatchingEngineOptions,
} from './compare/engine.js';
export { CompareDb, type CompareDbOptions } from './compare/db.js';
export { MarkerMatcher, type Marker, type MarkerReport } from './compare/markers.js';
export { getVtordispName, parseEncodedNumber } from './cvdump/demangler.js';
export {
  PdbFunctionExtractor,
  type FunctionNode,
  type FunctionSignature,
  type OriginalImage,
  type PdbFunction,
  type RegisterSymbol,
  type StackSymbol,
  type StackSymbolEntry,
  type SymbolsEntry,
  type TypeTable,
} from './pdb/extraction.js';
