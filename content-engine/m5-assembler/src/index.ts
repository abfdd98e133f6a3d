// M5-Assembler module exports

export { DocumentAssembler } from './assembler.js';
export { DEFAULT_ASSEMBLER_OPTIONS } from './types.js';
export type {
  AssemblerOptions,
  AssemblyResult,
  AssemblyStatistics,
  ModuleError,
  Result,
  SurfaceFactory
} from './types.js';
