export * as read from './read';
export * as write from './write';
export { CalcStore, openStore, type OpenStoreOptions, type StoredCalculation } from './store';
export { CalculationStore, validateCalculation } from './calculation';
export { GeometryStore, validateGeometry } from './geometry';
export { EnergyStore, type RecordEnergyParams, type RecordedEnergy } from './energy';
export { insertOrFetch, isUniqueViolation } from './dedupe';
export {
  calculationHash,
  canonicalGeometry,
  geometryHash,
  hashRegistry,
  stableStringify,
  PRIMARY_HASH,
  type HashName,
} from './hash';
export { WriteHooks, type CalculationDraft, type GeometryDraft, type StoreHooks } from './hooks';
export {
  ANGSTROM_TO_BOHR,
  fromResults,
  fromStructure,
  toInternal,
  toProgramInput,
  toResults,
} from './convert';
export * from './qcio';
export * from './models';
export * from './errors';
export { loadConfig, type Config, type ConfigOverrides } from './config';
export { createLogger, type Logger, type LogLevel } from './logger';
