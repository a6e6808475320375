export { GradeLabels, GradeTable, WEIGHT_OFFSET_GRAMS } from "./constants.js";
export type { GradeLabel } from "./constants.js";
export {
  createMeasurementFactory,
  createMeasurementRecord,
  formatMeasurementTimestamp,
  isGradeLabel,
  referenceWeightOf
} from "./generator.js";
export type {
  IntegerSource,
  MeasurementFactory,
  MeasurementGeneratorOptions,
  MeasurementRecord
} from "./types.js";
