import type { GradeLabel } from "./constants.js";

export interface MeasurementRecord {
  readonly size: GradeLabel;
  readonly weight: number;
  readonly timestamp: string;
  readonly device_id: number;
}

/** Same call shape as `faker.number.int`. */
export interface IntegerSource {
  int(options: { min: number; max: number }): number;
}

export interface MeasurementGeneratorOptions {
  random?: IntegerSource;
  now?: () => Date;
}

export type MeasurementFactory = (deviceId?: number) => MeasurementRecord;
