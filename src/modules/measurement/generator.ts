import { faker } from "@faker-js/faker";

import { GradeLabels, GradeTable, WEIGHT_OFFSET_GRAMS } from "./constants.js";
import type { GradeLabel } from "./constants.js";
import type {
  MeasurementFactory,
  MeasurementGeneratorOptions,
  MeasurementRecord
} from "./types.js";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as `YYYY/MM/DD HH:mm:ss`. */
export function formatMeasurementTimestamp(date: Date): string {
  const day = [pad(date.getFullYear(), 4), pad(date.getMonth() + 1), pad(date.getDate())].join("/");
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join(":");
  return `${day} ${time}`;
}

export function isGradeLabel(value: unknown): value is GradeLabel {
  return typeof value === "string" && GradeLabels.some((label) => label === value);
}

export function referenceWeightOf(label: GradeLabel): number {
  const grade = GradeTable.find((entry) => entry.size === label);
  if (!grade) {
    throw new Error(`Unknown grade label: ${label}`);
  }
  return grade.referenceWeight;
}

export function createMeasurementRecord(
  deviceId = 1,
  options: MeasurementGeneratorOptions = {}
): MeasurementRecord {
  const random = options.random ?? faker.number;
  const now = options.now ?? (() => new Date());

  const gradeIndex = random.int({ min: 0, max: GradeTable.length - 1 });
  const grade = GradeTable[gradeIndex];
  if (!grade) {
    throw new Error(`Grade index out of range: ${gradeIndex}`);
  }
  const offset = random.int({ min: -WEIGHT_OFFSET_GRAMS, max: WEIGHT_OFFSET_GRAMS });

  return Object.freeze({
    size: grade.size,
    weight: grade.referenceWeight + offset,
    timestamp: formatMeasurementTimestamp(now()),
    device_id: deviceId
  });
}

export function createMeasurementFactory(
  options: MeasurementGeneratorOptions = {}
): MeasurementFactory {
  return (deviceId = 1) => createMeasurementRecord(deviceId, options);
}
