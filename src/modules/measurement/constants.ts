export const GradeTable = [
  { size: "6L", referenceWeight: 380 },
  { size: "5L", referenceWeight: 340 },
  { size: "4L", referenceWeight: 310 },
  { size: "3L", referenceWeight: 280 },
  { size: "2L", referenceWeight: 240 },
  { size: "L", referenceWeight: 200 },
  { size: "M", referenceWeight: 170 },
  { size: "S", referenceWeight: 140 },
  { size: "2S", referenceWeight: 110 },
  { size: "3S", referenceWeight: 80 }
] as const;

export type GradeLabel = (typeof GradeTable)[number]["size"];

export const GradeLabels: readonly GradeLabel[] = GradeTable.map((grade) => grade.size);

export const WEIGHT_OFFSET_GRAMS = 10;
