export const SEND_COUNT_RANGE = { min: 1, max: 10 } as const;
export const SEND_INTERVAL_RANGE = { min: 0.5, max: 10 } as const;

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "not_a_number" | "out_of_range"; message: string };

export const NOT_A_NUMBER_MESSAGE = "Please enter a number";
export const COUNT_RANGE_MESSAGE = `Send count must be between ${SEND_COUNT_RANGE.min} and ${SEND_COUNT_RANGE.max}`;
export const INTERVAL_RANGE_MESSAGE = `Send interval must be between ${SEND_INTERVAL_RANGE.min} and ${SEND_INTERVAL_RANGE.max} seconds`;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function notANumber<T>(): ParseResult<T> {
  return { ok: false, reason: "not_a_number", message: NOT_A_NUMBER_MESSAGE };
}

export function parseSendCount(input: string): ParseResult<number> {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return notANumber();
  }

  const parsed = Number(trimmed);
  if (parsed < SEND_COUNT_RANGE.min || parsed > SEND_COUNT_RANGE.max) {
    return { ok: false, reason: "out_of_range", message: COUNT_RANGE_MESSAGE };
  }
  return { ok: true, value: parsed };
}

export function parseSendInterval(input: string): ParseResult<number> {
  const trimmed = input.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return notANumber();
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return notANumber();
  }
  if (parsed < SEND_INTERVAL_RANGE.min || parsed > SEND_INTERVAL_RANGE.max) {
    return { ok: false, reason: "out_of_range", message: INTERVAL_RANGE_MESSAGE };
  }
  return { ok: true, value: parsed };
}
