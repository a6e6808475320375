export const DEFAULT_ENDPOINT_URL = "http://127.0.0.1:8080/measurements";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_DEVICE_ID = 1;

export interface AppConfig {
  endpointUrl: string;
  requestTimeoutMs: number;
  defaultDeviceId: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value.trim() === "") {
    return fallback;
  }

  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseEndpointUrl(value: string | undefined): string {
  if (value == null || value.trim() === "") {
    return DEFAULT_ENDPOINT_URL;
  }

  const trimmed = value.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new Error("GRADER_ENDPOINT_URL must be an absolute http(s) URL");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("GRADER_ENDPOINT_URL must be an absolute http(s) URL");
  }
  return trimmed;
}

export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  return Object.freeze({
    endpointUrl: parseEndpointUrl(env.GRADER_ENDPOINT_URL),
    requestTimeoutMs: parsePositiveInt(
      env.GRADER_REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
      "GRADER_REQUEST_TIMEOUT_MS"
    ),
    defaultDeviceId: parsePositiveInt(
      env.GRADER_DEFAULT_DEVICE_ID,
      DEFAULT_DEVICE_ID,
      "GRADER_DEFAULT_DEVICE_ID"
    )
  });
}
