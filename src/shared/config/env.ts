export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  CHARGE_API_BASE_URL: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/station_cache";
  const MONGO_DB_NAME = env.MONGO_DB_NAME?.trim() ? env.MONGO_DB_NAME.trim() : "station_cache";
  const CHARGE_API_BASE_URL = validateHttpUrl(
    "CHARGE_API_BASE_URL",
    env.CHARGE_API_BASE_URL ?? "https://chargemyhyundai.com/api/map/v1"
  );

  return { MONGO_URI, MONGO_DB_NAME, CHARGE_API_BASE_URL };
};
