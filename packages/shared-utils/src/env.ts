export function envString(key: string, defaultValue: string): string {
  const value = process.env[key]?.trim();
  return value ? value : defaultValue;
}

export function envNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}
