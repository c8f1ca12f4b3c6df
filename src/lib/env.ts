export type EnvSource = Record<string, string | undefined>;

export function env(name: string, fallback?: string, source: EnvSource = process.env): string {
  const v = source[name];
  if (v === undefined || v.trim() === "") {
    if (fallback !== undefined) return fallback;
    throw new Error(`Missing env: ${name}`);
  }
  return v.trim();
}

export function envOptional(name: string, source: EnvSource = process.env): string | undefined {
  const v = source[name];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

export function envFlag(name: string, fallback: boolean, source: EnvSource = process.env): boolean {
  const raw = envOptional(name, source);
  if (raw === undefined) return fallback;
  const v = raw.toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return fallback;
}

export function envRatio(name: string, fallback: number, source: EnvSource = process.env): number {
  const raw = envOptional(name, source);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || n > 1) {
    throw new Error(`Invalid env: ${name} must be a number between 0 and 1 (got "${raw}")`);
  }
  return n;
}
