import { isRegion, normalizeRealm, type Region } from "../config/regions.js";
import { ValidationError } from "../utils/errors.js";

export function parseRegion(value: string): Region {
  const region = value.toLowerCase();
  if (!isRegion(region)) {
    throw new ValidationError(`Invalid region "${value}". Allowed: us, eu, kr, tw`);
  }
  return region;
}

export function parseRealm(value: string): string {
  const slug = normalizeRealm(value);
  if (!/^[a-z0-9-]+$/.test(slug)) {
    throw new ValidationError(`Invalid realm slug "${value}"`);
  }
  return slug;
}

export function parseItemId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError("Invalid item ID");
  }
  return id;
}

/** Missing or unparseable values take the default; parsed ones are clamped into range. */
export function boundedInt(value: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Math.floor(Number(value));
  return Math.min(max, Math.max(min, Number.isFinite(parsed) && value !== "" && value !== undefined ? parsed : fallback));
}

/** `"1, 2,x,3"` → [1, 2, 3]; non-numeric entries are dropped. */
export function parseItemIds(value: string | undefined): number[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => /^\d+$/.test(s))
    .map(Number)
    .filter((n) => n > 0);
}
