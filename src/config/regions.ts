export type Region = "us" | "eu" | "kr" | "tw";

export const SUPPORTED_REGIONS = ["us", "eu", "kr", "tw"] as const satisfies readonly Region[];

export interface RealmRef {
  region: Region;
  realm: string;
}

/** A requested realm; without a region it is detected at lookup time. */
export interface RealmEntry {
  region?: Region;
  realm: string;
}

// Common EU realm slugs used for region auto-detection
export const EU_REALMS: ReadonlySet<string> = new Set([
  "tarren-mill",
  "draenor",
  "kazzak",
  "argent-dawn",
  "silvermoon",
  "stormrage-eu",
  "ragnaros-eu",
  "twisting-nether",
  "outland",
  "frostmane",
  "ravencrest",
  "chamber-of-aspects",
  "defias-brotherhood",
]);

function us(realm: string): RealmRef {
  return { region: "us", realm };
}

export const DEFAULT_REALMS: readonly RealmRef[] = [
  us("stormrage"),
  us("area-52"),
  us("tichondrius"),
  us("mal-ganis"),
  us("kiljaeden"),
];

export const POPULAR_REALMS: readonly RealmRef[] = [
  ...DEFAULT_REALMS,
  us("illidan"),
  us("thrall"),
  us("moon-guard"),
  us("wyrmrest-accord"),
  us("bleeding-hollow"),
];

// "all-us" is capped to the default five
export const ALL_US_REALMS: readonly RealmRef[] = DEFAULT_REALMS;

export function isRegion(value: string): value is Region {
  return SUPPORTED_REGIONS.some((region) => region === value);
}

/** The region tried when the primary answers 403. */
export function alternateRegion(region: Region): Region {
  return region === "us" ? "eu" : "us";
}

/** Known EU slugs resolve to `eu`; anything else is undetectable. */
export function detectRealmRegion(realm: string): Region | undefined {
  return EU_REALMS.has(realm.toLowerCase()) ? "eu" : undefined;
}

export function normalizeRealm(realm: string): string {
  return realm.trim().toLowerCase();
}
