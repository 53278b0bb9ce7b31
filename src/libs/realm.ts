// Realms: getrennte API-Flächen, Tokens sind an genau einen Realm gebunden.

export const REALMS = ["mobile", "web"] as const;

export type Realm = (typeof REALMS)[number];

export function isRealm(value: unknown): value is Realm {
  return value === "mobile" || value === "web";
}
