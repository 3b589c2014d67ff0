import type { PlayerIdentity } from "@/lib/domain/types";

export function makeIdentity(surname: string, givenName: string): PlayerIdentity {
  return { surname: surname.trim(), givenName: givenName.trim() };
}

// Composite map key; JSON keeps "A|B" + "C" apart from "A" + "B|C"
export function identityKey(identity: PlayerIdentity): string {
  return JSON.stringify([identity.surname, identity.givenName]);
}

// Code-unit order, independent of the host locale
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareIdentity(a: PlayerIdentity, b: PlayerIdentity): number {
  return compareText(a.surname, b.surname) || compareText(a.givenName, b.givenName);
}

