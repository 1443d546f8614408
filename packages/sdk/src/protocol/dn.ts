/**
 * DN helpers
 *
 * `getObject` has no point lookup on the server side: it searches below the
 * parent of the DN with an equality filter built from the DN's first RDN.
 */

import { ValidationError } from "./types";

export interface SplitDn {
  /** Left-most RDN, e.g. `uid=jdoe` */
  readonly rdn: string;
  /** The RDN as an LDAP equality filter, e.g. `(uid=jdoe)` */
  readonly filter: string;
  /** Everything after the first RDN, used as search base */
  readonly base: string;
  /** `rdn,base` without the whitespace around the separator */
  readonly dn: string;
}

/** Characters that must be hex-escaped in a filter value, plus the comma */
const FILTER_ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\5c",
  "*": "\\2a",
  "(": "\\28",
  ")": "\\29",
  "\0": "\\00",
  ",": "\\2c"
};

const escapeFilterChar = (ch: string): string => FILTER_ESCAPES[ch] ?? ch;

/**
 * Rewrites a DN attribute value as a search filter value.
 * `\XX` hex pairs are valid in both and pass through; other DN escapes (`\,`, `\+`, ...) are unescaped
 * and the character is escaped again for the filter.
 */
export function toFilterValue(value: string): string {
  let out = "";
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "\\" && /^[0-9a-fA-F]{2}$/.test(value.slice(i + 1, i + 3))) {
      out += value.slice(i, i + 3);
      i += 2;
    } else if (ch === "\\" && i + 1 < value.length) {
      out += escapeFilterChar(value[i + 1]);
      i++;
    } else {
      out += escapeFilterChar(ch);
    }
  }
  return out;
}

/**
 * Index of the first comma that is not escaped with a backslash, or -1.
 */
function firstSeparator(dn: string): number {
  for (let i = 0; i < dn.length; i++) {
    const ch = dn[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === ",") {
      return i;
    }
  }
  return -1;
}

/**
 * Splits a DN at its first unescaped comma into a search filter and a search base.
 *
 * @throws ValidationError when the DN is not a string, has no parent, or its first RDN is not `attr=value`
 */
export function splitDn(dn: string): SplitDn {
  if (typeof dn !== "string") {
    throw new ValidationError("DN must be a string", [{ path: "dn", message: `Expected string, received ${typeof dn}` }], dn);
  }

  const separator = firstSeparator(dn);
  if (separator === -1) {
    throw new ValidationError(`DN has no parent entry: "${dn}"`, [{ path: "dn", message: "Expected at least two RDNs" }], dn);
  }

  const rdn = dn.slice(0, separator).trim();
  const base = dn.slice(separator + 1).trim();

  const equals = rdn.indexOf("=");
  if (equals <= 0 || equals === rdn.length - 1) {
    throw new ValidationError(`Malformed RDN "${rdn}" in DN "${dn}"`, [{ path: "dn", message: "Expected attr=value" }], dn);
  }
  if (base.length === 0) {
    throw new ValidationError(`DN has an empty parent: "${dn}"`, [{ path: "dn", message: "Expected a non-empty base" }], dn);
  }

  const attribute = rdn.slice(0, equals).trim();
  const value = rdn.slice(equals + 1).trim();
  return { rdn, filter: `(${attribute}=${toFilterValue(value)})`, base, dn: `${rdn},${base}` };
}
