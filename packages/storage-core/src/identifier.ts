/**
 * Resource identifier parsing.
 *
 * Syntax: `<scheme>://<location>[!<member>[!<nested-member>...]]`, or a bare
 * local path. `\!` is a literal `!`. Parsing never touches the filesystem or
 * the network.
 */

import { isAbsolute, resolve } from "node:path";
import { InvalidIdentifierError, UnsupportedSchemeError } from "./errors.ts";
import type { BackendDriver, BackendDrivers, BackendKind, ResourceIdentifier, Scheme } from "./types.ts";

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(.*)$/s;

const SCHEMES: readonly Scheme[] = ["file", "http", "https", "s3", "hf"];

const isScheme = (value: string): value is Scheme => SCHEMES.some((scheme) => scheme === value);

const createIdentifier = (scheme: Scheme, location: string, member: string[]): ResourceIdentifier => {
  const id: ResourceIdentifier = { scheme, location, member: Object.freeze(member) };
  return Object.freeze(id);
};

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split on unescaped `!`, unescaping `\!` in every part.
 */
export const splitMembers = (raw: string): string[] => {
  const parts: string[] = [];
  let current = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === "\\" && raw[i + 1] === "!") {
      current += "!";
      i++;
    } else if (ch === "!") {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
};

/**
 * Normalize an archive member path: forward slashes, no leading `/` or `./`,
 * no empty or `.` components.
 */
export const normalizeMember = (member: string): string =>
  member
    .replace(/\\/g, "/")
    .split("/")
    .filter((part) => part !== "" && part !== ".")
    .join("/");

/**
 * Percent-decode a location; malformed escapes are identifier errors.
 */
export const decodeLocation = (raw: string, encoded: string): string => {
  try {
    return decodeURIComponent(encoded);
  } catch (error: unknown) {
    if (error instanceof URIError) {
      throw new InvalidIdentifierError(raw, "malformed percent-encoding");
    }
    throw error;
  }
};

const normalizeLocation = (raw: string, scheme: Scheme, rest: string): string => {
  switch (scheme) {
    case "file": {
      const path = decodeLocation(raw, rest);
      if (!isAbsolute(path)) {
        throw new InvalidIdentifierError(raw, "file:// locations must be absolute");
      }
      return resolve(path);
    }
    case "http":
    case "https": {
      try {
        return new URL(`${scheme}://${rest}`).toString();
      } catch {
        throw new InvalidIdentifierError(raw, "malformed URL");
      }
    }
    case "s3": {
      const slash = rest.indexOf("/");
      if (slash <= 0 || slash === rest.length - 1) {
        throw new InvalidIdentifierError(raw, "expected s3://<bucket>/<key>");
      }
      return `s3://${rest}`;
    }
    case "hf": {
      if (rest.split("/").filter(Boolean).length < 3) {
        throw new InvalidIdentifierError(raw, "expected hf://<owner>/<repo>/<path>");
      }
      return `hf://${rest.replace(/\/+$/, "")}`;
    }
  }
};

// ============================================================================
// Public API
// ============================================================================

export const parseIdentifier = (raw: string): ResourceIdentifier => {
  const [base = "", ...members] = splitMembers(raw);
  if (base === "") {
    throw new InvalidIdentifierError(raw, "empty location");
  }

  const member = members.map((segment) => {
    const normalized = normalizeMember(segment);
    if (normalized === "") {
      throw new InvalidIdentifierError(raw, "empty archive member");
    }
    return normalized;
  });

  const match = SCHEME_PATTERN.exec(base);
  if (!match) {
    return createIdentifier("file", resolve(base), member);
  }

  const scheme = (match[1] ?? "").toLowerCase();
  if (!isScheme(scheme)) {
    throw new UnsupportedSchemeError(scheme);
  }
  return createIdentifier(scheme, normalizeLocation(raw, scheme, match[2] ?? ""), member);
};

/**
 * Render an identifier back to its canonical string form.
 */
export const formatIdentifier = (id: ResourceIdentifier): string =>
  [id.location, ...id.member].map((part) => part.replace(/!/g, "\\!")).join("!");

/**
 * The identifier without its member chain.
 */
export const baseIdentifier = (id: ResourceIdentifier): ResourceIdentifier =>
  id.member.length === 0 ? id : createIdentifier(id.scheme, id.location, []);

export const backendKindOf = (scheme: Scheme): BackendKind => {
  switch (scheme) {
    case "file":
      return "local";
    case "http":
    case "https":
      return "http";
    case "s3":
      return "s3";
    case "hf":
      return "hub";
  }
};

export const selectDriver = (drivers: BackendDrivers, id: ResourceIdentifier): BackendDriver =>
  drivers[backendKindOf(id.scheme)];

/**
 * Last path component of the location, used as a format hint.
 */
export const locationName = (location: string): string => {
  const path = SCHEME_PATTERN.test(location) ? location.replace(/[?#].*$/, "") : location;
  const parts = path.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? "";
};
