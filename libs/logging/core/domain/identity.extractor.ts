import type { BoundLogger } from "./bound-logger";

export type HeaderBag = Readonly<Record<string, string | string[] | undefined>>;

export const DEFAULT_USER_HEADER = "x-user-name";

/**
 * Mock bearer format: `user_<name>` optionally followed by `_<anything>`.
 * `<name>` is the shortest run of letters, digits or `_` (any script)
 * before the next `_`.
 */
const MOCK_BEARER_PATTERN = /^user_([\p{L}\p{N}_]+?)(?:_|$)/u;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * IdentityExtractor - Resolves a username from request headers.
 *
 * Precedence (first match wins):
 * 1. Custom user header (name configurable, case-insensitive), verbatim.
 * 2. `Authorization: Basic`, the username half of the credentials.
 *    The password is ignored.
 * 3. `Authorization: Bearer user_<name>_...`, decoded by the mock rule above.
 * 4. Otherwise undefined (anonymous).
 *
 * NOT AUTHENTICATION. Nothing here is verified; these schemes exist only to
 * put a name on log events and must never guard a real resource.
 * Malformed input falls through to the next scheme and never throws;
 * malformed Basic credentials are reported on `logger` when one is given.
 */
export class IdentityExtractor {
  static extract(
    headers: HeaderBag,
    userHeader: string = DEFAULT_USER_HEADER,
    logger?: BoundLogger,
  ): string | undefined {
    const custom = this.header(headers, userHeader);
    if (custom) return custom;

    const authorization = this.header(headers, "authorization");
    if (!authorization) return undefined;

    const [scheme, credentials] = this.splitScheme(authorization);
    switch (scheme) {
      case "basic":
        return this.fromBasic(credentials, logger);
      case "bearer":
        return this.fromMockBearer(credentials);
      default:
        return undefined;
    }
  }

  /**
   * Username half of `base64(username:password)`.
   */
  static fromBasic(
    credentials: string,
    logger?: BoundLogger,
  ): string | undefined {
    const decoded = this.decodeBase64(credentials);
    const separator = decoded?.indexOf(":") ?? -1;

    if (decoded === undefined || separator <= 0) {
      logger?.warning("invalid basic auth header format");
      return undefined;
    }
    return decoded.slice(0, separator);
  }

  static fromMockBearer(token: string): string | undefined {
    return MOCK_BEARER_PATTERN.exec(token)?.[1];
  }

  private static decodeBase64(value: string): string | undefined {
    if (value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
      return undefined;
    }

    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(
        Buffer.from(value, "base64"),
      );
    } catch {
      return undefined;
    }
  }

  private static header(headers: HeaderBag, name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(headers)) {
      if (key.toLowerCase() !== wanted) continue;
      const first = Array.isArray(value) ? value[0] : value;
      return first || undefined;
    }
    return undefined;
  }

  private static splitScheme(authorization: string): [string, string] {
    const space = authorization.indexOf(" ");
    if (space === -1) return [authorization.toLowerCase(), ""];
    return [
      authorization.slice(0, space).toLowerCase(),
      authorization.slice(space + 1).trim(),
    ];
  }
}
