/**
 * Route table: fixed redirect fixtures, everything else is a file.
 * Pure path matching. No filesystem access.
 */

export type RedirectKind = "redirect" | "infinite-redirect" | "relative-redirect";

export type Route =
  | { readonly kind: RedirectKind; readonly location: string }
  | { readonly kind: "file"; readonly relativePath: string };

export interface RedirectFixture {
  readonly path: string;
  readonly location: string;
}

export interface RouteTable {
  /** One hop to an absolute path. */
  readonly redirect: RedirectFixture;
  /** Points back at itself; never resolves. */
  readonly infiniteRedirect: { readonly path: string };
  /** Location is relative to the request path. */
  readonly relativeRedirect: RedirectFixture;
}

export const defaultRouteTable: RouteTable = {
  redirect: { path: "/redirect", location: "/test_file" },
  infiniteRedirect: { path: "/infinite_redirect" },
  relativeRedirect: { path: "/relative/redirect", location: "../test_file" },
};

/** Drops the query string, if any. */
function pathOnly(path: string): string {
  const q = path.indexOf("?");
  return q < 0 ? path : path.slice(0, q);
}

/** Matches on the path without its query string, for redirect fixtures and files alike. */
export function resolveRoute(target: string, table: RouteTable = defaultRouteTable): Route {
  const path = pathOnly(target);
  if (path === table.redirect.path) {
    return { kind: "redirect", location: table.redirect.location };
  }
  if (path === table.infiniteRedirect.path) {
    return { kind: "infinite-redirect", location: table.infiniteRedirect.path };
  }
  if (path === table.relativeRedirect.path) {
    return { kind: "relative-redirect", location: table.relativeRedirect.location };
  }
  return { kind: "file", relativePath: path.replace(/^\//, "") };
}

const PRECOMPRESSED: Readonly<Record<string, string>> = {
  ".gz": "gzip",
};

/** Content-Encoding implied by the file name, if it names a precompressed variant. */
export function precompressedEncoding(relativePath: string): string | undefined {
  const dot = relativePath.lastIndexOf(".");
  const slash = relativePath.lastIndexOf("/");
  if (dot <= slash + 1) return undefined;
  return PRECOMPRESSED[relativePath.slice(dot).toLowerCase()];
}
