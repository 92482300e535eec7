import { resolve, sep } from "node:path";
import { PathOutsideRootError } from "../errors/catalog.js";

/**
 * Strip the remote root from a remote path. The prefix only matches on a
 * segment boundary and ignores case, since the remote store does.
 */
export function relativeRemotePath(
  remotePath: string,
  remoteRoot: string,
): string {
  const root = remoteRoot.replace(/\/+$/, "");
  let rel = remotePath;

  if (root !== "" && remotePath.toLowerCase().startsWith(root.toLowerCase())) {
    const rest = remotePath.slice(root.length);
    if (rest === "" || rest.startsWith("/")) {
      rel = rest;
    }
  }

  return rel.replace(/^\/+/, "");
}

/** Map a remote path to its target under the local base directory. */
export function localPathFor(
  remotePath: string,
  remoteRoot: string,
  basePath: string,
): string {
  const base = resolve(basePath);
  const target = resolve(base, relativeRemotePath(remotePath, remoteRoot));

  if (!target.startsWith(base + sep)) {
    throw new PathOutsideRootError(remotePath);
  }
  return target;
}
