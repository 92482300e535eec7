/**
 * Copy build output to its publish destinations. Each rule expands a glob
 * against the local filesystem; matched files land flat in the destination
 * and matched directories are merged into it when the rule is recursive.
 */

import { copyFile, cp, mkdir } from "node:fs/promises";
import { basename, join } from "node:path";
import fg from "fast-glob";
import type { Logger } from "pino";
import { errorMessage } from "../../errors/catalog.js";
import type { EntityFailure } from "../types.js";

export interface CopyRule {
  /** Glob pattern, absolute or relative to the process cwd */
  source: string;
  destination: string;
  recursive: boolean;
}

export interface MirrorResult {
  /** Destination paths written, in order */
  copied: string[];
  failures: EntityFailure[];
}

async function applyRule(rule: CopyRule, logger: Logger): Promise<string[]> {
  const matches = await fg(rule.source, {
    onlyFiles: false,
    dot: true,
    absolute: true,
    objectMode: true,
    followSymbolicLinks: false,
  });
  matches.sort((a, b) => a.path.localeCompare(b.path));

  if (matches.length === 0) {
    logger.warn({ source: rule.source }, "Copy rule matched nothing");
    return [];
  }

  await mkdir(rule.destination, { recursive: true });

  const copied: string[] = [];
  for (const match of matches) {
    if (match.dirent.isDirectory()) {
      if (!rule.recursive) {
        logger.debug({ path: match.path }, "Skipping directory (rule not recursive)");
        continue;
      }
      await cp(match.path, rule.destination, { recursive: true, force: true });
      copied.push(rule.destination);
      continue;
    }

    const target = join(rule.destination, basename(match.path));
    await copyFile(match.path, target);
    copied.push(target);
  }

  logger.info(
    { source: rule.source, destination: rule.destination, count: copied.length },
    "Applied copy rule",
  );
  return copied;
}

/** Apply copy rules in order. A failing rule is recorded and the rest still run. */
export async function mirrorOutputs(
  rules: readonly CopyRule[],
  logger: Logger,
): Promise<MirrorResult> {
  const result: MirrorResult = { copied: [], failures: [] };

  for (const rule of rules) {
    try {
      result.copied.push(...(await applyRule(rule, logger)));
    } catch (err) {
      result.failures.push({
        path: rule.source,
        operation: "copy",
        message: errorMessage(err),
      });
      logger.warn(
        { source: rule.source, destination: rule.destination, error: errorMessage(err) },
        "Copy rule failed",
      );
    }
  }

  return result;
}
