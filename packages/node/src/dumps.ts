/**
 * packages/node/src/dumps.ts: Screen and view-tree dumps to text files.
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type Application, type Terminal, TvError, describeThrown } from "@textvision/core";

export const SCREEN_DUMP_FILE = "textvision-screen.txt";
export const VIEW_DUMP_FILE = "textvision-views.txt";

async function writeText(path: string, lines: readonly string[]): Promise<string> {
  try {
    await writeFile(path, `${lines.join("\n")}\n`, "utf8");
  } catch (err) {
    throw new TvError("TV_FILE_OPERATION", `cannot write ${path}: ${describeThrown(err)}`, {
      cause: err,
    });
  }
  return path;
}

/** Current surface, one text row per line. Resolves with the file path. */
export function writeScreenDump(terminal: Terminal, dir: string): Promise<string> {
  return writeText(join(dir, SCREEN_DUMP_FILE), terminal.snapshotLines());
}

/** Focus chain from the desktop down, then overlays. Resolves with the file path. */
export function writeViewDump(app: Application, dir: string): Promise<string> {
  return writeText(join(dir, VIEW_DUMP_FILE), app.describeFocusChain());
}
