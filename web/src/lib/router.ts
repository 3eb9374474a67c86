import { constants } from "node:fs";
import { copyFile, link, mkdir, rm, stat, unlink } from "node:fs/promises";
import path from "node:path";
import type { RoutingDecision } from "@/types";
import { DestinationExistsError, MoveFailedError, errorCodeOf } from "./errors";

// Link errors that mean "this filesystem pair cannot hard-link", not "the move failed".
const LINK_UNSUPPORTED = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EMLINK"]);

export type MoveFile = (sourcePath: string, decision: RoutingDecision) => Promise<string>;

/**
 * Moves `sourcePath` into `decision.destinationDir` under its own file name
 * and returns the new path. An existing destination is never replaced.
 *
 * The file is hard-linked into place and then unlinked from its source, so
 * the destination name appears atomically or not at all. Where linking is
 * not possible the file is copied exclusively, its size verified, and only
 * then is the source removed.
 */
export const moveToDestination: MoveFile = async (sourcePath, decision) => {
  const destinationPath = path.join(decision.destinationDir, path.basename(sourcePath));

  try {
    await mkdir(decision.destinationDir, { recursive: true });
  } catch (err) {
    throw new MoveFailedError(sourcePath, err);
  }

  try {
    await link(sourcePath, destinationPath);
  } catch (err) {
    const code = errorCodeOf(err);
    if (code === "EEXIST") throw new DestinationExistsError(destinationPath);
    if (code === null || !LINK_UNSUPPORTED.has(code)) throw new MoveFailedError(sourcePath, err);

    await copyThenVerify(sourcePath, destinationPath);
  }

  try {
    await unlink(sourcePath);
  } catch (err) {
    // Leave exactly one copy behind: the source.
    await rm(destinationPath, { force: true });
    throw new MoveFailedError(sourcePath, err);
  }

  console.log(`[Router] ${sourcePath} -> ${destinationPath}`);
  return destinationPath;
};

async function copyThenVerify(sourcePath: string, destinationPath: string): Promise<void> {
  try {
    await copyFile(sourcePath, destinationPath, constants.COPYFILE_EXCL);
  } catch (err) {
    if (errorCodeOf(err) === "EEXIST") throw new DestinationExistsError(destinationPath);
    await rm(destinationPath, { force: true });
    throw new MoveFailedError(sourcePath, err);
  }

  try {
    const [source, copy] = await Promise.all([stat(sourcePath), stat(destinationPath)]);
    if (source.size !== copy.size) {
      throw new Error(`copy is ${copy.size} bytes, source is ${source.size}`);
    }
  } catch (err) {
    await rm(destinationPath, { force: true });
    throw new MoveFailedError(sourcePath, err);
  }
}
