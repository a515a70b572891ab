/**
 * File relocation between stage folders
 */

import * as fs from "fs";
import * as path from "path";
import { RelocationError, errorMessage } from "./errors.js";

/**
 * File-system side of the review pipeline
 */
export interface FileRelocator {
  ensureDirectory(dir: string): void;
  /**
   * Copy a file into a directory and return the new path.
   * Throws RelocationError when the copy cannot be made.
   */
  copyInto(sourcePath: string, targetDir: string): string;
}

export class FsFileRelocator implements FileRelocator {
  ensureDirectory(dir: string): void {
    fs.mkdirSync(dir, { recursive: true });
  }

  copyInto(sourcePath: string, targetDir: string): string {
    if (!fs.existsSync(sourcePath)) {
      throw new RelocationError(sourcePath, `File not found: ${sourcePath}`);
    }
    const destination = path.join(targetDir, path.basename(sourcePath));
    try {
      this.ensureDirectory(targetDir);
      const stat = fs.statSync(sourcePath);
      fs.copyFileSync(sourcePath, destination);
      fs.utimesSync(destination, stat.atime, stat.mtime);
    } catch (error) {
      throw new RelocationError(
        sourcePath,
        `Failed to copy ${sourcePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return destination;
  }
}
