import { mkdir, mkdtemp, readdir, rm, rmdir } from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger';
import { AppError, describeError } from '../../utils/errors';

const RUN_DIRECTORY_PREFIX = 'run-';

/**
 * Local directory holding downloaded source files while they are processed.
 *
 * The configured root may be shared with other files, so each run works in
 * its own subdirectory created under it and only ever deletes that. The root
 * itself is removed on dispose only when this run created it and it is empty.
 * Cleanup failures are logged and never raised.
 */
export class ScratchDirectory {
  private runDirectory: string | null = null;
  private createdRoot = false;

  constructor(public readonly root: string) {}

  /** The current run's directory; only valid between `prepare` and `dispose`. */
  get directory(): string {
    if (this.runDirectory === null) {
      throw new AppError('Scratch directory has not been prepared', 'SCRATCH_NOT_PREPARED');
    }
    return this.runDirectory;
  }

  async prepare(): Promise<void> {
    await this.dispose();
    const created = await mkdir(this.root, { recursive: true });
    this.createdRoot = this.createdRoot || created !== undefined;
    this.runDirectory = await mkdtemp(path.join(this.root, RUN_DIRECTORY_PREFIX));
    logger.debug(`Using temporary directory: ${this.runDirectory}`);
  }

  async remove(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
      logger.debug(`Removed temporary file: ${filePath}`);
    } catch (error) {
      logger.warn(`Failed to remove temporary file ${filePath}: ${describeError(error)}`);
    }
  }

  /** Deletes every file in the run directory, keeping the directory itself. */
  async sweep(): Promise<void> {
    try {
      const directory = this.directory;
      const entries = await readdir(directory, { withFileTypes: true });
      await Promise.all(
        entries.filter((entry) => entry.isFile()).map((entry) => rm(path.join(directory, entry.name), { force: true }))
      );
      logger.debug('Cleaned temporary files');
    } catch (error) {
      logger.warn(`Failed to clean temporary files: ${describeError(error)}`);
    }
  }

  async dispose(): Promise<void> {
    const runDirectory = this.runDirectory;
    this.runDirectory = null;

    if (runDirectory !== null) {
      try {
        await rm(runDirectory, { recursive: true, force: true });
        logger.debug(`Cleaned up temporary directory: ${runDirectory}`);
      } catch (error) {
        logger.warn(`Failed to clean up temporary directory ${runDirectory}: ${describeError(error)}`);
      }
    }

    if (this.createdRoot) {
      try {
        await rmdir(this.root);
        this.createdRoot = false;
      } catch (error) {
        // Still holds something else; left in place.
        logger.debug(`Kept scratch root ${this.root}: ${describeError(error)}`);
      }
    }
  }
}
