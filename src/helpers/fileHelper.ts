import fs from "fs";
import path from "path";
import { logger } from "./cliHelper";

/**
 * file utility functions for the role tracker.
 * This module provides file helper functions used across the application.
 *
 * @module helpers
 */

/**
 * Ensures the output directory exists.
 * @param dirPath - Directory path to check/create
 */
export const ensureDirectoryExists = (dirPath: string) => {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
}

/**
 * Resolves the output directory below the workspace, creating it when missing.
 * @param workspace - Workspace root
 * @param output - Output subdirectory
 * @returns Absolute path of the output directory
 */
export const resolveOutputDirectory = (workspace: string, output: string): string => {
    const dir = path.resolve(workspace, output);
    ensureDirectoryExists(dir);
    return dir;
}

/**
 * Writes text content to a file inside a directory.
 * Errors propagate to the caller.
 * @param dir - Target directory
 * @param fileName - File name inside the directory
 * @param content - Content to write
 * @returns Full path of the written file
 */
export const writeTextFile = (dir: string, fileName: string, content: string): string => {
    ensureDirectoryExists(dir);
    const filePath = path.join(dir, fileName);
    fs.writeFileSync(filePath, content, 'utf8');
    logger.debug(`Wrote ${content.length} characters to ${filePath}`);
    return filePath;
}
